/**
 * Tunnelflight API client
 * Signs in to the member website, keeps the session, and fetches the
 * JSON endpoints behind the member dashboard and logbook.
 */
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import {
  AJAX_HEADERS,
  BASE_URL,
  BROWSER_HEADERS,
  CLEAR_SESSION_DELAY_MS,
  ENDPOINTS,
  REQUEST_TIMEOUT_MS
} from '../settings.js';
import {
  isRecord,
  type ApiStats,
  type FlightTimeEntry,
  type JsonRecord,
  type PostResult,
  type Tunnel,
  type UserData
} from './types.js';
import { SessionCookies } from './session.js';
import { buildUserData } from './user-data.js';
import { type EnhancedLogger, LogContext } from '../utils/logger.js';

const USER_INFO_PATTERN = /<script id="userInfoObj" type="application\/json">([\s\S]*?)<\/script>/;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Parse a response body that may or may not be JSON
 */
function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function bodyText(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  return body === undefined || body === null ? '' : JSON.stringify(body);
}

function readText(record: JsonRecord, key: string, fallback: string): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return fallback;
}

/**
 * Map one raw tunnel directory record, or null when it has no usable id
 */
export function toTunnel(record: unknown): Tunnel | null {
  if (!isRecord(record)) {
    return null;
  }
  const id = Number.parseInt(String(record.entry_id ?? 0), 10);
  if (!Number.isFinite(id) || id <= 0) {
    return null;
  }
  return {
    id,
    title: readText(record, 'title', 'Unknown'),
    country: readText(record, 'country', 'Unknown'),
    size: readText(record, 'size', 'Unknown'),
    manufacturer: readText(record, 'manufacturer', 'Unknown'),
    address: readText(record, 'address', ''),
    city: readText(record, 'address_city', ''),
    status: readText(record, 'status', 'Unknown'),
  };
}

export interface TunnelflightApiOptions {
  /** Axios instance to send requests with */
  http?: AxiosInstance;
  /** Pause after logging out before retrying a conflicted login */
  clearSessionDelayMs?: number;
}

/**
 * Tunnelflight API Client
 */
export class TunnelflightApi {
  public readonly username: string;

  private readonly http: AxiosInstance;
  private readonly clearSessionDelayMs: number;
  private readonly cookies = new SessionCookies();
  private loggedIn = false;
  private token: string | null = null;
  private memberId: string | null = null;

  private stats: ApiStats = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    lastRequest: null,
    lastError: null,
    averageResponseTime: 0
  };

  /**
   * @param username Tunnelflight username (stored lower-cased)
   * @param password Tunnelflight password
   * @param logger Enhanced logging utility
   */
  constructor(
    username: string,
    private readonly password: string,
    private readonly logger: EnhancedLogger,
    options: TunnelflightApiOptions = {}
  ) {
    if (!username || username.trim() === '' || !password) {
      this.logger.error('Invalid Tunnelflight credentials provided', LogContext.API);
      throw new Error('Invalid Tunnelflight credentials provided');
    }

    this.username = username.trim().toLowerCase();
    this.http = options.http ?? axios.create();
    this.clearSessionDelayMs = options.clearSessionDelayMs ?? CLEAR_SESSION_DELAY_MS;
    this.http.defaults.baseURL = BASE_URL;
    this.http.defaults.timeout = REQUEST_TIMEOUT_MS;
    // Status codes are inspected per endpoint
    this.http.defaults.validateStatus = () => true;
    this.cookies.attach(this.http);

    this.logger.debug(`Created Tunnelflight API client for user: ${this.username}`, LogContext.API);
  }

  public isLoggedIn(): boolean {
    return this.loggedIn;
  }

  public getToken(): string | null {
    return this.token;
  }

  public getStats(): ApiStats {
    return { ...this.stats };
  }

  public clearStats(): void {
    this.stats = {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      lastRequest: null,
      lastError: null,
      averageResponseTime: 0
    };
  }

  /**
   * Log in to the Tunnelflight website
   * @param retry Whether a 409 conflict may clear the session and retry once
   * @returns Whether the login succeeded
   */
  public async login(retry = true): Promise<boolean> {
    this.logger.debug(`Starting login process for username: ${this.username}`, LogContext.API);

    // The main page sets the session cookies the login relies on
    try {
      await this.request('GET', ENDPOINTS.home, { headers: BROWSER_HEADERS });
    } catch (error) {
      this.handleApiError(`login(${this.username}) main page`, error);
      this.loggedIn = false;
      return false;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.request('POST', ENDPOINTS.login, {
        headers: this.ajaxHeaders(false),
        data: {
          username: this.username,
          password: this.password,
          passcode: '',
          enable2fa: false,
          checkTwoFactor: true,
          passcodeOption: 'email'
        },
        responseType: 'text'
      });
    } catch (error) {
      this.handleApiError(`login(${this.username})`, error);
      this.loggedIn = false;
      return false;
    }

    // 409 means an existing session is in the way
    if (response.status === 409 && retry) {
      this.logger.warn(`Got 409 conflict for ${this.username}, clearing session and retrying`, LogContext.API);
      await this.clearSession();
      return this.login(false);
    }

    if (response.status !== 200) {
      this.logger.error(`Login failed with status ${response.status} for ${this.username}`, LogContext.API);
      this.loggedIn = false;
      return false;
    }

    const content = bodyText(response.data);
    const parsed = parseBody(response.data);

    if (isRecord(parsed)) {
      const message = typeof parsed.message === 'string' ? parsed.message : '';

      if ('token' in parsed) {
        this.token = typeof parsed.token === 'string' && parsed.token !== '' ? parsed.token : null;
        this.loggedIn = true;
        this.logger.debug(`Login successful - token found in response for ${this.username}`, LogContext.API);
      } else if (message.toLowerCase().includes('success')) {
        this.loggedIn = true;
        this.logger.debug(`Login successful via success message for ${this.username}: ${message}`, LogContext.API);
      } else {
        this.loggedIn = false;
        this.logger.error(
          `Login JSON indicates failure for ${this.username}: ${message || 'Unknown error'}`,
          LogContext.API
        );
      }
      return this.loggedIn;
    }

    this.loggedIn = content.toLowerCase().includes('success');
    if (this.loggedIn) {
      this.logger.debug(`Login successful via text response for ${this.username}`, LogContext.API);
    } else {
      this.logger.error(`Login failed - success not found in response for ${this.username}`, LogContext.API);
    }
    return this.loggedIn;
  }

  /**
   * Log out and start a fresh session
   */
  private async clearSession(): Promise<void> {
    try {
      await this.request('GET', ENDPOINTS.logout, { headers: BROWSER_HEADERS });
      this.cookies.clear();
      this.token = null;
      this.logger.debug(`Logged out to clear session for ${this.username}`, LogContext.API);

      await this.request('GET', ENDPOINTS.home, { headers: BROWSER_HEADERS });
      this.logger.debug(`Got fresh session for ${this.username}`, LogContext.API);

      await sleep(this.clearSessionDelayMs);
    } catch (error) {
      this.handleApiError(`clearSession(${this.username})`, error);
    }
  }

  /**
   * Log in if the session is not established yet
   */
  public async ensureLoggedIn(): Promise<boolean> {
    if (this.loggedIn) {
      return true;
    }
    this.logger.debug(`Not logged in, attempting login first for ${this.username}`, LogContext.API);
    return this.login();
  }

  /**
   * Fetch a JSON endpoint with the session, re-logging in once on 401/403
   * @returns Parsed body, or null on any failure
   */
  public async fetchJson(url: string, acceptedStatuses: number[] = [200], allowRelogin = true): Promise<unknown> {
    if (!(await this.ensureLoggedIn())) {
      this.logger.error(`Login failed, cannot fetch data from ${url} for ${this.username}`, LogContext.API);
      return null;
    }

    try {
      const response = await this.request('GET', url, { headers: this.ajaxHeaders(true) });

      if (!acceptedStatuses.includes(response.status)) {
        this.logger.error(`Failed to fetch data from ${url}: ${response.status} for ${this.username}`, LogContext.API);

        if ((response.status === 401 || response.status === 403) && allowRelogin) {
          this.logger.debug('Attempting to re-login and retry fetch', LogContext.API);
          this.loggedIn = false;
          if (await this.login()) {
            return this.fetchJson(url, acceptedStatuses, false);
          }
        }
        return null;
      }

      const data = parseBody(response.data);
      if (data === undefined) {
        this.logger.error(`Response from ${url} is not valid JSON for ${this.username}`, LogContext.API);
        return null;
      }
      return data;
    } catch (error) {
      this.handleApiError(`fetchJson(${url})`, error);
      return null;
    }
  }

  private async fetchRecord(url: string, acceptedStatuses?: number[]): Promise<JsonRecord | null> {
    const data = await this.fetchJson(url, acceptedStatuses);
    if (data === null) {
      return null;
    }
    if (!isRecord(data)) {
      this.logger.error(`Expected an object from ${url}, got ${Array.isArray(data) ? 'array' : typeof data}`, LogContext.API);
      return null;
    }
    return data;
  }

  public async getFlyerCard(): Promise<JsonRecord | null> {
    const card = await this.fetchRecord(ENDPOINTS.flyerCard);
    if (card && (typeof card.member_id === 'string' || typeof card.member_id === 'number')) {
      this.memberId = String(card.member_id).replace(/,/g, '');
    }
    return card;
  }

  public async getFlyerCharts(): Promise<JsonRecord | null> {
    return this.fetchRecord(ENDPOINTS.flyerCharts);
  }

  /**
   * Member id from the flyer card, fetching the card if not known yet
   */
  public async getMemberId(): Promise<string | null> {
    if (!this.memberId) {
      await this.getFlyerCard();
    }
    if (!this.memberId) {
      this.logger.error(`Could not get member ID for ${this.username}`, LogContext.API);
    }
    return this.memberId;
  }

  /**
   * Extract the user info JSON embedded in the dashboard page
   */
  public async getDashboardData(): Promise<JsonRecord | null> {
    if (!(await this.ensureLoggedIn())) {
      this.logger.error(`Login failed, cannot fetch dashboard data for ${this.username}`, LogContext.API);
      return null;
    }

    try {
      const response = await this.request('GET', ENDPOINTS.dashboard, {
        headers: BROWSER_HEADERS,
        responseType: 'text'
      });

      if (response.status !== 200) {
        this.logger.error(`Failed to fetch dashboard: ${response.status} for ${this.username}`, LogContext.API);
        return null;
      }

      const html = bodyText(response.data);
      const match = USER_INFO_PATTERN.exec(html);
      if (!match) {
        this.logger.error(`Could not find user info in dashboard HTML for ${this.username}`, LogContext.API);
        this.logger.verbose(`HTML snippet for ${this.username}: ${html.slice(0, 500)}`, LogContext.API);
        return null;
      }

      const userInfo = parseBody(match[1]);
      if (!isRecord(userInfo)) {
        this.logger.error(`Failed to parse user info for ${this.username}`, LogContext.API);
        return null;
      }
      return userInfo;
    } catch (error) {
      this.handleApiError(`getDashboardData(${this.username})`, error);
      return null;
    }
  }

  public async getSkillsLevels(memberId: string): Promise<JsonRecord | null> {
    const skills = await this.fetchRecord(`${ENDPOINTS.skillsLevels}${memberId}`, [200, 201]);
    if (skills) {
      this.logger.debug(
        `Raw skill values for ${this.username}: level1=${String(skills.level1 ?? 'N/A')}, ` +
        `static=${String(skills.static ?? 'N/A')}, dynamic=${String(skills.dynamic ?? 'N/A')}, ` +
        `formation=${String(skills.formation ?? 'N/A')}`,
        LogContext.API
      );
    }
    return skills;
  }

  public async getLogbookEntries(memberId: string): Promise<JsonRecord[] | null> {
    const data = await this.fetchJson(`${ENDPOINTS.logbookSkills}${memberId}`, [200, 201]);
    if (data === null) {
      return null;
    }
    if (!Array.isArray(data)) {
      this.logger.error(`Expected a list of logbook entries for ${this.username}`, LogContext.API);
      return null;
    }
    const entries = data.filter(isRecord);
    this.logger.debug(`Fetched ${entries.length} logbook entries for ${this.username}`, LogContext.API);
    return entries;
  }

  /**
   * Fetch every endpoint for the account and combine them
   * @returns Combined user data, or null without a flyer card
   */
  public async getUserData(): Promise<UserData | null> {
    const flyerCard = await this.getFlyerCard();
    if (!flyerCard) {
      this.logger.error(`Failed to fetch flyer card data for ${this.username}`, LogContext.API);
      return null;
    }

    const flyerCharts = await this.getFlyerCharts();
    const dashboard = await this.getDashboardData();

    const memberId = await this.getMemberId();
    const skillsLevels = memberId ? await this.getSkillsLevels(memberId) : null;
    const logbookEntries = memberId ? await this.getLogbookEntries(memberId) : null;

    return buildUserData(
      { flyerCard, flyerCharts, dashboard, skillsLevels, logbookEntries },
      this.username,
      this.logger
    );
  }

  /**
   * Fetch the tunnel directory used by the logbook
   */
  public async getTunnels(): Promise<Tunnel[]> {
    const data = await this.fetchJson(ENDPOINTS.tunnels, [200, 201]);
    if (data === null) {
      return [];
    }
    if (!Array.isArray(data)) {
      this.logger.error(`Expected a list of tunnels, got: ${typeof data}`, LogContext.API);
      return [];
    }

    const tunnels: Tunnel[] = [];
    for (const record of data) {
      const tunnel = toTunnel(record);
      if (tunnel) {
        tunnels.push(tunnel);
      } else {
        this.logger.debug(`Skipping tunnel record without a valid entry_id: ${JSON.stringify(record)}`, LogContext.API);
      }
    }

    this.logger.debug(`Fetched ${tunnels.length} tunnels from API`, LogContext.API);
    return tunnels;
  }

  /**
   * Add a flight-time entry to the member logbook
   */
  public async postFlightTime(entry: FlightTimeEntry): Promise<PostResult> {
    if (!(await this.ensureLoggedIn())) {
      return { success: false, message: 'Login failed' };
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.request('POST', ENDPOINTS.logTime, {
        headers: this.ajaxHeaders(true),
        data: entry,
        responseType: 'text'
      });
    } catch (error) {
      this.handleApiError('postFlightTime', error);
      return { success: false, message: error instanceof Error ? error.message : String(error) };
    }

    if (response.status !== 200 && response.status !== 201) {
      this.logger.error(`Failed to log time: HTTP status ${response.status}`, LogContext.API);
      return { success: false, message: `HTTP status ${response.status}` };
    }

    const content = bodyText(response.data);
    const parsed = parseBody(response.data);

    if (isRecord(parsed)) {
      const message = typeof parsed.message === 'string' ? parsed.message : '';
      if (message === 'Ok' || message.toLowerCase().includes('success')) {
        return { success: true, message };
      }
      return { success: false, message: message || 'Unknown error' };
    }

    const lowered = content.toLowerCase();
    if (lowered.includes('success') || lowered.includes('ok')) {
      this.logger.info('Assuming success based on response text', LogContext.API);
      return { success: true, message: content.slice(0, 200) };
    }

    return { success: false, message: content.slice(0, 200) || 'Empty response' };
  }

  /**
   * AJAX headers, with the bearer token once login has issued one
   */
  private ajaxHeaders(includeToken: boolean): Record<string, string> {
    const headers: Record<string, string> = { ...AJAX_HEADERS };
    if (includeToken && this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  /**
   * Send one request, keeping statistics and logging it
   */
  private async request(
    method: 'GET' | 'POST',
    url: string,
    options: {
      headers: Readonly<Record<string, string>>;
      data?: unknown;
      responseType?: 'json' | 'text';
    }
  ): Promise<AxiosResponse<unknown>> {
    const startTime = Date.now();
    this.stats.totalRequests++;
    this.stats.lastRequest = new Date();
    this.logger.api(method, url);

    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        headers: { ...options.headers },
        data: options.data,
        responseType: options.responseType ?? 'json'
      });

      this.updateAverageResponseTime(Date.now() - startTime);
      this.logger.api(method, url, response.status, response.data);

      if (response.status < 400) {
        this.stats.successfulRequests++;
      } else {
        this.stats.failedRequests++;
      }
      return response;
    } catch (error) {
      this.stats.failedRequests++;
      this.stats.lastError = error instanceof Error ? error : new Error(String(error));
      throw error;
    }
  }

  /**
   * Log an API error with as much detail as is available
   */
  private handleApiError(context: string, error: unknown): void {
    if (axios.isAxiosError(error)) {
      const responseStatus = error.response?.status ?? 0;
      this.logger.error(
        `API error in ${context}: ${error.message} (Status: ${responseStatus})`,
        LogContext.API
      );

      if (error.response?.data) {
        this.logger.debug(`Response data: ${bodyText(error.response.data)}`, LogContext.API);
      }
    } else {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error in ${context}: ${errorMessage}`, LogContext.API);
    }
  }

  private updateAverageResponseTime(newResponseTime: number): void {
    if (this.stats.averageResponseTime === 0) {
      this.stats.averageResponseTime = newResponseTime;
    } else {
      this.stats.averageResponseTime =
        (this.stats.averageResponseTime * 0.9) + (newResponseTime * 0.1);
    }
  }
}
