/**
 * Member logbook operations: log flight time, search the tunnel directory,
 * list tunnel countries and refresh account data.
 */
import { z } from 'zod';
import type { Tunnel } from '../api/types.js';
import type { TunnelflightApi } from '../api/tunnelflight-api.js';
import type { TunnelflightCoordinator } from '../coordinator.js';
import { MAX_FLIGHT_MINUTES, MAX_SEARCH_RESULTS, MIN_FLIGHT_MINUTES } from '../settings.js';
import { normalizeUsername } from '../utils/format.js';
import { type EnhancedLogger, LogContext } from '../utils/logger.js';
import { TunnelDirectory } from './tunnel-directory.js';

export const logFlightTimeSchema = z.object({
  tunnel_id: z.coerce.number().int().positive(),
  time: z.coerce.number().int().min(MIN_FLIGHT_MINUTES).max(MAX_FLIGHT_MINUTES),
  comment: z.string().default(''),
  // null means no date; coercion turns unparsable values into an invalid_date issue
  entry_date: z.preprocess(value => value ?? undefined, z.coerce.date().optional()),
  username: z.string().optional(),
});

export const findTunnelsSchema = z.object({
  search_term: z.string().default(''),
  country: z.string().default(''),
  list_countries: z.boolean().default(false),
});

export type LogFlightTimeInput = z.input<typeof logFlightTimeSchema>;
export type FindTunnelsInput = z.input<typeof findTunnelsSchema>;

/**
 * Message shown to the user after a directory lookup
 */
export interface Notification {
  title: string;
  message: string;
}

export interface LogFlightTimeResult {
  success: boolean;
  message: string;
  tunnelName: string;
}

export type AccountApi = Pick<TunnelflightApi, 'username' | 'getTunnels' | 'postFlightTime'>;
export type AccountCoordinator = Pick<TunnelflightCoordinator, 'refresh' | 'applyLoggedFlight'>;

interface RegisteredAccount {
  api: AccountApi;
  coordinator: AccountCoordinator;
}

/**
 * A service call that cannot be carried out
 */
export class ServiceCallError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'ServiceCallError';
  }
}

export interface LogbookServiceOptions {
  directory?: TunnelDirectory;
  now?: () => Date;
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, service: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    throw new ServiceCallError(`Invalid ${service} data: ${issues.join('; ')}`, parsed.error.flatten());
  }
  return parsed.data;
}

function location(tunnel: Tunnel): string {
  return `${tunnel.city}, ${tunnel.country}`.replace(/^[, ]+|[, ]+$/g, '');
}

export class LogbookService {
  private readonly accounts: Map<string, RegisteredAccount> = new Map();
  private readonly directory: TunnelDirectory;
  private readonly now: () => Date;

  constructor(private readonly logger: EnhancedLogger, options: LogbookServiceOptions = {}) {
    this.directory = options.directory ?? new TunnelDirectory(logger);
    this.now = options.now ?? (() => new Date());
  }

  public registerAccount(api: AccountApi, coordinator: AccountCoordinator): void {
    this.accounts.set(api.username, { api, coordinator });
    this.logger.debug(`Registered logbook services for ${api.username}`, LogContext.SERVICE);
  }

  public unregister(username: string): void {
    this.accounts.delete(username);
  }

  public get accountCount(): number {
    return this.accounts.size;
  }

  /**
   * Account whose username matches, else the first one registered
   */
  private selectAccount(username?: string): RegisteredAccount {
    const first = this.accounts.values().next();
    if (first.done) {
      this.logger.error('No Tunnelflight accounts available', LogContext.SERVICE);
      throw new ServiceCallError('No Tunnelflight accounts available');
    }

    if (username) {
      const wanted = normalizeUsername(username);
      for (const [name, account] of this.accounts) {
        if (normalizeUsername(name) === wanted) {
          return account;
        }
      }
      this.logger.warn(`No account matches ${username}, using ${first.value.api.username}`, LogContext.SERVICE);
    }

    return first.value;
  }

  /**
   * Add a flight-time entry to the member logbook
   */
  public async logFlightTime(input: LogFlightTimeInput): Promise<LogFlightTimeResult> {
    const call = parseInput(logFlightTimeSchema, input, 'log_flight_time');
    const { api, coordinator } = this.selectAccount(call.username);

    const entryDate = Math.floor((call.entry_date ?? this.now()).getTime() / 1000);
    const tunnelName = await this.directory.getTunnelName(call.tunnel_id, api);

    this.logger.debug(
      `Attempting to log ${call.time} minutes at ${tunnelName} with comment: ${call.comment}`,
      LogContext.SERVICE
    );

    const result = await api.postFlightTime({
      entry_id: '',
      status: 'open',
      entry_date: entryDate,
      tunnel: String(call.tunnel_id),
      tunnel_name: tunnelName,
      comment: call.comment,
      time: String(call.time),
    });

    if (result.success) {
      this.logger.info(`Successfully logged ${call.time} minutes at ${tunnelName}`, LogContext.SERVICE);
      coordinator.applyLoggedFlight(call.time, entryDate);
    } else {
      this.logger.error(`Failed to log time: ${result.message}`, LogContext.SERVICE);
    }

    return { ...result, tunnelName };
  }

  private async loadTunnels(): Promise<void> {
    const { api } = this.selectAccount();
    await this.directory.load(api);
    if (this.directory.size === 0) {
      this.logger.error('Failed to fetch tunnels list', LogContext.SERVICE);
      throw new ServiceCallError('Failed to fetch tunnels list');
    }
  }

  /**
   * Search the tunnel directory by name or city and by country
   */
  public async findTunnels(input: FindTunnelsInput = {}): Promise<Notification> {
    const call = parseInput(findTunnelsSchema, input, 'find_tunnels');
    if (call.list_countries) {
      return this.listCountries();
    }

    await this.loadTunnels();

    const searchTerm = call.search_term.toLowerCase();
    const country = call.country.toLowerCase();
    const matches = this.directory.search(searchTerm, country);

    if (matches.length === 0) {
      this.logger.info('No tunnels found matching criteria', LogContext.SERVICE);
      return {
        title: 'No matching tunnels found',
        message:
          'No tunnels found matching your search criteria.\n\n' +
          `Search term: ${searchTerm || 'None'}\nCountry: ${country || 'None'}\n\n` +
          'Tip: Use the List Countries switch to see all available countries.',
      };
    }

    let message = '## Matching Tunnels\n\n';
    message += '| ID | Name | Location | Size |\n';
    message += '|---|------|----------|------|\n';
    for (const tunnel of matches.slice(0, MAX_SEARCH_RESULTS)) {
      message += `| ${tunnel.id} | ${tunnel.title} | ${location(tunnel)} | ${tunnel.size} |\n`;
    }
    if (matches.length > MAX_SEARCH_RESULTS) {
      message += `\n_...and ${matches.length - MAX_SEARCH_RESULTS} more matches. ` +
        'Refine your search to see more specific results._';
    }

    this.logger.info(`Found ${matches.length} tunnels matching criteria`, LogContext.SERVICE);
    return { title: `Found ${matches.length} matching tunnels`, message };
  }

  /**
   * Countries that have at least one tunnel
   */
  public async listCountries(): Promise<Notification> {
    await this.loadTunnels();

    const countries = this.directory.countries();
    let message = '## Available Countries\n\n';
    for (const country of countries) {
      message += `- ${country}\n`;
    }

    this.logger.info(`Listed ${countries.length} countries with tunnels`, LogContext.SERVICE);
    return { title: `Found ${countries.length} countries with tunnels`, message };
  }

  /**
   * Refresh one account, or every account without a username
   */
  public async refreshData(username?: string): Promise<void> {
    let targets: RegisteredAccount[];
    if (username) {
      const wanted = normalizeUsername(username);
      targets = Array.from(this.accounts.entries())
        .filter(([name]) => normalizeUsername(name) === wanted)
        .map(([, account]) => account);
      if (targets.length === 0) {
        throw new ServiceCallError(`No Tunnelflight account configured for ${username}`);
      }
    } else {
      targets = Array.from(this.accounts.values());
    }

    this.logger.info(`Refreshing data for ${targets.length} account(s)`, LogContext.SERVICE);
    await Promise.all(targets.map(account => account.coordinator.refresh()));
  }
}
