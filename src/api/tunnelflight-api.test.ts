import { describe, it, expect, vi } from 'vitest';
import axios, { type AxiosHeaderValue } from 'axios';
import { TunnelflightApi } from './tunnelflight-api.js';
import { EnhancedLogger } from '../utils/logger.js';

interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
  cookie?: string;
  authorization?: string;
}

interface Reply {
  status: number;
  data?: unknown;
  setCookie?: string[];
}

type Route = Reply | ((request: RecordedRequest) => Reply);

const HOME: Reply = { status: 200, data: '<html></html>', setCookie: ['sid=abc; Path=/'] };
const LOGIN_OK: Reply = { status: 200, data: JSON.stringify({ token: 'test-token' }) };

function headerText(value: AxiosHeaderValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * In-process stand-in for the Tunnelflight website
 */
function fakeSite(routes: Record<string, Route>) {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    adapter: async config => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        cookie: headerText(config.headers.get('Cookie')),
        authorization: headerText(config.headers.get('Authorization')),
      };
      requests.push(request);

      const route = routes[`${request.method} ${request.url}`];
      const reply = typeof route === 'function' ? route(request) : route ?? { status: 404, data: 'Not found' };
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.setCookie ? { 'set-cookie': reply.setCookie } : {},
        config,
      };
    },
  });

  return { http, requests, paths: () => requests.map(request => `${request.method} ${request.url}`) };
}

function createApi(routes: Record<string, Route>, username = 'Bruce') {
  const site = fakeSite(routes);
  const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  const logger = new EnhancedLogger(sink, 'normal', false);
  const api = new TunnelflightApi(username, 'test-password', logger, { http: site.http, clearSessionDelayMs: 0 });
  return { api, site, sink };
}

describe('TunnelflightApi', () => {
  it('rejects empty credentials', () => {
    const logger = new EnhancedLogger({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }, 'normal', false);
    expect(() => new TunnelflightApi('  ', 'test-password', logger)).toThrow('Invalid Tunnelflight credentials provided');
  });

  describe('login', () => {
    it('logs in with the session cookie and keeps the token', async () => {
      const { api, site } = createApi({ 'GET /': HOME, 'POST /login': LOGIN_OK });

      await expect(api.login()).resolves.toBe(true);

      expect(api.isLoggedIn()).toBe(true);
      expect(api.getToken()).toBe('test-token');
      expect(site.paths()).toEqual(['GET /', 'POST /login']);
      expect(site.requests[1].cookie).toBe('sid=abc');
      expect(site.requests[1].body).toEqual({
        username: 'bruce',
        password: 'test-password',
        passcode: '',
        enable2fa: false,
        checkTwoFactor: true,
        passcodeOption: 'email',
      });
      expect(api.getStats()).toMatchObject({ totalRequests: 2, successfulRequests: 2, failedRequests: 0 });
    });

    it('accepts a success message without a token', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': { status: 200, data: JSON.stringify({ message: 'Login Success' }) },
      });

      await expect(api.login()).resolves.toBe(true);
      expect(api.getToken()).toBeNull();
    });

    it('fails on a JSON error message', async () => {
      const { api, sink } = createApi({
        'GET /': HOME,
        'POST /login': { status: 200, data: JSON.stringify({ message: 'Invalid password' }) },
      });

      await expect(api.login()).resolves.toBe(false);
      expect(sink.error).toHaveBeenCalledWith('[API] Login JSON indicates failure for bruce: Invalid password');
    });

    it('checks plain text responses for success', async () => {
      const ok = createApi({ 'GET /': HOME, 'POST /login': { status: 200, data: 'Login success' } });
      const denied = createApi({ 'GET /': HOME, 'POST /login': { status: 200, data: '<html>Sign in</html>' } });

      await expect(ok.api.login()).resolves.toBe(true);
      await expect(denied.api.login()).resolves.toBe(false);
    });

    it('fails on an error status', async () => {
      const { api } = createApi({ 'GET /': HOME, 'POST /login': { status: 500, data: 'oops' } });

      await expect(api.login()).resolves.toBe(false);
      expect(api.isLoggedIn()).toBe(false);
    });

    it('clears the session and retries once after a conflict', async () => {
      let attempts = 0;
      const { api, site } = createApi({
        'GET /': HOME,
        'GET /logout': { status: 200 },
        'POST /login': () => {
          attempts++;
          return attempts === 1 ? { status: 409, data: 'Conflict' } : LOGIN_OK;
        },
      });

      await expect(api.login()).resolves.toBe(true);
      expect(site.paths()).toEqual(['GET /', 'POST /login', 'GET /logout', 'GET /', 'GET /', 'POST /login']);
    });

    it('gives up after a second conflict', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'GET /logout': { status: 200 },
        'POST /login': { status: 409, data: 'Conflict' },
      });

      await expect(api.login()).resolves.toBe(false);
    });
  });

  describe('fetching', () => {
    it('sends the bearer token and re-logs in once after a 401', async () => {
      let cardRequests = 0;
      const { api, site } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-card/': () => {
          cardRequests++;
          return cardRequests === 1 ? { status: 401 } : { status: 200, data: { member_id: '1,234' } };
        },
      });

      await expect(api.getFlyerCard()).resolves.toEqual({ member_id: '1,234' });
      expect(site.paths()).toEqual([
        'GET /', 'POST /login', 'GET /user/module-type/flyer-card/',
        'GET /', 'POST /login', 'GET /user/module-type/flyer-card/',
      ]);
      expect(site.requests[5].authorization).toBe('Bearer test-token');

      await expect(api.getMemberId()).resolves.toBe('1234');
      expect(site.requests).toHaveLength(6);
    });

    it('stops after one re-login when the 401 persists', async () => {
      const { api, site } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-card/': { status: 401 },
      });

      await expect(api.getFlyerCard()).resolves.toBeNull();
      expect(site.paths()).toEqual([
        'GET /', 'POST /login', 'GET /user/module-type/flyer-card/',
        'GET /', 'POST /login', 'GET /user/module-type/flyer-card/',
      ]);
    });

    it('re-logs in once after a 403', async () => {
      let cardRequests = 0;
      const { api, site } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-card/': () => {
          cardRequests++;
          return cardRequests === 1 ? { status: 403 } : { status: 200, data: { member_id: '42' } };
        },
      });

      await expect(api.getFlyerCard()).resolves.toEqual({ member_id: '42' });
      expect(site.paths().filter(path => path === 'POST /login')).toHaveLength(2);
      expect(site.requests).toHaveLength(6);
    });

    it('returns null for a body that is not JSON', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-charts/': { status: 200, data: '<html>maintenance</html>' },
      });

      await expect(api.getFlyerCharts()).resolves.toBeNull();
    });

    it('extracts the user info embedded in the dashboard', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /account/dashboard': {
          status: 200,
          data: '<html><script id="userInfoObj" type="application/json">{"real_name":"Bruce Test"}</script></html>',
        },
      });

      await expect(api.getDashboardData()).resolves.toEqual({ real_name: 'Bruce Test' });
    });

    it('returns null when the dashboard has no user info', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /account/dashboard': { status: 200, data: '<html></html>' },
      });

      await expect(api.getDashboardData()).resolves.toBeNull();
    });

    it('combines every endpoint into user data', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-card/': {
          status: 200,
          data: {
            member_id: '1,234',
            screen_name: 'bruce',
            role_name: 'Flyer',
            total_flight_time: '10:15',
            paymentData: { paymentStatus: 'Active', nextDate: 1700000000 },
          },
        },
        'GET /user/module-type/flyer-charts/': { status: 200, data: { tunnel_name: 'Test Tunnel' } },
        'GET /account/dashboard': {
          status: 200,
          data: '<script id="userInfoObj" type="application/json">{"real_name":"Bruce Test"}</script>',
        },
        'GET /account/dashboard/flyer-skills-levels/1234': { status: 201, data: { level1: 'Yes', static: 'Level 2' } },
        'GET /account/logbook/member/skills/open-suspended/1234': {
          status: 200,
          data: [{ cat_name: 'Static', skill_name: 'Sit', status: 'open' }],
        },
      });

      const data = await api.getUserData();

      expect(data?.memberId).toBe('1234');
      expect(data?.realName).toBe('Bruce Test');
      expect(data?.tunnelName).toBe('Test Tunnel');
      expect(data?.paymentExpiryDate).toBe('2023-11-14');
      expect(data?.totalFlightTimeHours).toBe(10);
      expect(data?.skills.static.level).toBe(2);
      expect(data?.skills.dynamic.level).toBe(1);
      expect(data?.skillsByCategory.Static).toHaveLength(1);
    });

    it('returns null user data without a flyer card', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /user/module-type/flyer-card/': { status: 500 },
      });

      await expect(api.getUserData()).resolves.toBeNull();
    });
  });

  describe('tunnels', () => {
    it('maps directory records and skips those without an id', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /account/logbook/tunnels/': {
          status: 200,
          data: [
            { entry_id: '12', title: 'Alpha Tunnel', country: 'Norway', address_city: 'Oslo', size: '14ft' },
            { entry_id: '0', title: 'No id' },
            'junk',
          ],
        },
      });

      await expect(api.getTunnels()).resolves.toEqual([{
        id: 12,
        title: 'Alpha Tunnel',
        country: 'Norway',
        size: '14ft',
        manufacturer: 'Unknown',
        address: '',
        city: 'Oslo',
        status: 'Unknown',
      }]);
    });

    it('returns an empty list for an unexpected body', async () => {
      const { api } = createApi({
        'GET /': HOME,
        'POST /login': LOGIN_OK,
        'GET /account/logbook/tunnels/': { status: 200, data: { error: 'nope' } },
      });

      await expect(api.getTunnels()).resolves.toEqual([]);
    });
  });

  describe('postFlightTime', () => {
    const entry = {
      entry_id: '',
      status: 'open' as const,
      entry_date: 1700000000,
      tunnel: '12',
      tunnel_name: 'Alpha Tunnel',
      comment: 'Test flight',
      time: '15',
    };

    function postWith(reply: Reply) {
      return createApi({ 'GET /': HOME, 'POST /login': LOGIN_OK, 'POST /account/logbook/member/time/': reply });
    }

    it('posts the entry and accepts an Ok message', async () => {
      const { api, site } = postWith({ status: 201, data: JSON.stringify({ message: 'Ok' }) });

      await expect(api.postFlightTime(entry)).resolves.toEqual({ success: true, message: 'Ok' });
      expect(site.requests[2].body).toEqual(entry);
    });

    it('sends the bearer token with the entry', async () => {
      const { api, site } = postWith({ status: 200, data: JSON.stringify({ message: 'Ok' }) });

      await api.postFlightTime(entry);

      expect(site.paths()[2]).toBe('POST /account/logbook/member/time/');
      expect(site.requests[2].authorization).toBe('Bearer test-token');
    });

    it('reports a JSON error message', async () => {
      const { api } = postWith({ status: 200, data: JSON.stringify({ message: 'Invalid tunnel' }) });

      await expect(api.postFlightTime(entry)).resolves.toEqual({ success: false, message: 'Invalid tunnel' });
    });

    it('assumes success from plain text mentioning ok', async () => {
      const { api } = postWith({ status: 200, data: 'Entry saved ok' });

      await expect(api.postFlightTime(entry)).resolves.toEqual({ success: true, message: 'Entry saved ok' });
    });

    it('fails on an error status', async () => {
      const { api } = postWith({ status: 500, data: 'oops' });

      await expect(api.postFlightTime(entry)).resolves.toEqual({ success: false, message: 'HTTP status 500' });
    });

    it('fails when login fails', async () => {
      const { api } = createApi({ 'GET /': HOME, 'POST /login': { status: 403 } });

      await expect(api.postFlightTime(entry)).resolves.toEqual({ success: false, message: 'Login failed' });
    });
  });
});
