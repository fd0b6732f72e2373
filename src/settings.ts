/**
 * Plugin settings and constants
 */

/**
 * Platform name used to register the plugin in Homebridge
 */
export const PLATFORM_NAME = 'Tunnelflight';

/**
 * Plugin identifier - must match package.json name property
 */
export const PLUGIN_NAME = 'homebridge-tunnelflight';

/**
 * Tunnelflight website base URL
 */
export const BASE_URL = 'https://www.tunnelflight.com';

/**
 * Endpoint paths, relative to BASE_URL
 */
export const ENDPOINTS = {
  home: '/',
  login: '/login',
  logout: '/logout',
  dashboard: '/account/dashboard',
  flyerCard: '/user/module-type/flyer-card/',
  flyerCharts: '/user/module-type/flyer-charts/',
  skillsLevels: '/account/dashboard/flyer-skills-levels/',
  logbookSkills: '/account/logbook/member/skills/open-suspended/',
  tunnels: '/account/logbook/tunnels/',
  logTime: '/account/logbook/member/time/',
} as const;

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

/**
 * Headers for page navigation (main page, dashboard, logout)
 */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': USER_AGENT,
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Upgrade-Insecure-Requests': '1',
  'Sec-Fetch-Site': 'same-origin',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-User': '?1',
  'Sec-Fetch-Dest': 'document',
  'Cache-Control': 'no-cache',
  'Pragma': 'no-cache',
};

/**
 * Headers for the JSON endpoints the site calls over XHR
 */
export const AJAX_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': USER_AGENT,
  'Accept': 'application/json, text/javascript, */*; q=0.01',
  'Accept-Language': 'en-US,en;q=0.9',
  'Content-Type': 'application/json',
  'X-Requested-With': 'XMLHttpRequest',
  'Origin': BASE_URL,
  'Referer': `${BASE_URL}/`,
  'Sec-Fetch-Site': 'same-origin',
  'Sec-Fetch-Mode': 'cors',
  'Sec-Fetch-Dest': 'empty',
  'Cache-Control': 'no-cache',
  'Pragma': 'no-cache',
};

/**
 * Request timeout in milliseconds
 */
export const REQUEST_TIMEOUT_MS = 30000;

/**
 * Pause after logging out to clear a conflicting session (HTTP 409 on login)
 */
export const CLEAR_SESSION_DELAY_MS = 2000;

/**
 * Default polling interval in seconds (6 hours)
 */
export const DEFAULT_POLLING_INTERVAL = 21600;

/**
 * Polling interval bounds in seconds
 */
export const MIN_POLLING_INTERVAL = 300;
export const MAX_POLLING_INTERVAL = 86400;

/**
 * Allowed flight time per logbook entry, in minutes
 */
export const MIN_FLIGHT_MINUTES = 1;
export const MAX_FLIGHT_MINUTES = 120;

/**
 * Maximum number of rows in a tunnel search notification
 */
export const MAX_SEARCH_RESULTS = 20;

/**
 * How long a momentary switch stays on before resetting
 */
export const SWITCH_RESET_MS = 1000;

export const DEFAULT_ACCOUNT_NAME = 'IBA Tunnelflight';
export const MANUFACTURER = 'International Bodyflight Association';
export const MODEL = 'Tunnelflight Account';
