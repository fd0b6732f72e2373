/**
 * Platform configuration from config.json
 */
import { z } from 'zod';
import {
  DEFAULT_ACCOUNT_NAME,
  DEFAULT_POLLING_INTERVAL,
  MAX_FLIGHT_MINUTES,
  MAX_POLLING_INTERVAL,
  MIN_FLIGHT_MINUTES,
  MIN_POLLING_INTERVAL
} from './settings.js';
import { type EnhancedLogger, LogContext, type LogLevelString, resolveLogLevel } from './utils/logger.js';

const accountSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  name: z.string().trim().min(1).optional(),
});

const quickLogSchema = z.object({
  name: z.string().trim().min(1),
  tunnelId: z.coerce.number().int().positive(),
  minutes: z.coerce.number().int().min(MIN_FLIGHT_MINUTES).max(MAX_FLIGHT_MINUTES),
  comment: z.string().optional(),
  username: z.string().optional(),
});

const tunnelSearchSchema = z.object({
  name: z.string().trim().min(1),
  searchTerm: z.string().optional(),
  country: z.string().optional(),
});

export type AccountConfig = Required<z.output<typeof accountSchema>>;
export type QuickLogConfig = z.output<typeof quickLogSchema>;
export type TunnelSearchConfig = z.output<typeof tunnelSearchSchema>;

export interface PluginSettings {
  accounts: AccountConfig[];
  /** Seconds between account refreshes */
  pollingInterval: number;
  logLevel: LogLevelString;
  quickLogs: QuickLogConfig[];
  tunnelSearches: TunnelSearchConfig[];
  exposeSkillSensors: boolean;
}

/**
 * Clamp the polling interval to the supported range
 */
export function resolvePollingInterval(value: unknown): number {
  return Math.max(MIN_POLLING_INTERVAL, Math.min(MAX_POLLING_INTERVAL,
    parseInt(String(value)) || DEFAULT_POLLING_INTERVAL));
}

/**
 * Validate each entry of a config array, logging and skipping bad ones
 */
function parseEntries<T extends z.ZodTypeAny>(
  value: unknown,
  schema: T,
  label: string,
  log: EnhancedLogger
): z.output<T>[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    log.warn(`Ignoring ${label}: expected a list`, LogContext.PLATFORM);
    return [];
  }

  const entries: z.output<T>[] = [];
  value.forEach((entry: unknown, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      entries.push(parsed.data);
    } else {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      log.warn(`Skipping ${label} entry ${index + 1}: ${issues}`, LogContext.PLATFORM);
    }
  });
  return entries;
}

/**
 * Parse the platform block, accepting the legacy single-account form
 */
export function parsePlatformConfig(config: Record<string, unknown>, log: EnhancedLogger): PluginSettings {
  const rawAccounts: unknown[] = Array.isArray(config.accounts) ? [...config.accounts] : [];
  if (config.username !== undefined || config.password !== undefined) {
    rawAccounts.push({ username: config.username, password: config.password });
  }

  const accounts: AccountConfig[] = [];
  const seen = new Set<string>();
  for (const account of parseEntries(rawAccounts, accountSchema, 'account', log)) {
    const key = account.username.toLowerCase();
    if (seen.has(key)) {
      log.warn(`Account ${account.username} is configured more than once, using the first entry`, LogContext.PLATFORM);
      continue;
    }
    seen.add(key);
    accounts.push({ ...account, name: account.name ?? DEFAULT_ACCOUNT_NAME });
  }

  return {
    accounts,
    pollingInterval: resolvePollingInterval(config.pollingInterval),
    logLevel: resolveLogLevel(config.logLevel, config.debugMode),
    quickLogs: parseEntries(config.quickLogs, quickLogSchema, 'quick log', log),
    tunnelSearches: parseEntries(config.tunnelSearches, tunnelSearchSchema, 'tunnel search', log),
    exposeSkillSensors: config.exposeSkillSensors !== false,
  };
}
