/**
 * Maps the Tunnelflight responses (flyer card, flyer charts, dashboard
 * user info, skills levels and logbook entries) onto a single UserData.
 */
import { type EnhancedLogger, LogContext } from '../utils/logger.js';
import { formatDate, isoToUnixSeconds, parseFlightTime, usernamesLikelyMatch } from '../utils/format.js';
import {
  isRecord,
  type JsonRecord,
  type SkillLevel,
  type SkillName,
  type SkillRecord,
  type SkillsSummary,
  type SkillStatus,
  type UserData,
  type UserDataSources
} from './types.js';

const SKILL_NAMES: SkillName[] = ['static', 'dynamic', 'formation'];

function readString(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function readNumber(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function firstString(record: JsonRecord, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = readString(record, key);
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Add keys from `extra` that `base` lacks or holds as null
 */
export function mergeMissing(base: JsonRecord, extra: JsonRecord | null | undefined): JsonRecord {
  if (!extra) {
    return base;
  }
  for (const [key, value] of Object.entries(extra)) {
    if (!(key in base) || base[key] === null) {
      base[key] = value;
    }
  }
  return base;
}

/**
 * Convert a raw skill value to a numeric level.
 * "Yes" is level 1, "Level N" is N, anything else is 0.
 */
export function parseSkillLevel(raw: string, logger?: EnhancedLogger, skill?: string): number {
  if (raw === 'Yes') {
    return 1;
  }
  if (raw.toLowerCase().startsWith('level')) {
    const level = Number.parseInt(raw.split(' ')[1] ?? '', 10);
    if (Number.isNaN(level)) {
      logger?.error(`Error parsing ${skill ?? 'skill'} level '${raw}'`, LogContext.API);
      return 0;
    }
    return level;
  }
  return 0;
}

export function skillStatus(level: number, pending: boolean): SkillStatus {
  if (pending) {
    return 'Pending';
  }
  return level > 0 ? 'Passed' : 'Not Passed';
}

function emptySkill(): SkillLevel {
  return { level: 0, rawValue: 'No', pending: false, status: 'Not Passed' };
}

/**
 * Build the skills summary from the flyer-skills-levels response
 */
export function buildSkills(skillsData: JsonRecord | null | undefined, logger?: EnhancedLogger): SkillsSummary {
  if (!skillsData) {
    return {
      level1: 'No',
      level1Pending: false,
      static: emptySkill(),
      dynamic: emptySkill(),
      formation: emptySkill(),
    };
  }

  const level1 = readString(skillsData, 'level1') ?? 'No';
  const summary: SkillsSummary = {
    level1,
    level1Pending: Boolean(skillsData.level1Pending),
    static: emptySkill(),
    dynamic: emptySkill(),
    formation: emptySkill(),
  };

  for (const name of SKILL_NAMES) {
    const rawValue = readString(skillsData, name) ?? 'No';
    let level = parseSkillLevel(rawValue, logger, name);

    // Level 1 is a prerequisite for every discipline
    if (level1 === 'Yes' && level === 0) {
      level = 1;
    }

    const pending = Boolean(skillsData[`${name}Pending`]);
    summary[name] = { level, rawValue, pending, status: skillStatus(level, pending) };
  }

  return summary;
}

/**
 * Group logbook entries by category name
 */
export function groupSkillsByCategory(entries: JsonRecord[]): Record<string, SkillRecord[]> {
  const byCategory: Record<string, SkillRecord[]> = {};

  for (const entry of entries) {
    const category = readString(entry, 'cat_name') ?? 'Unknown';
    const id = entry.id;

    (byCategory[category] ??= []).push({
      id: typeof id === 'string' || typeof id === 'number' ? id : null,
      name: readString(entry, 'skill_name') ?? 'Unknown',
      status: readString(entry, 'status') ?? 'Unknown',
      entryDate: readNumber(entry, 'entry_date') ?? null,
      approvalDate: readNumber(entry, 'approval_date') ?? null,
      instructor: readString(entry, 'instructor_name') ?? null,
    });
  }

  return byCategory;
}

/**
 * Combine every endpoint's response into UserData for one account
 */
export function buildUserData(
  sources: UserDataSources,
  expectedUsername: string,
  logger?: EnhancedLogger
): UserData {
  const raw: JsonRecord = { ...sources.flyerCard };
  mergeMissing(raw, sources.flyerCharts);
  mergeMissing(raw, sources.dashboard);

  const data: UserData = {
    skills: buildSkills(sources.skillsLevels, logger),
    skillsByCategory: {},
    logbookEntries: [],
    raw,
  };

  const memberId = readString(raw, 'member_id');
  if (memberId !== undefined) {
    data.memberId = memberId.replace(/,/g, '');
  }
  data.roleName = readString(raw, 'role_name');
  data.screenName = readString(raw, 'screen_name');
  data.email = readString(raw, 'email');
  data.realName = firstString(raw, ['real_name', 'name', 'user_real_name']);
  data.tunnelName = readString(raw, 'tunnel_name');
  data.country = firstString(raw, ['tunnel_country', 'country']);

  const joinDate = raw.join_date;
  if (typeof joinDate === 'string' || typeof joinDate === 'number') {
    data.joinDate = joinDate;
  }

  data.currencyFlyer = readNumber(raw, 'currency_flyer');
  data.currencyInstructor = readNumber(raw, 'currency_instructor');
  data.currencyCoach = readNumber(raw, 'currency_coach');
  data.flyerCurrencyStatus = readString(raw, 'flyer_currency_status');

  const paymentData: JsonRecord = isRecord(raw.paymentData) ? raw.paymentData : {};
  data.paymentStatus = readString(paymentData, 'paymentStatus') || undefined;

  const nextDate = readNumber(paymentData, 'nextDate');
  if (nextDate) {
    const formatted = formatDate(nextDate);
    if (formatted) {
      data.paymentExpiryDate = formatted;
    } else {
      logger?.error(`Error parsing payment expiry date: ${nextDate}`, LogContext.API);
    }
  }

  const renewal = readNumber(raw, 'currency_renewal_date_flyer');
  if (renewal) {
    const formatted = formatDate(renewal);
    if (formatted) {
      data.currencyRenewalDate = formatted;
    } else {
      logger?.error(`Error parsing currency renewal date: ${renewal}`, LogContext.API);
    }
  }

  const flightTime = readString(raw, 'total_flight_time');
  if (flightTime) {
    data.totalFlightTime = flightTime;
    const parsed = parseFlightTime(flightTime);
    if (parsed) {
      data.totalFlightTimeHours = parsed.hours;
      data.totalFlightTimeMinutes = parsed.minutes;
    } else {
      logger?.error(`Error parsing flight time: ${flightTime}`, LogContext.API);
    }
  }

  const lastFlight = raw.last_flight;
  if (typeof lastFlight === 'string' && lastFlight.includes('T')) {
    const seconds = isoToUnixSeconds(lastFlight);
    if (seconds === null) {
      logger?.error(`Error parsing last flight date: ${lastFlight}`, LogContext.API);
      data.lastFlight = lastFlight;
    } else {
      data.lastFlight = seconds;
    }
  } else if (typeof lastFlight === 'number' || (typeof lastFlight === 'string' && lastFlight !== '')) {
    data.lastFlight = lastFlight;
  }

  if (data.screenName && !usernamesLikelyMatch(data.screenName, expectedUsername)) {
    logger?.warn(
      `Data mismatch! Fetched data for ${data.screenName} but expected ${expectedUsername}`,
      LogContext.API
    );
  }

  if (sources.logbookEntries && sources.logbookEntries.length > 0) {
    data.logbookEntries = sources.logbookEntries;
    data.skillsByCategory = groupSkillsByCategory(sources.logbookEntries);
  }

  return data;
}
