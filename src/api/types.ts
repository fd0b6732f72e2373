/**
 * Type definitions for the Tunnelflight API
 */

/**
 * A JSON object as returned by the site, before any mapping
 */
export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Raw responses gathered for one account refresh
 */
export interface UserDataSources {
  flyerCard: JsonRecord;
  flyerCharts?: JsonRecord | null;
  dashboard?: JsonRecord | null;
  skillsLevels?: JsonRecord | null;
  logbookEntries?: JsonRecord[] | null;
}

export type SkillName = 'static' | 'dynamic' | 'formation';

export type SkillStatus = 'Passed' | 'Pending' | 'Not Passed';

/**
 * Level reached in one flying discipline
 */
export interface SkillLevel {
  level: number;
  rawValue: string;      // "Yes", "No" or "Level N" as sent by the site
  pending: boolean;
  status: SkillStatus;
}

export interface SkillsSummary {
  level1: string;
  level1Pending: boolean;
  static: SkillLevel;
  dynamic: SkillLevel;
  formation: SkillLevel;
}

/**
 * A skill signed off (or awaiting sign-off) in the member logbook
 */
export interface SkillRecord {
  id: string | number | null;
  name: string;
  status: string;
  entryDate: number | null;
  approvalDate: number | null;
  instructor: string | null;
}

/**
 * Account data after merging and normalising every endpoint
 */
export interface UserData {
  memberId?: string;
  roleName?: string;
  screenName?: string;
  email?: string;
  realName?: string;
  tunnelName?: string;
  country?: string;
  joinDate?: string | number;

  paymentStatus?: string;
  paymentExpiryDate?: string;

  currencyFlyer?: number;
  currencyInstructor?: number;
  currencyCoach?: number;
  flyerCurrencyStatus?: string;
  currencyRenewalDate?: string;

  totalFlightTime?: string;
  totalFlightTimeHours?: number;
  totalFlightTimeMinutes?: number;

  /** UNIX seconds, or the site's value when it could not be parsed */
  lastFlight?: number | string;

  skills: SkillsSummary;
  skillsByCategory: Record<string, SkillRecord[]>;
  logbookEntries: JsonRecord[];

  /** Merged raw payload, for debugging */
  raw: JsonRecord;
}

/**
 * A wind tunnel from the logbook tunnel directory
 */
export interface Tunnel {
  id: number;
  title: string;
  country: string;
  size: string;
  manufacturer: string;
  address: string;
  city: string;
  status: string;
}

/**
 * Body of a new flight-time logbook entry
 */
export interface FlightTimeEntry {
  entry_id: string;
  status: 'open';
  entry_date: number;
  tunnel: string;
  tunnel_name: string;
  comment: string;
  time: string;
}

export interface PostResult {
  success: boolean;
  message: string;
}

/**
 * API request statistics for monitoring
 */
export interface ApiStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  lastRequest: Date | null;
  lastError: Error | null;
  averageResponseTime: number;
}
