/**
 * Display entities for an account.
 * Each entity is one value a user sees (payment status, currency, total
 * flight time, skill levels...) with its state and extra attributes.
 */
import type { SkillLevel, SkillName, SkillRecord, UserData } from './api/types.js';
import {
  daysUntil,
  formatCurrencyStatus,
  formatDate,
  formatFlightTime,
  formatTimestamp,
  parseFlightTime
} from './utils/format.js';

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type EntityKind = 'sensor' | 'binary_sensor';

export interface DisplayEntity {
  key: string;
  uniqueId: string;
  name: string;
  kind: EntityKind;
  icon: string;
  state: string | number | boolean | null;
  attributes: Record<string, AttributeValue>;
  enabledByDefault: boolean;
  available: boolean;
}

export interface EntityContext {
  accountName: string;
  username: string;
  available: boolean;
  now?: Date;
}

export const SKILL_ENTITY_KEYS = ['static_level', 'dynamic_level', 'formation_level'] as const;
export type SkillEntityKey = typeof SKILL_ENTITY_KEYS[number];

const SKILL_ENTITIES: Record<SkillEntityKey, { skill: SkillName; label: string; icon: string }> = {
  static_level: { skill: 'static', label: 'Static Level', icon: 'mdi:alpha-s-circle' },
  dynamic_level: { skill: 'dynamic', label: 'Dynamic Level', icon: 'mdi:alpha-d-circle' },
  formation_level: { skill: 'formation', label: 'Formation Level', icon: 'mdi:alpha-f-circle' },
};

/**
 * Check a value restored from the accessory cache
 */
export function isDisplayEntity(value: unknown): value is DisplayEntity {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const entity: Record<string, unknown> = { ...value };
  const state = entity.state;
  return typeof entity.key === 'string' &&
    typeof entity.uniqueId === 'string' &&
    typeof entity.name === 'string' &&
    (entity.kind === 'sensor' || entity.kind === 'binary_sensor') &&
    typeof entity.icon === 'string' &&
    typeof entity.enabledByDefault === 'boolean' &&
    typeof entity.available === 'boolean' &&
    typeof entity.attributes === 'object' && entity.attributes !== null &&
    (state === null || typeof state === 'string' || typeof state === 'number' || typeof state === 'boolean');
}

function uniqueId(username: string, key?: string): string {
  return key ? `tunnelflight_${username}_${key}` : `tunnelflight_${username}`;
}

function expiryAttributes(expiryDate: string | undefined, now: Date): Record<string, AttributeValue> {
  if (!expiryDate) {
    return {};
  }
  const attributes: Record<string, AttributeValue> = { expiry_date: expiryDate };
  const days = daysUntil(expiryDate, now);
  if (days !== null) {
    attributes.days_remaining = days;
  }
  return attributes;
}

/**
 * Whether the membership payment is active
 */
export function isPaymentActive(data: UserData): boolean {
  return (data.paymentStatus ?? '').toLowerCase() === 'active';
}

/**
 * Whether the flyer currency is current
 */
export function isFlyerCurrent(data: UserData): boolean {
  if (data.currencyFlyer !== undefined) {
    return data.currencyFlyer === 1;
  }
  if (data.flyerCurrencyStatus) {
    return data.flyerCurrencyStatus.toLowerCase() === 'active';
  }
  return false;
}

/**
 * Total logged flight time in minutes
 */
export function totalFlightMinutes(data: UserData): number {
  if (data.totalFlightTime) {
    const parsed = parseFlightTime(data.totalFlightTime);
    if (parsed) {
      return parsed.hours * 60 + parsed.minutes;
    }
  }
  return (data.totalFlightTimeHours ?? 0) * 60 + (data.totalFlightTimeMinutes ?? 0);
}

function accountAttributes(data: UserData): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {};

  if (data.memberId !== undefined) {
    attributes.member_id = data.memberId;
  }
  if (data.roleName !== undefined) {
    attributes.role_name = data.roleName;
  }
  if ('currency_flyer' in data.raw) {
    attributes.currency_flyer = formatCurrencyStatus(data.currencyFlyer);
  }
  if (data.screenName !== undefined) {
    attributes.username = data.screenName;
  }
  if (data.email !== undefined) {
    attributes.email = data.email;
  }
  if (data.realName) {
    attributes.real_name = data.realName;
  }
  if (data.tunnelName !== undefined) {
    attributes.tunnel = data.tunnelName;
  }
  if (data.country) {
    attributes.country = data.country;
  }
  if (data.joinDate !== undefined) {
    attributes.join_date = formatTimestamp(data.joinDate);
  }
  if (data.lastFlight !== undefined) {
    attributes.last_flight = formatTimestamp(data.lastFlight);
  }

  // Instructor and coach currency only apply beyond the Flyer role
  if (data.roleName !== 'Flyer') {
    if ('currency_instructor' in data.raw) {
      attributes.currency_instructor = formatCurrencyStatus(data.currencyInstructor);
    }
    if ('currency_coach' in data.raw) {
      attributes.currency_coach = formatCurrencyStatus(data.currencyCoach);
    }
  }

  return attributes;
}

function skillAttributes(skill: SkillLevel, data: UserData): Record<string, AttributeValue> {
  return {
    status: skill.pending ? 'pending' : skill.status,
    raw_value: skill.rawValue,
    pending: skill.pending,
    level1: data.skills.level1,
    level1_pending: data.skills.level1Pending,
  };
}

function categoryKey(category: string): string {
  return `skills_${category.toLowerCase().replace(/ /g, '_')}`;
}

function categoryEntity(
  category: string,
  skills: SkillRecord[],
  context: EntityContext
): DisplayEntity {
  const key = categoryKey(category);
  // The logbook reports signed-off skills with the status "open"
  const completed = skills.filter(skill => skill.status === 'open').length;

  return {
    key,
    uniqueId: uniqueId(context.username, key),
    name: `${context.accountName} ${category} Skills`,
    kind: 'sensor',
    icon: 'mdi:certificate',
    state: `${completed}/${skills.length}`,
    attributes: {
      category,
      skills_count: skills.length,
      skills: skills.map(skill => ({
        name: skill.name,
        status: skill.status,
        completion_date: skill.approvalDate ? formatDate(skill.approvalDate) : null,
        instructor: skill.instructor ?? '',
      })),
    },
    enabledByDefault: false,
    available: context.available,
  };
}

/**
 * Build every display entity for one account
 */
export function buildAccountEntities(data: UserData, context: EntityContext): DisplayEntity[] {
  const now = context.now ?? new Date();
  const { accountName, username, available } = context;

  const entity = (
    key: string | undefined,
    name: string,
    kind: EntityKind,
    icon: string,
    state: DisplayEntity['state'],
    attributes: Record<string, AttributeValue>
  ): DisplayEntity => ({
    key: key ?? 'account',
    uniqueId: uniqueId(username, key),
    name,
    kind,
    icon,
    state,
    attributes,
    enabledByDefault: true,
    available,
  });

  const minutes = totalFlightMinutes(data);
  const hasFlightTime = data.totalFlightTime !== undefined ||
    (data.totalFlightTimeHours !== undefined && data.totalFlightTimeMinutes !== undefined);
  // Text the site sends in another shape is shown as it came
  const flightTimeText = data.totalFlightTime && !parseFlightTime(data.totalFlightTime)
    ? data.totalFlightTime
    : formatFlightTime(hasFlightTime ? minutes : 0);

  const entities: DisplayEntity[] = [
    entity(undefined, accountName, 'sensor', 'mdi:parachute', data.paymentStatus ?? 'Unknown', accountAttributes(data)),
    entity(
      'payment_status',
      `${accountName} Payment Status`,
      'binary_sensor',
      'mdi:credit-card',
      isPaymentActive(data),
      expiryAttributes(data.paymentExpiryDate, now)
    ),
    entity(
      'currency_flyer',
      `${accountName} Flyer Currency`,
      'binary_sensor',
      'mdi:parachute-outline',
      isFlyerCurrent(data),
      expiryAttributes(data.currencyRenewalDate, now)
    ),
    entity(
      'total_flight_time',
      `${accountName} Total Flight Time`,
      'sensor',
      'mdi:clock-outline',
      `${flightTimeText} hours`,
      { hours_decimal: Math.round((minutes / 60) * 100) / 100, total_minutes: minutes }
    ),
    entity(
      'last_flight',
      `${accountName} Last Flight`,
      'sensor',
      'mdi:calendar',
      formatTimestamp(data.lastFlight),
      {}
    ),
  ];

  for (const key of SKILL_ENTITY_KEYS) {
    const { skill, label, icon } = SKILL_ENTITIES[key];
    const level = data.skills[skill];
    entities.push(entity(key, `${accountName} ${label}`, 'sensor', icon, String(level.level), skillAttributes(level, data)));
  }

  for (const [category, skills] of Object.entries(data.skillsByCategory)) {
    if (skills.length > 0) {
      entities.push(categoryEntity(category, skills, context));
    }
  }

  return entities;
}
