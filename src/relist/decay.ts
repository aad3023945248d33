/**
 * Price decay and cadence arithmetic for auto-relist rules.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export type DecayType = 'fixed' | 'percentage';

export const CADENCE_VALUES = [
  'daily',
  'every_3_days',
  'weekly',
  'every_10_days',
  'biweekly',
  'every_20_days',
  'monthly',
  'custom',
] as const;

export type Cadence = (typeof CADENCE_VALUES)[number];

export const CADENCE_DAYS: Record<Exclude<Cadence, 'custom'>, number> = {
  daily: 1,
  every_3_days: 3,
  weekly: 7,
  every_10_days: 10,
  biweekly: 14,
  every_20_days: 20,
  monthly: 30,
};

const DEFAULT_CUSTOM_DAYS = 7;

export interface DecayPolicy {
  decayType: DecayType | null;
  /** Amount for fixed decay; whole percent (10 = 10%) for percentage decay. */
  decayValue: number | null;
  floorPrice: number | null;
}

export function roundCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Next price under the policy, rounded to cents and never below the floor.
 * Without a decay the price is unchanged.
 */
export function decayPrice(current: number, policy: DecayPolicy): number {
  const { decayType, decayValue, floorPrice } = policy;
  if (decayType === null || decayValue === null || decayValue <= 0) return current;

  const raw = decayType === 'fixed' ? current - decayValue : current * (1 - decayValue / 100);
  const price = roundCents(Math.max(0, raw));
  return floorPrice !== null && price < floorPrice ? floorPrice : price;
}

export function cadenceIntervalMs(cadence: Cadence, customIntervalDays: number | null): number {
  const days = cadence === 'custom' ? customIntervalDays ?? DEFAULT_CUSTOM_DAYS : CADENCE_DAYS[cadence];
  return Math.max(1, days) * DAY_MS;
}

/** One interval past the later of `now` and the previous scheduled run. */
export function nextRunAfter(previous: number | null, now: number, intervalMs: number): number {
  return Math.max(now, previous ?? now) + intervalMs;
}
