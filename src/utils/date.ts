import { DateTime, type Zone } from 'luxon';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses an ISO-8601 date or date-time. Values without an offset are read as wall-clock
 * time in `zone`. Returns null for anything luxon cannot parse.
 */
export function parseOncallDateTime(value: unknown, zone: string | Zone): DateTime | null {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const parsed = DateTime.fromISO(value.trim(), { zone });
  return parsed.isValid ? parsed : null;
}

/** True for a real calendar date written as yyyy-MM-dd. */
export function isCalendarDate(value: string): boolean {
  return CALENDAR_DATE_PATTERN.test(value) && DateTime.fromISO(value).isValid;
}

/** Remainder with the sign of the divisor, so the result is always in `[0, modulus)`. */
export function floorMod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

/** `days` consecutive calendar days starting at the day of `start`. */
export function getDaysFrom(start: DateTime, days: number): DateTime[] {
  const first = start.startOf('day');
  return Array.from({ length: Math.max(0, days) }, (_, offset) => first.plus({ days: offset }));
}
