import type { DateTime } from 'luxon';
import { RotationPeriod, type Rotation } from '../oncall/oncall.types.js';
import { floorMod, parseOncallDateTime } from '../utils/date.js';
import { Logger } from '../logger.js';

const logger = new Logger('rotation-calculator');

export function isRotationPeriod(value: string): value is RotationPeriod {
  return Object.values(RotationPeriod).some((period) => period === value);
}

/**
 * Number of whole rotation periods between the anchor and `at`. Negative before the anchor.
 *
 * Daily/weekly count elapsed calendar days (floored, DST-aware in the anchor's zone).
 * Monthly/yearly count calendar boundaries only; day-of-month and time are ignored.
 */
export function getPeriodsSinceAnchor(period: RotationPeriod, anchor: DateTime, at: DateTime): number {
  const local = at.setZone(anchor.zone);

  switch (period) {
    case RotationPeriod.Daily:
      return Math.floor(local.diff(anchor, 'days').days);
    case RotationPeriod.Weekly:
      return Math.floor(Math.floor(local.diff(anchor, 'days').days) / 7);
    case RotationPeriod.Monthly:
      return local.year * 12 + local.month - (anchor.year * 12 + anchor.month);
    case RotationPeriod.Yearly:
      return local.year - anchor.year;
  }
}

/**
 * Returns the person id on duty for `rotation` at `at`, or null when the rotation cannot
 * answer (inactive, no members, unknown period, unparsable anchor).
 *
 * Instants before the anchor wrap around with floor-mod rather than returning null, so the
 * rotation is periodic in both directions: the member on duty one period before the anchor
 * is the last one in the list.
 */
export function resolveRotation(rotation: Rotation, at: DateTime): string | null {
  if (!rotation.active || rotation.user_ids.length === 0) {
    return null;
  }

  if (!isRotationPeriod(rotation.type)) {
    logger.warn('Skipping rotation with unknown period', { rotationId: rotation.id, type: rotation.type });
    return null;
  }

  const anchor = parseOncallDateTime(rotation.start_date, at.zone);
  if (!anchor) {
    logger.warn('Skipping rotation with unparsable start date', {
      rotationId: rotation.id,
      startDate: rotation.start_date,
    });
    return null;
  }

  const periods = getPeriodsSinceAnchor(rotation.type, anchor, at);
  return rotation.user_ids[floorMod(periods, rotation.user_ids.length)];
}
