import type { DateTime } from 'luxon';
import { isRotationPeriod, resolveRotation } from '../rotation/rotation.calculator.js';
import { parseOncallDateTime } from '../utils/date.js';
import { DEFAULT_LEGACY_ENTRY_NAME, DEFAULT_PRIMARY_NAME } from '../constants.js';
import { Logger } from '../logger.js';
import {
  hasPersonId,
  type EnrichedAssignment,
  type LegacyConfig,
  type NumberAssignment,
  type OncallAssignment,
  type OncallState,
  type OverrideAssignment,
  type Override,
  type Person,
  type Rotation,
  type RotationAssignment,
} from './oncall.types.js';

const logger = new Logger('oncall-resolution');

/**
 * First override, in stored order, whose inclusive `[start_date, end_date]` window contains
 * `at`. Overlapping overrides are not merged or ranked: the earliest stored one wins.
 */
export function findActiveOverride(overrides: Override[], at: DateTime): OverrideAssignment | null {
  for (const override of overrides) {
    const start = parseOncallDateTime(override.start_date, at.zone);
    const end = parseOncallDateTime(override.end_date, at.zone);

    if (!start || !end || !override.user_id) {
      logger.warn('Skipping malformed override', { overrideId: override.id });
      continue;
    }

    if (start <= at && at <= end) {
      return {
        type: 'override',
        user_id: override.user_id,
        override_id: override.id,
        reason: override.reason,
        until: override.end_date,
      };
    }
  }

  return null;
}

/** First active rotation, in stored order, that yields a person. Only one rotation is ever consulted successfully. */
export function findRotationAssignment(rotations: Rotation[], at: DateTime): RotationAssignment | null {
  for (const rotation of rotations) {
    if (!rotation.active) {
      continue;
    }

    if (rotation.user_ids.length === 0) {
      logger.warn('Skipping active rotation with no members', { rotationId: rotation.id });
      continue;
    }

    if (!isRotationPeriod(rotation.type)) {
      logger.warn('Skipping rotation with unknown period', { rotationId: rotation.id, type: rotation.type });
      continue;
    }

    const userId = resolveRotation(rotation, at);
    if (userId !== null) {
      return {
        type: `${rotation.type}_rotation`,
        user_id: userId,
        rotation_id: rotation.id,
      };
    }
  }

  return null;
}

/** Legacy weekday/hour table lookup in `at`'s own zone; hour windows are half-open. */
export function findLegacyScheduleAssignment(legacy: LegacyConfig, at: DateTime): NumberAssignment | null {
  const weekday = at.setLocale('en-US').weekdayLong?.toLowerCase();
  const hour = at.hour;

  const entry = legacy.schedule.find(
    (candidate) => candidate.day.toLowerCase() === weekday && candidate.start_hour <= hour && hour < candidate.end_hour,
  );

  if (!entry) {
    return null;
  }

  return {
    type: 'legacy_schedule',
    number: entry.number,
    name: entry.name || DEFAULT_LEGACY_ENTRY_NAME,
  };
}

/**
 * Determines who is on-call at `at`. Precedence, first match wins:
 *   1. override whose window contains `at`
 *   2. first active rotation with a result
 *   3. legacy weekday/hour schedule
 *   4. configured primary number
 *
 * The manual (calendar) schedule is not consulted here; it only feeds the
 * calendar preview. See `getCalendarSchedule`.
 */
export function getCurrentOncall(state: OncallState, at: DateTime): OncallAssignment | null {
  const override = findActiveOverride(state.overrides, at);
  if (override) {
    return override;
  }

  const rotation = findRotationAssignment(state.rotations, at);
  if (rotation) {
    return rotation;
  }

  const legacy = findLegacyScheduleAssignment(state.legacy, at);
  if (legacy) {
    return legacy;
  }

  if (state.legacy.primary) {
    return {
      type: 'primary_fallback',
      number: state.legacy.primary,
      name: state.legacy.primary_name || DEFAULT_PRIMARY_NAME,
    };
  }

  return null;
}

export function findPerson(users: Person[], id: string): Person | undefined {
  return users.find((user) => user.id === id);
}

/** Attaches the assigned person when the assignment carries an id that still exists. */
export function enrichAssignment(assignment: OncallAssignment, users: Person[]): EnrichedAssignment {
  if (!hasPersonId(assignment)) {
    return assignment;
  }

  const user = findPerson(users, assignment.user_id);
  if (!user) {
    logger.warn('On-call person not found in directory', { userId: assignment.user_id, type: assignment.type });
    return assignment;
  }

  return { ...assignment, user };
}
