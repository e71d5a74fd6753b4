import { IANAZone } from 'luxon';
import { isRotationPeriod } from '../rotation/rotation.calculator.js';
import type { EscalationLevel, LegacyScheduleEntry, Person } from '../oncall/oncall.types.js';
import { WebhookKind } from '../webhooks/webhook.types.js';
import { parseOncallDateTime } from './date.js';

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const VALID: ValidationResult = { isValid: true };

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

function invalid(error: string): ValidationResult {
  return { isValid: false, error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Shape check for list payloads, run before any field of an element is read. */
export function validateObjectList(value: unknown, field: string): ValidationResult {
  if (!Array.isArray(value) || !value.every(isRecord)) {
    return invalid(`${field} must be a list of objects`);
  }

  return VALID;
}

export function validateUserInput(input: { name?: string; phone?: string; timezone?: string }): ValidationResult {
  if (!input.name || !input.name.trim()) {
    return invalid('name is required');
  }

  if (!input.phone || !input.phone.trim()) {
    return invalid('phone is required');
  }

  if (input.timezone !== undefined && !IANAZone.isValidZone(input.timezone)) {
    return invalid(`timezone "${input.timezone}" is not a valid IANA zone`);
  }

  return VALID;
}

/** Both bounds must parse and the window must not end before it starts (inclusive bounds). */
export function validateDateRange(startDate: string, endDate: string, zone: string): ValidationResult {
  if (!startDate || !endDate) {
    return invalid('Both start_date and end_date are required');
  }

  const start = parseOncallDateTime(startDate, zone);
  const end = parseOncallDateTime(endDate, zone);

  if (!start) {
    return invalid(`start_date "${startDate}" is not a valid date`);
  }

  if (!end) {
    return invalid(`end_date "${endDate}" is not a valid date`);
  }

  if (end < start) {
    return invalid('end_date must be on or after start_date');
  }

  return VALID;
}

export function validateOverrideRequest(
  input: { user_id: string; start_date: string; end_date: string },
  users: Person[],
  zone: string,
): ValidationResult {
  if (!input.user_id) {
    return invalid('user_id is required');
  }

  const dateValidation = validateDateRange(input.start_date, input.end_date, zone);
  if (!dateValidation.isValid) {
    return dateValidation;
  }

  if (!users.some((user) => user.id === input.user_id)) {
    return invalid(`User ${input.user_id} not found`);
  }

  return VALID;
}

export function validateRotationInput(
  input: { name: string; type: string; user_ids: string[]; start_date: string; active: boolean },
  zone: string,
): ValidationResult {
  if (!input.name || !input.name.trim()) {
    return invalid('name is required');
  }

  if (!isRotationPeriod(input.type)) {
    return invalid(`type must be one of daily, weekly, monthly, yearly (got "${input.type}")`);
  }

  if (!Array.isArray(input.user_ids) || input.user_ids.some((id) => typeof id !== 'string' || !id)) {
    return invalid('user_ids must be a list of user ids');
  }

  if (input.active && input.user_ids.length === 0) {
    return invalid('An active rotation needs at least one user');
  }

  if (!parseOncallDateTime(input.start_date, zone)) {
    return invalid(`start_date "${input.start_date}" is not a valid date`);
  }

  return VALID;
}

/** Levels start at 2 (level 1 is always the resolved primary) and must be unique. */
export function validateEscalationLevels(levels: EscalationLevel[]): ValidationResult {
  const seen = new Set<number>();
  for (const level of levels) {
    if (!Number.isInteger(level.level) || level.level < 2) {
      return invalid(`Escalation level numbers must be integers >= 2 (got ${level.level})`);
    }

    if (seen.has(level.level)) {
      return invalid(`Escalation level ${level.level} is configured more than once`);
    }
    seen.add(level.level);

    if (!level.user_id) {
      return invalid(`Escalation level ${level.level} has no user_id`);
    }

    if (!(level.timeout > 0)) {
      return invalid(`Escalation level ${level.level} timeout must be positive`);
    }

    if (!Number.isInteger(level.attempts) || level.attempts < 1) {
      return invalid(`Escalation level ${level.level} attempts must be at least 1`);
    }
  }

  return VALID;
}

export function validateLegacySchedule(entries: LegacyScheduleEntry[]): ValidationResult {
  for (const entry of entries) {
    if (typeof entry.day !== 'string' || !WEEKDAYS.includes(entry.day.toLowerCase())) {
      return invalid(`"${entry.day}" is not a day of the week`);
    }

    if (
      !Number.isInteger(entry.start_hour) ||
      !Number.isInteger(entry.end_hour) ||
      entry.start_hour < 0 ||
      entry.end_hour > 24 ||
      entry.start_hour >= entry.end_hour
    ) {
      return invalid(`Invalid hour window ${entry.start_hour}-${entry.end_hour} for ${entry.day}`);
    }

    if (!entry.number) {
      return invalid(`Legacy schedule entry for ${entry.day} has no number`);
    }
  }

  return VALID;
}

export function validateWebhookInput(input: { name: string; url: string; type: string; events: string[] }): ValidationResult {
  if (!input.name || !input.name.trim()) {
    return invalid('name is required');
  }

  let url: URL;
  try {
    url = new URL(input.url);
  } catch {
    return invalid(`url "${input.url}" is not a valid URL`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return invalid('url must use http or https');
  }

  if (!Object.values(WebhookKind).some((kind) => kind === input.type)) {
    return invalid(`type must be one of slack, discord, teams, generic (got "${input.type}")`);
  }

  if (!Array.isArray(input.events) || input.events.some((event) => typeof event !== 'string')) {
    return invalid('events must be a list of event names');
  }

  return VALID;
}
