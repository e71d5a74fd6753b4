import type { ManualSchedule, Person } from '../oncall/oncall.types.js';
import { isCalendarDate } from '../utils/date.js';
import { Logger } from '../logger.js';

const logger = new Logger('schedule-import');

export type ScheduleImportFormat = 'json' | 'csv';

export class ScheduleImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScheduleImportError';
  }
}

export interface ScheduleImportResult {
  schedule: ManualSchedule;
  skipped: { line: number; reason: string }[];
}

/**
 * Parses `{"2025-01-01": "<user id>", ...}`. Keys that are not yyyy-MM-dd dates and
 * non-string values are skipped.
 */
export function parseJsonSchedule(content: unknown): ScheduleImportResult {
  let parsed: unknown = content;
  if (typeof content === 'string') {
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ScheduleImportError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ScheduleImportError('JSON schedule must be an object of date → user id');
  }

  const schedule: ManualSchedule = {};
  const skipped: ScheduleImportResult['skipped'] = [];

  Object.entries(parsed).forEach(([date, userId], index) => {
    if (!isCalendarDate(date)) {
      skipped.push({ line: index + 1, reason: `invalid date "${date}"` });
    } else if (typeof userId !== 'string' || !userId) {
      skipped.push({ line: index + 1, reason: `invalid user id for ${date}` });
    } else {
      schedule[date] = userId;
    }
  });

  return { schedule, skipped };
}

/**
 * Parses `date,person` lines where person is a user id or an exact display name.
 * Blank lines and lines with fewer than two columns are ignored; unknown people and bad
 * dates are skipped with a warning.
 */
export function parseCsvSchedule(content: string, users: Person[]): ScheduleImportResult {
  const schedule: ManualSchedule = {};
  const skipped: ScheduleImportResult['skipped'] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const columns = rawLine.split(',').map((column) => column.trim());
    if (columns.length < 2) {
      return;
    }

    const [date, identifier] = columns;
    const line = index + 1;

    if (!isCalendarDate(date)) {
      skipped.push({ line, reason: `invalid date "${date}"` });
      return;
    }

    const user = users.find((candidate) => candidate.name === identifier || candidate.id === identifier);
    if (!user) {
      logger.warn(`User not found for ${date}: ${identifier}`);
      skipped.push({ line, reason: `unknown user "${identifier}"` });
      return;
    }

    schedule[date] = user.id;
  });

  return { schedule, skipped };
}

export function parseScheduleImport(
  format: ScheduleImportFormat,
  content: unknown,
  users: Person[],
): ScheduleImportResult {
  if (format === 'json') {
    return parseJsonSchedule(content);
  }

  if (typeof content !== 'string') {
    throw new ScheduleImportError('CSV content must be a string');
  }

  return parseCsvSchedule(content, users);
}
