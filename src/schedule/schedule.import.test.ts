import { describe, it, expect } from 'vitest';
import { parseCsvSchedule, parseJsonSchedule, parseScheduleImport, ScheduleImportError } from './schedule.import.js';
import { ALICE, BOB, TEST_USERS } from '../../test/fixtures/test-data.js';

describe('parseJsonSchedule', () => {
  it('accepts an object or its JSON text', () => {
    const expected = { schedule: { '2025-01-01': ALICE.id }, skipped: [] };

    expect(parseJsonSchedule({ '2025-01-01': ALICE.id })).toEqual(expected);
    expect(parseJsonSchedule(`{"2025-01-01": "${ALICE.id}"}`)).toEqual(expected);
  });

  it('skips bad dates and non-string values', () => {
    expect(parseJsonSchedule({ '2025-02-30': ALICE.id, '2025-03-01': 7, '2025-03-02': BOB.id })).toEqual({
      schedule: { '2025-03-02': BOB.id },
      skipped: [
        { line: 1, reason: 'invalid date "2025-02-30"' },
        { line: 2, reason: 'invalid user id for 2025-03-01' },
      ],
    });
  });

  it('rejects text that is not a JSON object', () => {
    expect(() => parseJsonSchedule('{oops')).toThrow(ScheduleImportError);
    expect(() => parseJsonSchedule('["2025-01-01"]')).toThrow('JSON schedule must be an object of date → user id');
  });
});

describe('parseCsvSchedule', () => {
  it('matches people by display name or id', () => {
    const csv = ['2025-01-01,Alice Example', '2025-01-02, user-bob ', '', 'no-comma-here'].join('\n');

    expect(parseCsvSchedule(csv, TEST_USERS)).toEqual({
      schedule: { '2025-01-01': ALICE.id, '2025-01-02': BOB.id },
      skipped: [],
    });
  });

  it('skips a header row, bad dates and unknown people with their line numbers', () => {
    const csv = 'date,person\r\n2025-13-01,Alice Example\r\n2025-01-03,Mallory\r\n2025-01-04,user-alice';

    expect(parseCsvSchedule(csv, TEST_USERS)).toEqual({
      schedule: { '2025-01-04': ALICE.id },
      skipped: [
        { line: 1, reason: 'invalid date "date"' },
        { line: 2, reason: 'invalid date "2025-13-01"' },
        { line: 3, reason: 'unknown user "Mallory"' },
      ],
    });
  });
});

describe('parseScheduleImport', () => {
  it('requires CSV content to be text', () => {
    expect(() => parseScheduleImport('csv', { '2025-01-01': ALICE.id }, TEST_USERS)).toThrow(
      'CSV content must be a string',
    );
  });

  it('dispatches on format', () => {
    expect(parseScheduleImport('csv', '2025-01-01,Bob Example', TEST_USERS).schedule).toEqual({ '2025-01-01': BOB.id });
    expect(parseScheduleImport('json', { '2025-01-01': BOB.id }, TEST_USERS).schedule).toEqual({ '2025-01-01': BOB.id });
  });
});
