import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { getCalendarSchedule } from './schedule.calendar.js';
import { RotationPeriod } from '../oncall/oncall.types.js';
import { ALICE, BOB, CAROL, makeRotation, makeState } from '../../test/fixtures/test-data.js';

const start = DateTime.fromISO('2025-01-06T15:00:00', { zone: 'UTC' });

describe('getCalendarSchedule', () => {
  it('prefers manual entries and fills the rest from the rotation', () => {
    const state = makeState({
      rotations: [makeRotation({ type: RotationPeriod.Daily, user_ids: [ALICE.id, CAROL.id] })],
      manualSchedule: { '2025-01-07': BOB.id },
    });

    expect(getCalendarSchedule(state, start, 3)).toEqual([
      { date: '2025-01-06', user_id: ALICE.id, oncall_name: ALICE.name, source: 'rotation' },
      { date: '2025-01-07', user_id: BOB.id, oncall_name: BOB.name, source: 'manual' },
      { date: '2025-01-08', user_id: ALICE.id, oncall_name: ALICE.name, source: 'rotation' },
    ]);
  });

  it('resolves each day at its start for longer periods', () => {
    const state = makeState({ rotations: [makeRotation({ type: RotationPeriod.Weekly })] });
    const days = getCalendarSchedule(state, DateTime.fromISO('2025-01-12T23:00:00', { zone: 'UTC' }), 2);

    expect(days.map((day) => day.user_id)).toEqual([ALICE.id, BOB.id]);
  });

  it('names people who no longer exist as Unknown', () => {
    const state = makeState({ manualSchedule: { '2025-01-06': 'user-gone' } });

    expect(getCalendarSchedule(state, start, 1)).toEqual([
      { date: '2025-01-06', user_id: 'user-gone', oncall_name: 'Unknown', source: 'manual' },
    ]);
  });

  it('leaves days with no manual entry or rotation empty', () => {
    const state = makeState({
      overrides: [
        { id: 'o1', user_id: BOB.id, start_date: '2025-01-06', end_date: '2025-01-07', reason: 'Cover' },
      ],
      legacy: { primary: '+15559990000', primary_name: null, schedule: [] },
    });

    expect(getCalendarSchedule(state, start, 1)).toEqual([
      { date: '2025-01-06', user_id: null, oncall_name: '', source: 'none' },
    ]);
  });

  it('returns nothing for zero days', () => {
    expect(getCalendarSchedule(makeState(), start, 0)).toEqual([]);
  });
});
