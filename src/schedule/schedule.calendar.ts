import type { DateTime } from 'luxon';
import { findPerson, findRotationAssignment } from '../oncall/oncall.resolution.js';
import type { OncallState } from '../oncall/oncall.types.js';
import { getDaysFrom } from '../utils/date.js';
import { UNKNOWN_USER_NAME } from '../constants.js';

export type CalendarSource = 'manual' | 'rotation' | 'none';

export interface CalendarDay {
  date: string;
  user_id: string | null;
  oncall_name: string;
  source: CalendarSource;
}

/**
 * Day-by-day planning view: the manual schedule entry for a date wins, otherwise the
 * first active rotation at the start of that day.
 *
 * NOTE: this is a separate track from live resolution. `getCurrentOncall` never reads the
 * manual schedule and this view never reads overrides or the legacy schedule, so the
 * preview and the number actually dialled can disagree for the same day.
 */
export function getCalendarSchedule(state: OncallState, start: DateTime, days: number): CalendarDay[] {
  return getDaysFrom(start, days).map((day) => {
    const date = day.toFormat('yyyy-MM-dd');

    const manualUserId = state.manualSchedule[date];
    if (manualUserId) {
      return {
        date,
        user_id: manualUserId,
        oncall_name: findPerson(state.users, manualUserId)?.name ?? UNKNOWN_USER_NAME,
        source: 'manual',
      };
    }

    const rotation = findRotationAssignment(state.rotations, day);
    if (rotation) {
      return {
        date,
        user_id: rotation.user_id,
        oncall_name: findPerson(state.users, rotation.user_id)?.name ?? UNKNOWN_USER_NAME,
        source: 'rotation',
      };
    }

    return { date, user_id: null, oncall_name: '', source: 'none' };
  });
}
