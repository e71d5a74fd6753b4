/**
 * Domain types for on-call resolution.
 *
 * Everything here is plain data: the resolution engine, escalation chain builder and
 * calendar preview read an `OncallState` snapshot and never touch storage themselves.
 */

export enum RotationPeriod {
  Daily = 'daily',
  Weekly = 'weekly',
  Monthly = 'monthly',
  Yearly = 'yearly',
}

export interface Person {
  id: string;
  name: string;
  phone: string;
  email: string;
  timezone: string;
  active: boolean;
  created_at?: string;
}

export interface Override {
  id: string;
  user_id: string;
  /** ISO-8601 instant or date; inclusive. */
  start_date: string;
  /** ISO-8601 instant or date; inclusive. */
  end_date: string;
  reason: string;
  created_at?: string;
}

export interface Rotation {
  id: string;
  name: string;
  /** Period kind as stored; unknown values are skipped at resolution time. */
  type: string;
  user_ids: string[];
  /** Anchor date (ISO-8601); index 0 of `user_ids` is on-call from here. */
  start_date: string;
  active: boolean;
  created_at?: string;
}

export interface LegacyScheduleEntry {
  /** Lower-case English weekday name, e.g. `monday`. */
  day: string;
  start_hour: number;
  end_hour: number;
  number: string;
  name: string | null;
}

export interface LegacyConfig {
  primary: string | null;
  primary_name: string | null;
  schedule: LegacyScheduleEntry[];
}

export interface EscalationLevel {
  level: number;
  user_id: string;
  timeout: number;
  attempts: number;
}

export interface EscalationPolicy {
  enabled: boolean;
  levels: EscalationLevel[];
}

/** Calendar date (yyyy-MM-dd) → person id. Read only by the calendar preview. */
export type ManualSchedule = Record<string, string>;

/** Point-in-time view of everything resolution reads. */
export interface OncallState {
  users: Person[];
  overrides: Override[];
  rotations: Rotation[];
  legacy: LegacyConfig;
  escalationPolicy: EscalationPolicy;
  manualSchedule: ManualSchedule;
}

export type RotationSource = `${RotationPeriod}_rotation`;

export type OncallSource = 'override' | RotationSource | 'legacy_schedule' | 'primary_fallback';

export interface OverrideAssignment {
  type: 'override';
  user_id: string;
  override_id: string;
  reason: string;
  until: string;
}

export interface RotationAssignment {
  type: RotationSource;
  user_id: string;
  rotation_id: string;
}

export interface NumberAssignment {
  type: 'legacy_schedule' | 'primary_fallback';
  number: string;
  name: string;
}

/** The single primary on-call result for an instant. */
export type OncallAssignment = OverrideAssignment | RotationAssignment | NumberAssignment;

/** An assignment with the assigned person attached when the id still resolves. */
export type EnrichedAssignment = OncallAssignment & { user?: Person };

export function hasPersonId(assignment: OncallAssignment): assignment is OverrideAssignment | RotationAssignment {
  return 'user_id' in assignment;
}
