/**
 * Row shapes as better-sqlite3 returns them. Booleans are stored as 0/1 and list
 * columns as JSON text; `OncallRepository` maps rows to the domain types.
 */

export interface UserEntity {
  id: string;
  name: string;
  phone: string;
  email: string;
  timezone: string;
  active: number;
  created_at?: string;
  updated_at?: string;
}

export interface RotationEntity {
  seq: number;
  id: string;
  name: string;
  type: string;
  user_ids: string;
  start_date: string;
  active: number;
  created_at?: string;
  updated_at?: string;
}

export interface OverrideEntity {
  seq: number;
  id: string;
  user_id: string;
  start_date: string;
  end_date: string;
  reason: string;
  created_at?: string;
}

export interface LegacyScheduleEntity {
  seq: number;
  day: string;
  start_hour: number;
  end_hour: number;
  number: string;
  name: string | null;
}

export interface SettingEntity {
  key: string;
  value: string | null;
}

export interface EscalationLevelEntity {
  level: number;
  user_id: string;
  timeout_seconds: number;
  attempts: number;
}

export interface ManualScheduleEntity {
  date: string;
  user_id: string;
}

export interface WebhookEntity {
  seq: number;
  id: string;
  name: string;
  url: string;
  type: string;
  events: string;
  enabled: number;
  created_at?: string;
}

export interface WebhookDeliveryEntity {
  id: number;
  webhook_id: string;
  event_type: string;
  timestamp: string;
  success: number;
  status_code: number | null;
  error: string | null;
  url: string;
}

export type Upsertable<T> = Omit<T, 'seq' | 'created_at' | 'updated_at'>;
