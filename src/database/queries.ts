import type Database from 'better-sqlite3';
import type {
  EscalationLevelEntity,
  LegacyScheduleEntity,
  ManualScheduleEntity,
  OverrideEntity,
  RotationEntity,
  SettingEntity,
  Upsertable,
  UserEntity,
  WebhookDeliveryEntity,
  WebhookEntity,
} from './entities.js';
import type {
  EscalationPolicy,
  LegacyConfig,
  ManualSchedule,
  OncallState,
  Override,
  Person,
  Rotation,
} from '../oncall/oncall.types.js';
import { WebhookKind, type DeliveryLogEntry, type Webhook } from '../webhooks/webhook.types.js';
import type { DeliveryLog, WebhookSource } from '../webhooks/webhook.dispatcher.js';
import { DELIVERY_LOG_LIMIT } from '../constants.js';
import { Logger } from '../logger.js';

const logger = new Logger('queries');

const SETTING_PRIMARY_NUMBER = 'primary_number';
const SETTING_PRIMARY_NAME = 'primary_name';
const SETTING_ESCALATION_ENABLED = 'escalation_enabled';

/** Parses a JSON text column holding a list of strings; anything else reads as empty. */
function parseStringList(raw: string, context: Record<string, unknown>): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('Malformed JSON list column, treating as empty', { ...context, error });
    return [];
  }

  if (!Array.isArray(parsed)) {
    logger.warn('JSON list column is not an array, treating as empty', context);
    return [];
  }

  return parsed.filter((value): value is string => typeof value === 'string');
}

function toWebhookKind(raw: string): WebhookKind {
  return Object.values(WebhookKind).find((kind) => kind === raw) ?? WebhookKind.Generic;
}

function toPerson(row: UserEntity): Person {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    email: row.email,
    timezone: row.timezone,
    active: row.active === 1,
    created_at: row.created_at,
  };
}

function toRotation(row: RotationEntity): Rotation {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    user_ids: parseStringList(row.user_ids, { table: 'rotations', id: row.id }),
    start_date: row.start_date,
    active: row.active === 1,
    created_at: row.created_at,
  };
}

function toOverride(row: OverrideEntity): Override {
  return {
    id: row.id,
    user_id: row.user_id,
    start_date: row.start_date,
    end_date: row.end_date,
    reason: row.reason,
    created_at: row.created_at,
  };
}

function toWebhook(row: WebhookEntity): Webhook {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    type: toWebhookKind(row.type),
    events: parseStringList(row.events, { table: 'webhooks', id: row.id }),
    enabled: row.enabled === 1,
    created_at: row.created_at,
  };
}

function toDeliveryLogEntry(row: WebhookDeliveryEntity): DeliveryLogEntry {
  return {
    webhook_id: row.webhook_id,
    event_type: row.event_type,
    timestamp: row.timestamp,
    success: row.success === 1,
    ...(row.status_code !== null ? { status_code: row.status_code } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
    url: row.url,
  };
}

/**
 * All reads and writes of on-call state. Resolution code never sees this class; it reads
 * the `OncallState` returned by `snapshot()`.
 */
export class OncallRepository implements WebhookSource, DeliveryLog {
  constructor(private readonly db: Database.Database) {}

  /** Reads every store inside one transaction so a concurrent write is either fully in or out. */
  snapshot(): OncallState {
    return this.db.transaction(() => ({
      users: this.getAllUsers(),
      overrides: this.getAllOverrides(),
      rotations: this.getAllRotations(),
      legacy: this.getLegacyConfig(),
      escalationPolicy: this.getEscalationPolicy(),
      manualSchedule: this.getManualSchedule(),
    }))();
  }

  /* ------------------------------------------------------------------
   * Users
   * ------------------------------------------------------------------ */

  getAllUsers(): Person[] {
    const rows = this.db.prepare('SELECT * FROM users ORDER BY name, id').all() as UserEntity[];
    return rows.map(toPerson);
  }

  getUserById(id: string): Person | null {
    const row = this.db.prepare('SELECT * FROM users WHERE id = ?').get(id) as UserEntity | undefined;
    return row ? toPerson(row) : null;
  }

  upsertUser(user: Upsertable<Person>): void {
    this.db
      .prepare(
        `
        INSERT INTO users (id, name, phone, email, timezone, active)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT (id) DO UPDATE SET
          name = EXCLUDED.name,
          phone = EXCLUDED.phone,
          email = EXCLUDED.email,
          timezone = EXCLUDED.timezone,
          active = EXCLUDED.active,
          updated_at = CURRENT_TIMESTAMP
      `,
      )
      .run(user.id, user.name, user.phone, user.email, user.timezone, user.active ? 1 : 0);
  }

  deleteUser(id: string): boolean {
    return this.db.prepare('DELETE FROM users WHERE id = ?').run(id).changes > 0;
  }

  /* ------------------------------------------------------------------
   * Rotations
   * ------------------------------------------------------------------ */

  getAllRotations(): Rotation[] {
    const rows = this.db.prepare('SELECT * FROM rotations ORDER BY seq').all() as RotationEntity[];
    return rows.map(toRotation);
  }

  getRotationById(id: string): Rotation | null {
    const row = this.db.prepare('SELECT * FROM rotations WHERE id = ?').get(id) as RotationEntity | undefined;
    return row ? toRotation(row) : null;
  }

  /** Inserts a new rotation at the end of the stored order, or rewrites one in place. */
  upsertRotation(rotation: Upsertable<Rotation>): void {
    this.db
      .prepare(
        `
        INSERT INTO rotations (id, name, type, user_ids, start_date, active)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT (id) DO UPDATE SET
          name = EXCLUDED.name,
          type = EXCLUDED.type,
          user_ids = EXCLUDED.user_ids,
          start_date = EXCLUDED.start_date,
          active = EXCLUDED.active,
          updated_at = CURRENT_TIMESTAMP
      `,
      )
      .run(
        rotation.id,
        rotation.name,
        rotation.type,
        JSON.stringify(rotation.user_ids),
        rotation.start_date,
        rotation.active ? 1 : 0,
      );
  }

  deleteRotation(id: string): boolean {
    return this.db.prepare('DELETE FROM rotations WHERE id = ?').run(id).changes > 0;
  }

  /* ------------------------------------------------------------------
   * Overrides
   * ------------------------------------------------------------------ */

  getAllOverrides(): Override[] {
    const rows = this.db.prepare('SELECT * FROM overrides ORDER BY seq').all() as OverrideEntity[];
    return rows.map(toOverride);
  }

  insertOverride(override: Upsertable<Override>): void {
    this.db
      .prepare('INSERT INTO overrides (id, user_id, start_date, end_date, reason) VALUES (?, ?, ?, ?, ?)')
      .run(override.id, override.user_id, override.start_date, override.end_date, override.reason);
  }

  deleteOverride(id: string): boolean {
    return this.db.prepare('DELETE FROM overrides WHERE id = ?').run(id).changes > 0;
  }

  /* ------------------------------------------------------------------
   * Legacy schedule + primary fallback
   * ------------------------------------------------------------------ */

  getLegacyConfig(): LegacyConfig {
    const schedule = this.db
      .prepare('SELECT day, start_hour, end_hour, number, name FROM legacy_schedule ORDER BY seq')
      .all() as Omit<LegacyScheduleEntity, 'seq'>[];

    return {
      primary: this.getSetting(SETTING_PRIMARY_NUMBER),
      primary_name: this.getSetting(SETTING_PRIMARY_NAME),
      schedule,
    };
  }

  replaceLegacyConfig(config: LegacyConfig): void {
    const insertEntry = this.db.prepare(
      'INSERT INTO legacy_schedule (day, start_hour, end_hour, number, name) VALUES (?, ?, ?, ?, ?)',
    );

    this.db.transaction(() => {
      this.db.prepare('DELETE FROM legacy_schedule').run();
      for (const entry of config.schedule) {
        insertEntry.run(entry.day.toLowerCase(), entry.start_hour, entry.end_hour, entry.number, entry.name);
      }
      this.setSetting(SETTING_PRIMARY_NUMBER, config.primary);
      this.setSetting(SETTING_PRIMARY_NAME, config.primary_name);
    })();
  }

  /* ------------------------------------------------------------------
   * Escalation policy
   * ------------------------------------------------------------------ */

  getEscalationPolicy(): EscalationPolicy {
    const rows = this.db.prepare('SELECT * FROM escalation_levels ORDER BY level').all() as EscalationLevelEntity[];

    return {
      enabled: this.getSetting(SETTING_ESCALATION_ENABLED) === '1',
      levels: rows.map((row) => ({
        level: row.level,
        user_id: row.user_id,
        timeout: row.timeout_seconds,
        attempts: row.attempts,
      })),
    };
  }

  replaceEscalationPolicy(policy: EscalationPolicy): void {
    const insertLevel = this.db.prepare(
      'INSERT INTO escalation_levels (level, user_id, timeout_seconds, attempts) VALUES (?, ?, ?, ?)',
    );

    this.db.transaction(() => {
      this.db.prepare('DELETE FROM escalation_levels').run();
      for (const level of policy.levels) {
        insertLevel.run(level.level, level.user_id, level.timeout, level.attempts);
      }
      this.setSetting(SETTING_ESCALATION_ENABLED, policy.enabled ? '1' : '0');
    })();
  }

  /* ------------------------------------------------------------------
   * Manual schedule
   * ------------------------------------------------------------------ */

  getManualSchedule(): ManualSchedule {
    const rows = this.db.prepare('SELECT * FROM manual_schedule ORDER BY date').all() as ManualScheduleEntity[];
    return Object.fromEntries(rows.map((row) => [row.date, row.user_id]));
  }

  /** Writes every date → person pair, replacing what was there for those dates. */
  mergeManualSchedule(entries: ManualSchedule): void {
    const upsert = this.db.prepare(`
      INSERT INTO manual_schedule (date, user_id) VALUES (?, ?)
      ON CONFLICT (date) DO UPDATE SET user_id = EXCLUDED.user_id
    `);

    this.db.transaction(() => {
      for (const [date, userId] of Object.entries(entries)) {
        upsert.run(date, userId);
      }
    })();
  }

  clearManualScheduleDay(date: string): boolean {
    return this.db.prepare('DELETE FROM manual_schedule WHERE date = ?').run(date).changes > 0;
  }

  clearManualSchedule(): number {
    return this.db.prepare('DELETE FROM manual_schedule').run().changes;
  }

  /* ------------------------------------------------------------------
   * Webhooks + delivery log
   * ------------------------------------------------------------------ */

  getAllWebhooks(): Webhook[] {
    const rows = this.db.prepare('SELECT * FROM webhooks ORDER BY seq').all() as WebhookEntity[];
    return rows.map(toWebhook);
  }

  getWebhookById(id: string): Webhook | null {
    const row = this.db.prepare('SELECT * FROM webhooks WHERE id = ?').get(id) as WebhookEntity | undefined;
    return row ? toWebhook(row) : null;
  }

  upsertWebhook(webhook: Upsertable<Webhook>): void {
    this.db
      .prepare(
        `
        INSERT INTO webhooks (id, name, url, type, events, enabled)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT (id) DO UPDATE SET
          name = EXCLUDED.name,
          url = EXCLUDED.url,
          type = EXCLUDED.type,
          events = EXCLUDED.events,
          enabled = EXCLUDED.enabled
      `,
      )
      .run(
        webhook.id,
        webhook.name,
        webhook.url,
        webhook.type,
        JSON.stringify(webhook.events),
        webhook.enabled ? 1 : 0,
      );
  }

  deleteWebhook(id: string): boolean {
    return this.db.prepare('DELETE FROM webhooks WHERE id = ?').run(id).changes > 0;
  }

  /**
   * Appends one delivery and trims the log to the newest `DELIVERY_LOG_LIMIT` rows.
   * Insert and trim run as one synchronous transaction, so appends from concurrent
   * deliveries are serialized and none is lost.
   */
  appendDelivery(entry: DeliveryLogEntry): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `
          INSERT INTO webhook_deliveries (webhook_id, event_type, timestamp, success, status_code, error, url)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `,
        )
        .run(
          entry.webhook_id,
          entry.event_type,
          entry.timestamp,
          entry.success ? 1 : 0,
          entry.status_code ?? null,
          entry.error ?? null,
          entry.url,
        );

      this.db
        .prepare(
          `
          DELETE FROM webhook_deliveries
          WHERE id <= (
            SELECT id FROM webhook_deliveries ORDER BY id DESC LIMIT 1 OFFSET ?
          )
        `,
        )
        .run(DELIVERY_LOG_LIMIT);
    })();
  }

  /** Returns the newest `limit` deliveries, oldest first. */
  getDeliveryLog(limit: number): DeliveryLogEntry[] {
    const rows = this.db
      .prepare(
        `
        SELECT * FROM (
          SELECT * FROM webhook_deliveries ORDER BY id DESC LIMIT ?
        ) ORDER BY id ASC
      `,
      )
      .all(limit) as WebhookDeliveryEntity[];

    return rows.map(toDeliveryLogEntry);
  }

  countDeliveries(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM webhook_deliveries').get() as { count: number };
    return row.count;
  }

  /* ------------------------------------------------------------------
   * Settings
   * ------------------------------------------------------------------ */

  private getSetting(key: string): string | null {
    const row = this.db.prepare('SELECT * FROM settings WHERE key = ?').get(key) as SettingEntity | undefined;
    return row?.value ?? null;
  }

  private setSetting(key: string, value: string | null): void {
    this.db
      .prepare(
        `
        INSERT INTO settings (key, value) VALUES (?, ?)
        ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value
      `,
      )
      .run(key, value);
  }
}
