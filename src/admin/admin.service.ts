import { randomUUID } from 'crypto';
import type { OncallRepository } from '../database/queries.js';
import type { WebhookDispatcher } from '../webhooks/webhook.dispatcher.js';
import { WebhookEvent, type Webhook, type WebhookKind } from '../webhooks/webhook.types.js';
import type { EscalationPolicy, LegacyConfig, Override, Person, Rotation } from '../oncall/oncall.types.js';
import {
  parseScheduleImport,
  ScheduleImportError,
  type ScheduleImportFormat,
  type ScheduleImportResult,
} from '../schedule/schedule.import.js';
import {
  validateEscalationLevels,
  validateLegacySchedule,
  validateObjectList,
  validateOverrideRequest,
  validateRotationInput,
  validateUserInput,
  validateWebhookInput,
  type ValidationResult,
} from '../utils/validation.js';
import { isCalendarDate } from '../utils/date.js';
import {
  DEFAULT_ESCALATION_ATTEMPTS,
  DEFAULT_ESCALATION_TIMEOUT_SECONDS,
  DEFAULT_OVERRIDE_REASON,
  UNKNOWN_USER_NAME,
  WEBHOOK_TEST_MESSAGE,
} from '../constants.js';
import { Logger } from '../logger.js';

const logger = new Logger('admin');

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class DatabaseOperationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'DatabaseOperationError';
  }
}

export type AdminErrorType = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'DATABASE_ERROR' | 'UNKNOWN_ERROR';

export interface AdminFailure {
  success: false;
  error: string;
  error_type: AdminErrorType;
  operation?: string;
}

export type AdminResult<T extends object = object> = ({ success: true } & T) | AdminFailure;

export interface CreateUserInput {
  name: string;
  phone: string;
  email?: string;
  timezone?: string;
  active?: boolean;
}

export interface CreateRotationInput {
  name: string;
  type: string;
  user_ids: string[];
  start_date: string;
  active?: boolean;
}

export interface CreateOverrideInput {
  user_id: string;
  start_date: string;
  end_date: string;
  reason?: string;
}

export interface CreateWebhookInput {
  name: string;
  url: string;
  type: WebhookKind;
  events: string[];
  enabled?: boolean;
}

export interface EscalationLevelInput {
  level: number;
  user_id: string;
  timeout?: number;
  attempts?: number;
}

export interface OncallAdminOptions {
  /** Zone used to read override and rotation dates without an offset. */
  timezone: string;
  generateId?: () => string;
  now?: () => Date;
}

function assertValid(result: ValidationResult): void {
  if (!result.isValid) {
    throw new ValidationError(result.error || 'Unknown validation error');
  }
}

/**
 * Administrative mutations of on-call state. Every write that changes who could be
 * on-call fires the matching webhook event after it is persisted; delivery never blocks
 * or fails the operation.
 */
export class OncallAdminService {
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly repository: OncallRepository,
    private readonly dispatcher: WebhookDispatcher,
    private readonly options: OncallAdminOptions,
  ) {
    this.generateId = options.generateId ?? (() => randomUUID());
    this.now = options.now ?? (() => new Date());
  }

  /* ------------------------------------------------------------------
   * Users
   * ------------------------------------------------------------------ */

  createUser(input: CreateUserInput): AdminResult<{ user: Person }> {
    return this.run('createUser', () => {
      assertValid(validateUserInput(input));

      const id = this.generateId();
      this.write('upsertUser', () =>
        this.repository.upsertUser({
          id,
          name: input.name.trim(),
          phone: input.phone.trim(),
          email: input.email ?? '',
          timezone: input.timezone ?? 'UTC',
          active: input.active ?? true,
        }),
      );
      const user = this.mustFind(this.repository.getUserById(id), `User ${id}`);

      this.dispatcher.dispatch(WebhookEvent.USER_CREATED, { user_id: user.id, name: user.name, phone: user.phone });
      return { user };
    });
  }

  /** An `id` inside `changes` is ignored; the record updated is always `id`. */
  updateUser(id: string, changes: Partial<CreateUserInput>): AdminResult<{ user: Person }> {
    return this.run('updateUser', () => {
      const existing = this.mustFind(this.repository.getUserById(id), `User ${id}`);
      const merged = { ...existing, ...changes, id };
      assertValid(validateUserInput(merged));

      this.write('upsertUser', () => this.repository.upsertUser(merged));
      const user = this.mustFind(this.repository.getUserById(id), `User ${id}`);

      this.dispatcher.dispatch(WebhookEvent.USER_UPDATED, { user_id: user.id, name: user.name, phone: user.phone });
      return { user };
    });
  }

  /** Rotations, overrides and escalation levels keep referring to the id; resolution tolerates it. */
  deleteUser(id: string): AdminResult {
    return this.run('deleteUser', () => {
      if (!this.write('deleteUser', () => this.repository.deleteUser(id))) {
        throw new NotFoundError(`User ${id} not found`);
      }

      this.dispatcher.dispatch(WebhookEvent.USER_DELETED, { user_id: id });
      return {};
    });
  }

  /* ------------------------------------------------------------------
   * Rotations
   * ------------------------------------------------------------------ */

  createRotation(input: CreateRotationInput): AdminResult<{ rotation: Rotation }> {
    return this.run('createRotation', () => {
      const candidate = { ...input, active: input.active ?? true };
      assertValid(validateRotationInput(candidate, this.options.timezone));

      const id = this.generateId();
      this.write('upsertRotation', () => this.repository.upsertRotation({ id, ...candidate }));
      const rotation = this.mustFind(this.repository.getRotationById(id), `Rotation ${id}`);

      this.dispatcher.dispatch(WebhookEvent.ROTATION_CREATED, {
        rotation_id: rotation.id,
        name: rotation.name,
        type: rotation.type,
        user_count: rotation.user_ids.length,
      });
      return { rotation };
    });
  }

  updateRotation(id: string, changes: Partial<CreateRotationInput>): AdminResult<{ rotation: Rotation }> {
    return this.run('updateRotation', () => {
      const existing = this.mustFind(this.repository.getRotationById(id), `Rotation ${id}`);
      const merged = { ...existing, ...changes, id };
      assertValid(validateRotationInput(merged, this.options.timezone));

      this.write('upsertRotation', () => this.repository.upsertRotation(merged));
      const rotation = this.mustFind(this.repository.getRotationById(id), `Rotation ${id}`);

      this.dispatcher.dispatch(WebhookEvent.ROTATION_UPDATED, {
        rotation_id: rotation.id,
        name: rotation.name,
        active: rotation.active,
      });
      return { rotation };
    });
  }

  deleteRotation(id: string): AdminResult {
    return this.run('deleteRotation', () => {
      if (!this.write('deleteRotation', () => this.repository.deleteRotation(id))) {
        throw new NotFoundError(`Rotation ${id} not found`);
      }

      this.dispatcher.dispatch(WebhookEvent.ROTATION_DELETED, { rotation_id: id });
      return {};
    });
  }

  /* ------------------------------------------------------------------
   * Overrides
   * ------------------------------------------------------------------ */

  createOverride(input: CreateOverrideInput): AdminResult<{ override: Override }> {
    return this.run('createOverride', () => {
      const users = this.repository.getAllUsers();
      assertValid(validateOverrideRequest(input, users, this.options.timezone));

      const override = {
        id: this.generateId(),
        user_id: input.user_id,
        start_date: input.start_date,
        end_date: input.end_date,
        reason: input.reason || DEFAULT_OVERRIDE_REASON,
      };
      this.write('insertOverride', () => this.repository.insertOverride(override));

      const user = users.find((candidate) => candidate.id === override.user_id);
      this.dispatcher.dispatch(WebhookEvent.OVERRIDE_CREATED, {
        override_id: override.id,
        user_id: override.user_id,
        start_date: override.start_date,
        end_date: override.end_date,
        reason: override.reason,
      });
      this.dispatcher.dispatch(WebhookEvent.ONCALL_CHANGED, {
        type: 'override',
        user_id: override.user_id,
        user_name: user?.name ?? UNKNOWN_USER_NAME,
        user_phone: user?.phone ?? UNKNOWN_USER_NAME,
        reason: override.reason,
        until: override.end_date,
      });

      return { override };
    });
  }

  deleteOverride(id: string): AdminResult {
    return this.run('deleteOverride', () => {
      if (!this.write('deleteOverride', () => this.repository.deleteOverride(id))) {
        throw new NotFoundError(`Override ${id} not found`);
      }

      this.dispatcher.dispatch(WebhookEvent.OVERRIDE_DELETED, { override_id: id });
      return {};
    });
  }

  /* ------------------------------------------------------------------
   * Escalation policy + legacy config
   * ------------------------------------------------------------------ */

  updateEscalationPolicy(input: {
    enabled: boolean;
    levels?: EscalationLevelInput[];
  }): AdminResult<{ policy: EscalationPolicy }> {
    return this.run('updateEscalationPolicy', () => {
      const levels = input.levels ?? [];
      assertValid(validateObjectList(levels, 'levels'));

      const policy: EscalationPolicy = {
        enabled: input.enabled === true,
        levels: levels
          .map((level) => ({
            level: level.level,
            user_id: level.user_id,
            timeout: level.timeout ?? DEFAULT_ESCALATION_TIMEOUT_SECONDS,
            attempts: level.attempts ?? DEFAULT_ESCALATION_ATTEMPTS,
          }))
          .sort((a, b) => a.level - b.level),
      };
      assertValid(validateEscalationLevels(policy.levels));

      this.write('replaceEscalationPolicy', () => this.repository.replaceEscalationPolicy(policy));

      this.dispatcher.dispatch(WebhookEvent.ESCALATION_POLICY_UPDATED, {
        enabled: policy.enabled,
        level_count: policy.levels.length,
      });
      return { policy };
    });
  }

  updateLegacyConfig(config: LegacyConfig): AdminResult<{ config: LegacyConfig }> {
    return this.run('updateLegacyConfig', () => {
      assertValid(validateObjectList(config.schedule, 'schedule'));
      assertValid(validateLegacySchedule(config.schedule));

      const normalized: LegacyConfig = {
        primary: config.primary || null,
        primary_name: config.primary_name || null,
        schedule: config.schedule,
      };
      this.write('replaceLegacyConfig', () => this.repository.replaceLegacyConfig(normalized));
      return { config: this.repository.getLegacyConfig() };
    });
  }

  /* ------------------------------------------------------------------
   * Manual schedule (calendar preview only)
   * ------------------------------------------------------------------ */

  setManualScheduleDay(date: string, userId: string): AdminResult {
    return this.run('setManualScheduleDay', () => {
      if (!isCalendarDate(date)) {
        throw new ValidationError(`date "${date}" must be a yyyy-MM-dd calendar date`);
      }
      if (!userId) {
        throw new ValidationError('user_id is required');
      }

      this.write('mergeManualSchedule', () => this.repository.mergeManualSchedule({ [date]: userId }));

      const user = this.repository.getUserById(userId);
      this.dispatcher.dispatch(WebhookEvent.ONCALL_CHANGED, {
        type: 'manual_schedule',
        date,
        user_id: userId,
        user_name: user?.name ?? UNKNOWN_USER_NAME,
      });
      return {};
    });
  }

  /** Clearing a day that has no entry is a successful no-op. */
  clearManualScheduleDay(date: string): AdminResult<{ cleared: boolean }> {
    return this.run('clearManualScheduleDay', () => ({
      cleared: this.write('clearManualScheduleDay', () => this.repository.clearManualScheduleDay(date)),
    }));
  }

  /** Merges imported days into the existing manual schedule. */
  importManualSchedule(
    format: ScheduleImportFormat,
    content: unknown,
  ): AdminResult<{ days_imported: number; skipped: ScheduleImportResult['skipped'] }> {
    return this.run('importManualSchedule', () => {
      let parsed: ScheduleImportResult;
      try {
        parsed = parseScheduleImport(format, content, this.repository.getAllUsers());
      } catch (error) {
        if (error instanceof ScheduleImportError) {
          throw new ValidationError(`Import failed: ${error.message}`);
        }
        throw error;
      }

      this.write('mergeManualSchedule', () => this.repository.mergeManualSchedule(parsed.schedule));
      const daysImported = Object.keys(parsed.schedule).length;
      logger.info(`Imported ${daysImported} manual schedule days`, { format, skipped: parsed.skipped.length });

      return { days_imported: daysImported, skipped: parsed.skipped };
    });
  }

  clearManualSchedule(confirm: boolean): AdminResult<{ days_cleared: number }> {
    return this.run('clearManualSchedule', () => {
      if (!confirm) {
        throw new ValidationError('Confirmation required');
      }

      return { days_cleared: this.write('clearManualSchedule', () => this.repository.clearManualSchedule()) };
    });
  }

  /* ------------------------------------------------------------------
   * Webhooks
   * ------------------------------------------------------------------ */

  createWebhook(input: CreateWebhookInput): AdminResult<{ webhook: Webhook }> {
    return this.run('createWebhook', () => {
      assertValid(validateWebhookInput(input));

      const id = this.generateId();
      this.write('upsertWebhook', () =>
        this.repository.upsertWebhook({
          id,
          name: input.name.trim(),
          url: input.url,
          type: input.type,
          events: [...new Set(input.events)],
          enabled: input.enabled ?? true,
        }),
      );

      return { webhook: this.mustFind(this.repository.getWebhookById(id), `Webhook ${id}`) };
    });
  }

  updateWebhook(id: string, changes: Partial<CreateWebhookInput>): AdminResult<{ webhook: Webhook }> {
    return this.run('updateWebhook', () => {
      const existing = this.mustFind(this.repository.getWebhookById(id), `Webhook ${id}`);
      const merged = { ...existing, ...changes, id };
      assertValid(validateWebhookInput(merged));

      this.write('upsertWebhook', () => this.repository.upsertWebhook(merged));
      return { webhook: this.mustFind(this.repository.getWebhookById(id), `Webhook ${id}`) };
    });
  }

  deleteWebhook(id: string): AdminResult {
    return this.run('deleteWebhook', () => {
      if (!this.write('deleteWebhook', () => this.repository.deleteWebhook(id))) {
        throw new NotFoundError(`Webhook ${id} not found`);
      }
      return {};
    });
  }

  /** Sends a `webhook_test` event to this webhook only, whatever it subscribes to. */
  testWebhook(id: string): AdminResult {
    return this.run('testWebhook', () => {
      const webhook = this.mustFind(this.repository.getWebhookById(id), `Webhook ${id}`);

      this.dispatcher.dispatchTo(webhook, WebhookEvent.WEBHOOK_TEST, {
        message: WEBHOOK_TEST_MESSAGE,
        timestamp: this.now().toISOString(),
        test: true,
      });
      return {};
    });
  }

  /* ------------------------------------------------------------------
   * Helpers
   * ------------------------------------------------------------------ */

  private mustFind<T>(value: T | null, label: string): T {
    if (value === null) {
      throw new NotFoundError(`${label} not found`);
    }
    return value;
  }

  private write<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new DatabaseOperationError(error instanceof Error ? error.message : 'Unknown database error', operation);
    }
  }

  private run<T extends object>(operation: string, fn: () => T): AdminResult<T> {
    try {
      return { success: true, ...fn() };
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn(`Validation error in ${operation}:`, error.message);
        return { success: false, error: error.message, error_type: 'VALIDATION_ERROR' };
      }

      if (error instanceof NotFoundError) {
        logger.warn(`Not found in ${operation}:`, error.message);
        return { success: false, error: error.message, error_type: 'NOT_FOUND' };
      }

      if (error instanceof DatabaseOperationError) {
        logger.error(`Database operation error in ${error.operation}:`, error.message);
        return {
          success: false,
          error: `Database operation failed: ${error.message}`,
          error_type: 'DATABASE_ERROR',
          operation: error.operation,
        };
      }

      logger.error(`Unexpected error in ${operation}:`, error);
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
        error_type: 'UNKNOWN_ERROR',
      };
    }
  }
}
