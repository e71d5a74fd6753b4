import 'dotenv/config';

import { DateTime } from 'luxon';
import { validateEnvironmentVariables } from './config.js';
import { openDatabase } from './database/db.js';
import { runMigrations } from './database/migration-runner.js';
import { createOncallApp, type OncallApp } from './app.js';
import { Logger } from './logger.js';
import { LambdaTask, type LambdaHandlerEvent, type LambdaResponse } from './aws.types.js';
import { getCurrentOncall, enrichAssignment } from './oncall/oncall.resolution.js';
import {
  buildEscalationChain,
  getCallRoutingPlan,
  NoOncallConfiguredError,
  toDialplanVariables,
} from './escalation/escalation.chain.js';
import { getCalendarSchedule } from './schedule/schedule.calendar.js';
import { ValidationError, type AdminFailure, type AdminResult } from './admin/admin.service.js';
import { parseOncallDateTime } from './utils/date.js';
import { DEFAULT_CALENDAR_DAYS, DEFAULT_DELIVERY_LOG_READ_LIMIT, MAX_CALENDAR_DAYS } from './constants.js';

const logger = new Logger('main');

class AdminTaskError extends Error {
  constructor(public readonly failure: AdminFailure) {
    super(failure.error);
    this.name = 'AdminTaskError';
  }
}

const ADMIN_STATUS_CODES: Record<AdminFailure['error_type'], number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  DATABASE_ERROR: 500,
  UNKNOWN_ERROR: 500,
};

function respond(statusCode: number, body: object): LambdaResponse {
  return { statusCode, body: JSON.stringify(body) };
}

function unwrap<T extends object>(result: AdminResult<T>): AdminResult<T> {
  if (!result.success) {
    throw new AdminTaskError(result);
  }
  return result;
}

const TASKS = new Set<string>(Object.values(LambdaTask));

export function isLambdaHandlerEvent(value: unknown): value is LambdaHandlerEvent {
  return typeof value === 'object' && value !== null && 'task' in value && TASKS.has(String(value.task));
}

/**
 * Builds the Lambda-style handler around an app instance. `now` is read once per event,
 * in the on-call zone, unless the event names its own instant.
 */
export function createHandler(app: OncallApp, now: () => DateTime = () => DateTime.now()) {
  function resolveInstant(at: string | undefined): DateTime {
    if (at === undefined) {
      return now().setZone(app.timezone);
    }

    const parsed = parseOncallDateTime(at, app.timezone);
    if (!parsed) {
      throw new ValidationError(`at "${at}" is not a valid date`);
    }
    return parsed;
  }

  function runTask(event: LambdaHandlerEvent): unknown {
    const { admin } = app;

    switch (event.task) {
      case LambdaTask.GET_CURRENT_ONCALL: {
        const state = app.repository.snapshot();
        const assignment = getCurrentOncall(state, resolveInstant(event.at));
        if (!assignment) {
          throw new NoOncallConfiguredError();
        }
        return { oncall: enrichAssignment(assignment, state.users) };
      }
      case LambdaTask.GET_ESCALATION_CHAIN:
        return buildEscalationChain(app.repository.snapshot(), resolveInstant(event.at));
      case LambdaTask.GET_CALL_ROUTING: {
        const plan = getCallRoutingPlan(buildEscalationChain(app.repository.snapshot(), resolveInstant(event.at)));
        return { ...plan, variables: toDialplanVariables(plan) };
      }
      case LambdaTask.GET_CALENDAR: {
        const days = event.days ?? DEFAULT_CALENDAR_DAYS;
        if (!Number.isInteger(days) || days < 1 || days > MAX_CALENDAR_DAYS) {
          throw new ValidationError(`days must be an integer between 1 and ${MAX_CALENDAR_DAYS}`);
        }
        return { days: getCalendarSchedule(app.repository.snapshot(), resolveInstant(event.start), days) };
      }
      case LambdaTask.GET_DELIVERY_LOG: {
        const limit = event.limit ?? DEFAULT_DELIVERY_LOG_READ_LIMIT;
        if (!Number.isInteger(limit) || limit < 1) {
          throw new ValidationError('limit must be a positive integer');
        }
        return { deliveries: app.repository.getDeliveryLog(limit) };
      }
      case LambdaTask.CREATE_USER: {
        const { task: _task, ...input } = event;
        return unwrap(admin.createUser(input));
      }
      case LambdaTask.UPDATE_USER:
        return unwrap(admin.updateUser(event.user_id, event.changes));
      case LambdaTask.DELETE_USER:
        return unwrap(admin.deleteUser(event.user_id));
      case LambdaTask.CREATE_ROTATION: {
        const { task: _task, ...input } = event;
        return unwrap(admin.createRotation(input));
      }
      case LambdaTask.UPDATE_ROTATION:
        return unwrap(admin.updateRotation(event.rotation_id, event.changes));
      case LambdaTask.DELETE_ROTATION:
        return unwrap(admin.deleteRotation(event.rotation_id));
      case LambdaTask.CREATE_OVERRIDE: {
        const { task: _task, ...input } = event;
        return unwrap(admin.createOverride(input));
      }
      case LambdaTask.DELETE_OVERRIDE:
        return unwrap(admin.deleteOverride(event.override_id));
      case LambdaTask.UPDATE_ESCALATION_POLICY:
        return unwrap(admin.updateEscalationPolicy({ enabled: event.enabled, levels: event.levels }));
      case LambdaTask.UPDATE_LEGACY_CONFIG:
        return unwrap(
          admin.updateLegacyConfig({ primary: event.primary, primary_name: event.primary_name, schedule: event.schedule }),
        );
      case LambdaTask.SET_MANUAL_SCHEDULE_DAY:
        return unwrap(admin.setManualScheduleDay(event.date, event.user_id));
      case LambdaTask.CLEAR_MANUAL_SCHEDULE_DAY:
        return unwrap(admin.clearManualScheduleDay(event.date));
      case LambdaTask.IMPORT_MANUAL_SCHEDULE:
        return unwrap(admin.importManualSchedule(event.format, event.content));
      case LambdaTask.CLEAR_MANUAL_SCHEDULE:
        return unwrap(admin.clearManualSchedule(event.confirm));
      case LambdaTask.CREATE_WEBHOOK: {
        const { task: _task, ...input } = event;
        return unwrap(admin.createWebhook(input));
      }
      case LambdaTask.UPDATE_WEBHOOK:
        return unwrap(admin.updateWebhook(event.webhook_id, event.changes));
      case LambdaTask.DELETE_WEBHOOK:
        return unwrap(admin.deleteWebhook(event.webhook_id));
      case LambdaTask.TEST_WEBHOOK:
        return unwrap(admin.testWebhook(event.webhook_id));
    }
  }

  return async function handler(event?: LambdaHandlerEvent): Promise<LambdaResponse> {
    if (!event) {
      logger.error('Required `event` parameter is missing (see `LambdaHandlerEvent` in the aws.types.ts file).');
      return respond(400, {
        error: 'Required `event` parameter is missing (see `LambdaHandlerEvent` in the aws.types.ts file).',
      });
    }

    if (!isLambdaHandlerEvent(event)) {
      logger.error('Unhandled event `task`.', event);
      return respond(400, { error: 'Unhandled event task' });
    }

    try {
      const result = runTask(event);
      return respond(200, { message: 'Oncall task completed successfully', result });
    } catch (error) {
      if (error instanceof NoOncallConfiguredError) {
        return respond(404, { error: error.message });
      }

      if (error instanceof ValidationError) {
        return respond(400, { error: error.message, error_type: 'VALIDATION_ERROR' });
      }

      if (error instanceof AdminTaskError) {
        return respond(ADMIN_STATUS_CODES[error.failure.error_type], error.failure);
      }

      logger.error('Error running task:', error);
      return respond(500, {
        error: 'Oncall task failed.',
        details: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  };
}

let app: OncallApp | undefined;

function getApp(): OncallApp {
  if (!app) {
    const db = openDatabase();
    runMigrations(db);
    app = createOncallApp(db);
  }
  return app;
}

// Lambda handler for AWS Lambda execution
export async function handler(event?: LambdaHandlerEvent): Promise<LambdaResponse> {
  const envValidation = validateEnvironmentVariables();

  if (!envValidation.valid) {
    const errorMessage = [
      envValidation.missing.length ? `Missing required environment variables: ${envValidation.missing.join(', ')}` : '',
      envValidation.invalid.length ? `Invalid environment variables: ${envValidation.invalid.join(', ')}` : '',
    ]
      .filter(Boolean)
      .join('. ');
    logger.error(errorMessage);
    return respond(500, { error: 'Configuration error', details: errorMessage });
  }

  try {
    return await createHandler(getApp())(event);
  } catch (error) {
    logger.error('Failed to open the on-call database:', error);
    return respond(500, {
      error: 'Oncall task failed.',
      details: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

async function main(): Promise<void> {
  const event: unknown = process.argv[2] ? JSON.parse(process.argv[2]) : { task: LambdaTask.GET_CURRENT_ONCALL };
  const response = await handler(isLambdaHandlerEvent(event) ? event : undefined);
  logger.info(`Finished with status ${response.statusCode}`, JSON.parse(response.body));

  // Deliveries are detached from the handler; let them land before the process exits.
  if (app) {
    await app.dispatcher.drain();
  }
  await logger.flush();
}

// For direct execution (non-Lambda)
if (process.argv[1] && import.meta.url === new URL(process.argv[1], 'file://').href) {
  main().catch((error) => logger.error('Unhandled error', error));
}
