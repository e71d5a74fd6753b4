import type {
  CreateOverrideInput,
  CreateRotationInput,
  CreateUserInput,
  CreateWebhookInput,
  EscalationLevelInput,
} from './admin/admin.service.js';
import type { LegacyConfig } from './oncall/oncall.types.js';
import type { ScheduleImportFormat } from './schedule/schedule.import.js';

/** The types of tasks that the Lambda function can run. */
export enum LambdaTask {
  GET_CURRENT_ONCALL = 'get_current_oncall',
  GET_ESCALATION_CHAIN = 'get_escalation_chain',
  GET_CALL_ROUTING = 'get_call_routing',
  GET_CALENDAR = 'get_calendar',
  GET_DELIVERY_LOG = 'get_delivery_log',
  CREATE_USER = 'create_user',
  UPDATE_USER = 'update_user',
  DELETE_USER = 'delete_user',
  CREATE_ROTATION = 'create_rotation',
  UPDATE_ROTATION = 'update_rotation',
  DELETE_ROTATION = 'delete_rotation',
  CREATE_OVERRIDE = 'create_override',
  DELETE_OVERRIDE = 'delete_override',
  UPDATE_ESCALATION_POLICY = 'update_escalation_policy',
  UPDATE_LEGACY_CONFIG = 'update_legacy_config',
  SET_MANUAL_SCHEDULE_DAY = 'set_manual_schedule_day',
  CLEAR_MANUAL_SCHEDULE_DAY = 'clear_manual_schedule_day',
  IMPORT_MANUAL_SCHEDULE = 'import_manual_schedule',
  CLEAR_MANUAL_SCHEDULE = 'clear_manual_schedule',
  CREATE_WEBHOOK = 'create_webhook',
  UPDATE_WEBHOOK = 'update_webhook',
  DELETE_WEBHOOK = 'delete_webhook',
  TEST_WEBHOOK = 'test_webhook',
}

/** Optional instant to resolve at (ISO-8601); defaults to now. */
interface AtInstant {
  at?: string;
}

export interface GetCurrentOncallTask extends AtInstant {
  task: LambdaTask.GET_CURRENT_ONCALL;
}

export interface GetEscalationChainTask extends AtInstant {
  task: LambdaTask.GET_ESCALATION_CHAIN;
}

/** Used by the telephony side; the response carries the dialplan variables to set. */
export interface GetCallRoutingTask extends AtInstant {
  task: LambdaTask.GET_CALL_ROUTING;
}

export interface GetCalendarTask {
  task: LambdaTask.GET_CALENDAR;
  start?: string;
  days?: number;
}

export interface GetDeliveryLogTask {
  task: LambdaTask.GET_DELIVERY_LOG;
  limit?: number;
}

export interface CreateUserTask extends CreateUserInput {
  task: LambdaTask.CREATE_USER;
}

export interface UpdateUserTask {
  task: LambdaTask.UPDATE_USER;
  user_id: string;
  changes: Partial<CreateUserInput>;
}

export interface DeleteUserTask {
  task: LambdaTask.DELETE_USER;
  user_id: string;
}

export interface CreateRotationTask extends CreateRotationInput {
  task: LambdaTask.CREATE_ROTATION;
}

export interface UpdateRotationTask {
  task: LambdaTask.UPDATE_ROTATION;
  rotation_id: string;
  changes: Partial<CreateRotationInput>;
}

export interface DeleteRotationTask {
  task: LambdaTask.DELETE_ROTATION;
  rotation_id: string;
}

export interface CreateOverrideTask extends CreateOverrideInput {
  task: LambdaTask.CREATE_OVERRIDE;
}

export interface DeleteOverrideTask {
  task: LambdaTask.DELETE_OVERRIDE;
  override_id: string;
}

export interface UpdateEscalationPolicyTask {
  task: LambdaTask.UPDATE_ESCALATION_POLICY;
  enabled: boolean;
  levels?: EscalationLevelInput[];
}

export interface UpdateLegacyConfigTask extends LegacyConfig {
  task: LambdaTask.UPDATE_LEGACY_CONFIG;
}

export interface SetManualScheduleDayTask {
  task: LambdaTask.SET_MANUAL_SCHEDULE_DAY;
  date: string;
  user_id: string;
}

export interface ClearManualScheduleDayTask {
  task: LambdaTask.CLEAR_MANUAL_SCHEDULE_DAY;
  date: string;
}

export interface ImportManualScheduleTask {
  task: LambdaTask.IMPORT_MANUAL_SCHEDULE;
  format: ScheduleImportFormat;
  content: unknown;
}

export interface ClearManualScheduleTask {
  task: LambdaTask.CLEAR_MANUAL_SCHEDULE;
  confirm: boolean;
}

export interface CreateWebhookTask extends CreateWebhookInput {
  task: LambdaTask.CREATE_WEBHOOK;
}

export interface UpdateWebhookTask {
  task: LambdaTask.UPDATE_WEBHOOK;
  webhook_id: string;
  changes: Partial<CreateWebhookInput>;
}

export interface DeleteWebhookTask {
  task: LambdaTask.DELETE_WEBHOOK;
  webhook_id: string;
}

export interface TestWebhookTask {
  task: LambdaTask.TEST_WEBHOOK;
  webhook_id: string;
}

/** The required object necessary for the Lambda function to know what task to run. */
export type LambdaHandlerEvent =
  | GetCurrentOncallTask
  | GetEscalationChainTask
  | GetCallRoutingTask
  | GetCalendarTask
  | GetDeliveryLogTask
  | CreateUserTask
  | UpdateUserTask
  | DeleteUserTask
  | CreateRotationTask
  | UpdateRotationTask
  | DeleteRotationTask
  | CreateOverrideTask
  | DeleteOverrideTask
  | UpdateEscalationPolicyTask
  | UpdateLegacyConfigTask
  | SetManualScheduleDayTask
  | ClearManualScheduleDayTask
  | ImportManualScheduleTask
  | ClearManualScheduleTask
  | CreateWebhookTask
  | UpdateWebhookTask
  | DeleteWebhookTask
  | TestWebhookTask;

export interface LambdaResponse {
  statusCode: number;
  body: string;
}
