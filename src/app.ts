import type Database from 'better-sqlite3';
import { OncallAdminService } from './admin/admin.service.js';
import { OncallRepository } from './database/queries.js';
import { WebhookDispatcher, type FetchFn } from './webhooks/webhook.dispatcher.js';
import { DISABLE_WEBHOOKS, ONCALL_TIMEZONE, WEBHOOK_TIMEOUT_MS } from './config.js';

export interface OncallAppOptions {
  timezone?: string;
  webhookTimeoutMs?: number;
  disableWebhooks?: boolean;
  fetchFn?: FetchFn;
  now?: () => Date;
  generateId?: () => string;
}

export interface OncallApp {
  timezone: string;
  repository: OncallRepository;
  dispatcher: WebhookDispatcher;
  admin: OncallAdminService;
}

/** Wires the repository, webhook dispatcher and admin service around an open database. */
export function createOncallApp(db: Database.Database, options: OncallAppOptions = {}): OncallApp {
  const timezone = options.timezone ?? ONCALL_TIMEZONE;
  const repository = new OncallRepository(db);
  const dispatcher = new WebhookDispatcher(repository, repository, {
    timeoutMs: options.webhookTimeoutMs ?? WEBHOOK_TIMEOUT_MS,
    disabled: options.disableWebhooks ?? DISABLE_WEBHOOKS,
    fetchFn: options.fetchFn,
    now: options.now,
  });
  const admin = new OncallAdminService(repository, dispatcher, {
    timezone,
    generateId: options.generateId,
    now: options.now,
  });

  return { timezone, repository, dispatcher, admin };
}
