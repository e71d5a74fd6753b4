import { renderWebhookPayload } from './webhook.payloads.js';
import type { DeliveryLogEntry, Webhook, WebhookEventData } from './webhook.types.js';
import { Logger } from '../logger.js';

const logger = new Logger('webhook-dispatcher');

// The response body is never read; cancel it so the connection is freed.
async function releaseBody(response: Response, webhookId: string): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.warn(`Could not release response body for webhook ${webhookId}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/** Where the dispatcher reads the registered webhooks from on every dispatch. */
export interface WebhookSource {
  getAllWebhooks(): Webhook[];
}

/**
 * Append-only delivery record. Implementations must make `appendDelivery` atomic with
 * respect to other appends (see `OncallRepository.appendDelivery`).
 */
export interface DeliveryLog {
  appendDelivery(entry: DeliveryLogEntry): void;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface WebhookDispatcherOptions {
  /** Per-delivery network timeout. */
  timeoutMs: number;
  fetchFn?: FetchFn;
  now?: () => Date;
  /** When set, events are logged but nothing is sent or recorded. */
  disabled?: boolean;
}

/**
 * Fans state-change events out to subscribed webhooks.
 *
 * `dispatch` returns immediately. Each delivery runs as its own detached promise: one
 * POST with a timeout, then one delivery log entry. Deliveries are never retried and a
 * failure is only recorded. There is no limit on how many deliveries run at once.
 */
export class WebhookDispatcher {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(
    private readonly webhooks: WebhookSource,
    private readonly deliveryLog: DeliveryLog,
    private readonly options: WebhookDispatcherOptions,
  ) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => new Date());
  }

  /** Number of deliveries started and not yet recorded. */
  get pendingDeliveries(): number {
    return this.inFlight.size;
  }

  /** Sends `eventName` to every enabled webhook subscribed to it. Never throws. */
  dispatch(eventName: string, data: WebhookEventData): void {
    let targets: Webhook[];
    try {
      targets = this.webhooks
        .getAllWebhooks()
        .filter((webhook) => webhook.enabled && webhook.events.includes(eventName));
    } catch (error) {
      logger.error('Failed to load webhooks, event not dispatched', { eventName, error });
      return;
    }

    logger.debug('Dispatching event', { eventName, targets: targets.map((webhook) => webhook.id) });

    for (const webhook of targets) {
      this.start(webhook, eventName, data);
    }
  }

  /** Sends to one webhook regardless of its subscriptions; a disabled webhook still receives nothing. */
  dispatchTo(webhook: Webhook, eventName: string, data: WebhookEventData): void {
    if (!webhook.enabled) {
      logger.info('Webhook is disabled, skipping delivery', { webhookId: webhook.id, eventName });
      return;
    }

    this.start(webhook, eventName, data);
  }

  /** Resolves once every delivery started so far has been recorded. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private start(webhook: Webhook, eventName: string, data: WebhookEventData): void {
    if (this.options.disabled) {
      logger.info('Webhooks disabled, skipping delivery', { webhookId: webhook.id, eventName });
      return;
    }

    const delivery = this.deliver(webhook, eventName, data)
      .then((entry) => this.record(entry))
      .finally(() => {
        this.inFlight.delete(delivery);
      });

    this.inFlight.add(delivery);
  }

  private async deliver(webhook: Webhook, eventName: string, data: WebhookEventData): Promise<DeliveryLogEntry> {
    const base = { webhook_id: webhook.id, event_type: eventName, url: webhook.url };

    try {
      const payload = renderWebhookPayload(webhook.type, eventName, data, this.now());
      const response = await this.fetchFn(webhook.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      const success = response.status >= 200 && response.status < 300;
      await releaseBody(response, webhook.id);
      if (success) {
        logger.info(`Webhook ${webhook.id} delivered: ${eventName}`, { status: response.status });
      } else {
        logger.error(`Webhook ${webhook.id} rejected delivery: ${eventName}`, { status: response.status });
      }

      return {
        ...base,
        timestamp: this.now().toISOString(),
        success,
        status_code: response.status,
        ...(success ? {} : { error: `Unexpected status ${response.status}` }),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Webhook ${webhook.id} delivery failed: ${eventName}`, { error: message });

      return {
        ...base,
        timestamp: this.now().toISOString(),
        success: false,
        error: message,
      };
    }
  }

  private record(entry: DeliveryLogEntry): void {
    try {
      this.deliveryLog.appendDelivery(entry);
    } catch (error) {
      logger.error('Failed to record webhook delivery', { entry, error });
    }
  }
}
