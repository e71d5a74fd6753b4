import { capitalize } from 'lodash-es';
import {
  WebhookKind,
  type DiscordWebhookPayload,
  type GenericWebhookPayload,
  type SlackWebhookPayload,
  type TeamsWebhookPayload,
  type WebhookEventData,
  type WebhookPayload,
  type WebhookValue,
} from './webhook.types.js';

const DISCORD_CREATED_COLOR = 65280;
const DISCORD_CHANGED_COLOR = 16744192;

/** `oncall_changed` → `Oncall Changed`. Underscores become spaces; each word is capitalized, the rest lowercased. */
export function toTitleCase(eventName: string): string {
  return eventName.replace(/_/g, ' ').split(' ').map(capitalize).join(' ');
}

/** Creation events get the "good"/green styling, everything else the "warning"/orange one. */
export function isCreationEvent(eventName: string): boolean {
  return eventName.includes('created');
}

function stringify(value: WebhookValue): string {
  return String(value);
}

export function renderSlackPayload(eventName: string, data: WebhookEventData): SlackWebhookPayload {
  return {
    text: `🔔 ${toTitleCase(eventName)}`,
    attachments: [
      {
        color: isCreationEvent(eventName) ? 'good' : 'warning',
        fields: Object.entries(data).map(([key, value]) => ({ title: key, value: stringify(value), short: true })),
      },
    ],
  };
}

export function renderDiscordPayload(eventName: string, data: WebhookEventData): DiscordWebhookPayload {
  return {
    content: `**${toTitleCase(eventName)}**`,
    embeds: [
      {
        description: Object.entries(data)
          .map(([key, value]) => `**${key}:** ${stringify(value)}`)
          .join('\n'),
        color: isCreationEvent(eventName) ? DISCORD_CREATED_COLOR : DISCORD_CHANGED_COLOR,
      },
    ],
  };
}

export function renderTeamsPayload(eventName: string, data: WebhookEventData): TeamsWebhookPayload {
  const title = toTitleCase(eventName);

  return {
    '@type': 'MessageCard',
    '@context': 'https://schema.org/extensions',
    summary: title,
    themeColor: isCreationEvent(eventName) ? '00FF00' : 'FFA500',
    title,
    sections: [
      {
        facts: Object.entries(data).map(([key, value]) => ({ name: key, value: stringify(value) })),
      },
    ],
  };
}

export function renderGenericPayload(eventName: string, data: WebhookEventData, now: Date): GenericWebhookPayload {
  return {
    event: eventName,
    timestamp: now.toISOString(),
    data,
  };
}

/** Shapes event data for the receiving service's incoming-webhook format. */
export function renderWebhookPayload(
  kind: WebhookKind,
  eventName: string,
  data: WebhookEventData,
  now: Date = new Date(),
): WebhookPayload {
  switch (kind) {
    case WebhookKind.Slack:
      return renderSlackPayload(eventName, data);
    case WebhookKind.Discord:
      return renderDiscordPayload(eventName, data);
    case WebhookKind.Teams:
      return renderTeamsPayload(eventName, data);
    case WebhookKind.Generic:
      return renderGenericPayload(eventName, data, now);
  }
}
