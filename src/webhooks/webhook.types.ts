import type { MessageAttachment } from '@slack/web-api';

export enum WebhookKind {
  Slack = 'slack',
  Discord = 'discord',
  Teams = 'teams',
  Generic = 'generic',
}

/** State-change events that webhooks can subscribe to. */
export enum WebhookEvent {
  USER_CREATED = 'user_created',
  USER_UPDATED = 'user_updated',
  USER_DELETED = 'user_deleted',
  ROTATION_CREATED = 'rotation_created',
  ROTATION_UPDATED = 'rotation_updated',
  ROTATION_DELETED = 'rotation_deleted',
  OVERRIDE_CREATED = 'override_created',
  OVERRIDE_DELETED = 'override_deleted',
  ONCALL_CHANGED = 'oncall_changed',
  ESCALATION_POLICY_UPDATED = 'escalation_policy_updated',
  WEBHOOK_TEST = 'webhook_test',
}

export interface Webhook {
  id: string;
  name: string;
  url: string;
  type: WebhookKind;
  /** Subscribed event names. Unknown names are kept; they simply never match. */
  events: string[];
  enabled: boolean;
  created_at?: string;
}

export type WebhookValue = string | number | boolean | null;

/** Flat key/value event data; rendered as fields/facts by the chat targets. */
export type WebhookEventData = Record<string, WebhookValue>;

export interface DeliveryLogEntry {
  webhook_id: string;
  event_type: string;
  timestamp: string;
  success: boolean;
  status_code?: number;
  error?: string;
  url: string;
}

export interface SlackWebhookPayload {
  text: string;
  attachments: MessageAttachment[];
}

export interface DiscordWebhookPayload {
  content: string;
  embeds: { description: string; color: number }[];
}

export interface TeamsWebhookPayload {
  '@type': 'MessageCard';
  '@context': 'https://schema.org/extensions';
  summary: string;
  themeColor: string;
  title: string;
  sections: { facts: { name: string; value: string }[] }[];
}

export interface GenericWebhookPayload {
  event: string;
  timestamp: string;
  data: WebhookEventData;
}

export type WebhookPayload = SlackWebhookPayload | DiscordWebhookPayload | TeamsWebhookPayload | GenericWebhookPayload;
