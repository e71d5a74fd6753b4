import { IANAZone } from 'luxon';

export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const { DATABASE_PATH } = process.env;

/** IANA zone that legacy schedule weekdays/hours and rotation anchors are read in. */
export const ONCALL_TIMEZONE = process.env.ONCALL_TIMEZONE || 'UTC';

/** Per-delivery network timeout for outgoing webhooks. */
export const WEBHOOK_TIMEOUT_MS = Number(process.env.WEBHOOK_TIMEOUT_MS || 10000);

/** Disables outgoing webhook deliveries (events are still logged). */
export const DISABLE_WEBHOOKS = process.env.DISABLE_WEBHOOKS === 'true' || process.env.DISABLE_WEBHOOKS === '1';

/**
 * Validates that required environment variables are set and well-formed.
 * DATABASE_PATH is only required in production, where there is no repo-relative default.
 */
export function validateEnvironmentVariables(): {
  valid: boolean;
  missing: string[];
  invalid: string[];
} {
  const missing: string[] = [];
  const invalid: string[] = [];

  if (IS_PRODUCTION && !DATABASE_PATH) {
    missing.push('DATABASE_PATH');
  }

  if (!IANAZone.isValidZone(ONCALL_TIMEZONE)) {
    invalid.push('ONCALL_TIMEZONE');
  }

  if (!Number.isFinite(WEBHOOK_TIMEOUT_MS) || WEBHOOK_TIMEOUT_MS <= 0) {
    invalid.push('WEBHOOK_TIMEOUT_MS');
  }

  return {
    valid: missing.length === 0 && invalid.length === 0,
    missing,
    invalid,
  };
}
