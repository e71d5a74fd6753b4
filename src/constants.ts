/**
 * Core constants shared by the on-call router.
 *
 * NOTE: keep this file free of side-effects; everything here must be
 * deterministically initialised at module load.
 */

/** Maximum number of webhook delivery log entries kept (oldest evicted first). */
export const DELIVERY_LOG_LIMIT = 500;

/** Default number of delivery log entries returned by a read. */
export const DEFAULT_DELIVERY_LOG_READ_LIMIT = 100;

/** Ring timeout used for an escalation level that does not configure one. */
export const DEFAULT_ESCALATION_TIMEOUT_SECONDS = 30;

/** Number of dial attempts used for an escalation level that does not configure one. */
export const DEFAULT_ESCALATION_ATTEMPTS = 1;

/** Number of days returned by the calendar preview when the caller does not ask for a range. */
export const DEFAULT_CALENDAR_DAYS = 30;

/** Largest calendar preview range accepted. */
export const MAX_CALENDAR_DAYS = 366;

export const DEFAULT_OVERRIDE_REASON = 'Manual override';
export const DEFAULT_PRIMARY_NAME = 'Primary On-Call';
export const DEFAULT_LEGACY_ENTRY_NAME = 'On-Call';
export const UNKNOWN_USER_NAME = 'Unknown';

export const WEBHOOK_TEST_MESSAGE = 'This is a test webhook from the on-call router';
