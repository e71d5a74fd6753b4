import type { DateTime } from 'luxon';
import { enrichAssignment, findPerson, getCurrentOncall } from '../oncall/oncall.resolution.js';
import type { EnrichedAssignment, OncallState, Person } from '../oncall/oncall.types.js';
import { DEFAULT_ESCALATION_ATTEMPTS, DEFAULT_ESCALATION_TIMEOUT_SECONDS } from '../constants.js';
import { Logger } from '../logger.js';

const logger = new Logger('escalation-chain');

export class NoOncallConfiguredError extends Error {
  constructor(message = 'No on-call person configured') {
    super(message);
    this.name = 'NoOncallConfiguredError';
  }
}

export interface EscalationChainLink {
  level: number;
  user: Person;
  timeout: number;
  attempts: number;
}

/**
 * Level 1 is `primary`; `chain` holds levels 2..N in ascending order and is empty when
 * escalation is disabled.
 */
export interface EscalationChain {
  primary: EnrichedAssignment;
  escalation_enabled: boolean;
  chain: EscalationChainLink[];
}

/**
 * Builds the ordered call-forwarding plan for `at`.
 *
 * Policy levels whose person no longer exists are dropped, so the chain can be shorter
 * than the configured policy.
 * @throws NoOncallConfiguredError when nothing resolves for level 1
 */
export function buildEscalationChain(state: OncallState, at: DateTime): EscalationChain {
  const assignment = getCurrentOncall(state, at);
  if (!assignment) {
    throw new NoOncallConfiguredError();
  }

  const primary = enrichAssignment(assignment, state.users);
  const policy = state.escalationPolicy;

  if (!policy.enabled) {
    return { primary, escalation_enabled: false, chain: [] };
  }

  const chain: EscalationChainLink[] = [];
  const levels = [...policy.levels].sort((a, b) => a.level - b.level);

  for (const level of levels) {
    const user = findPerson(state.users, level.user_id);
    if (!user) {
      logger.warn('Dropping escalation level for unknown person', { level: level.level, userId: level.user_id });
      continue;
    }

    chain.push({
      level: level.level,
      user,
      timeout: level.timeout || DEFAULT_ESCALATION_TIMEOUT_SECONDS,
      attempts: level.attempts || DEFAULT_ESCALATION_ATTEMPTS,
    });
  }

  return { primary, escalation_enabled: true, chain };
}

/** Contact number for level 1: the person's phone when known, else the raw number. */
export function getPrimaryNumber(primary: EnrichedAssignment): string | null {
  if (primary.user) {
    return primary.user.phone;
  }

  return 'number' in primary ? primary.number : null;
}

export interface CallRoutingLevel {
  level: number;
  number: string;
  timeout: number;
}

/** What the telephony side needs to place the calls: level 1 first, then each escalation level. */
export interface CallRoutingPlan {
  primary_number: string | null;
  escalation_enabled: boolean;
  levels: CallRoutingLevel[];
}

export function getCallRoutingPlan(chain: EscalationChain): CallRoutingPlan {
  const primaryNumber = getPrimaryNumber(chain.primary);
  const levels: CallRoutingLevel[] = [];

  if (primaryNumber) {
    levels.push({ level: 1, number: primaryNumber, timeout: DEFAULT_ESCALATION_TIMEOUT_SECONDS });
  }

  for (const link of chain.chain) {
    levels.push({ level: link.level, number: link.user.phone, timeout: link.timeout });
  }

  return {
    primary_number: primaryNumber,
    escalation_enabled: chain.escalation_enabled,
    levels,
  };
}

/**
 * Channel variables the dialplan reads: ONCALL_NUMBER / ONCALL_LEVEL1 for the primary,
 * ONCALL_LEVEL<n> / ONCALL_TIMEOUT<n> for the n-th dialled hop (n = 2, 3, ...), plus the
 * escalation flags.
 */
export function toDialplanVariables(plan: CallRoutingPlan): Record<string, string> {
  const variables: Record<string, string> = {
    ONCALL_NUMBER: plan.primary_number ?? '',
    ONCALL_LEVEL1: plan.primary_number ?? '',
  };

  if (!plan.escalation_enabled) {
    variables.ESCALATION_ENABLED = '0';
    variables.ESCALATION_LEVELS = '1';
    return variables;
  }

  const escalationLevels = plan.levels.filter((level) => level.level > 1);
  variables.ESCALATION_ENABLED = '1';
  variables.ESCALATION_LEVELS = String(escalationLevels.length);

  // Numbered by position from 2, not by configured level: no gaps after dropped or sparse levels.
  escalationLevels.forEach((level, index) => {
    variables[`ONCALL_LEVEL${index + 2}`] = level.number;
    variables[`ONCALL_TIMEOUT${index + 2}`] = String(level.timeout);
  });

  return variables;
}
