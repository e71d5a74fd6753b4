import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  buildEscalationChain,
  getCallRoutingPlan,
  getPrimaryNumber,
  NoOncallConfiguredError,
  toDialplanVariables,
} from './escalation.chain.js';
import type { EscalationPolicy } from '../oncall/oncall.types.js';
import { ALICE, BOB, CAROL, makeRotation, makeState } from '../../test/fixtures/test-data.js';

const monday = DateTime.fromISO('2025-01-06T10:00:00', { zone: 'UTC' });

const policy: EscalationPolicy = {
  enabled: true,
  levels: [
    { level: 3, user_id: CAROL.id, timeout: 45, attempts: 2 },
    { level: 2, user_id: BOB.id, timeout: 20, attempts: 1 },
    { level: 4, user_id: 'user-gone', timeout: 30, attempts: 1 },
  ],
};

describe('buildEscalationChain', () => {
  it('puts the resolved person first and levels 2..N after in ascending order', () => {
    const chain = buildEscalationChain(makeState({ rotations: [makeRotation()], escalationPolicy: policy }), monday);

    expect(chain.primary).toEqual({ type: 'weekly_rotation', user_id: ALICE.id, rotation_id: 'rotation-1', user: ALICE });
    expect(chain.escalation_enabled).toBe(true);
    expect(chain.chain).toEqual([
      { level: 2, user: BOB, timeout: 20, attempts: 1 },
      { level: 3, user: CAROL, timeout: 45, attempts: 2 },
    ]);
  });

  it('drops levels whose person no longer exists', () => {
    const chain = buildEscalationChain(makeState({ rotations: [makeRotation()], escalationPolicy: policy }), monday);
    expect(chain.chain.map((link) => link.level)).toEqual([2, 3]);
  });

  it('has only the primary when escalation is disabled', () => {
    const chain = buildEscalationChain(
      makeState({ rotations: [makeRotation()], escalationPolicy: { ...policy, enabled: false } }),
      monday,
    );

    expect(chain.escalation_enabled).toBe(false);
    expect(chain.chain).toEqual([]);
    expect(getCallRoutingPlan(chain).levels).toHaveLength(1);
  });

  it('falls back to default timeout and attempts for zero values', () => {
    const chain = buildEscalationChain(
      makeState({
        rotations: [makeRotation()],
        escalationPolicy: { enabled: true, levels: [{ level: 2, user_id: BOB.id, timeout: 0, attempts: 0 }] },
      }),
      monday,
    );

    expect(chain.chain).toEqual([{ level: 2, user: BOB, timeout: 30, attempts: 1 }]);
  });

  it('throws when nothing resolves for level 1', () => {
    expect(() => buildEscalationChain(makeState({ escalationPolicy: policy }), monday)).toThrow(NoOncallConfiguredError);
    expect(() => buildEscalationChain(makeState(), monday)).toThrow('No on-call person configured');
  });
});

describe('getPrimaryNumber', () => {
  it('prefers the person phone, then the raw number', () => {
    expect(getPrimaryNumber({ type: 'daily_rotation', user_id: BOB.id, rotation_id: 'r', user: BOB })).toBe(BOB.phone);
    expect(getPrimaryNumber({ type: 'primary_fallback', number: '+15559990000', name: 'Primary On-Call' })).toBe(
      '+15559990000',
    );
  });

  it('returns null for a person id that resolves to nobody', () => {
    expect(
      getPrimaryNumber({ type: 'override', user_id: 'user-gone', override_id: 'o', reason: 'r', until: '2025-01-01' }),
    ).toBeNull();
  });
});

describe('call routing', () => {
  it('lists level 1 with the default timeout followed by each escalation level', () => {
    const chain = buildEscalationChain(makeState({ rotations: [makeRotation()], escalationPolicy: policy }), monday);

    expect(getCallRoutingPlan(chain)).toEqual({
      primary_number: ALICE.phone,
      escalation_enabled: true,
      levels: [
        { level: 1, number: ALICE.phone, timeout: 30 },
        { level: 2, number: BOB.phone, timeout: 20 },
        { level: 3, number: CAROL.phone, timeout: 45 },
      ],
    });
  });

  it('sets per-level dialplan variables when escalation is enabled', () => {
    const chain = buildEscalationChain(makeState({ rotations: [makeRotation()], escalationPolicy: policy }), monday);

    expect(toDialplanVariables(getCallRoutingPlan(chain))).toEqual({
      ONCALL_NUMBER: ALICE.phone,
      ONCALL_LEVEL1: ALICE.phone,
      ESCALATION_ENABLED: '1',
      ESCALATION_LEVELS: '2',
      ONCALL_LEVEL2: BOB.phone,
      ONCALL_TIMEOUT2: '20',
      ONCALL_LEVEL3: CAROL.phone,
      ONCALL_TIMEOUT3: '45',
    });
  });

  it('numbers dialplan hops by position when a configured level is dropped', () => {
    const sparse: EscalationPolicy = {
      enabled: true,
      levels: [
        { level: 2, user_id: 'user-gone', timeout: 15, attempts: 1 },
        { level: 3, user_id: BOB.id, timeout: 20, attempts: 1 },
        { level: 4, user_id: CAROL.id, timeout: 45, attempts: 2 },
      ],
    };
    const chain = buildEscalationChain(makeState({ rotations: [makeRotation()], escalationPolicy: sparse }), monday);

    expect(toDialplanVariables(getCallRoutingPlan(chain))).toEqual({
      ONCALL_NUMBER: ALICE.phone,
      ONCALL_LEVEL1: ALICE.phone,
      ESCALATION_ENABLED: '1',
      ESCALATION_LEVELS: '2',
      ONCALL_LEVEL2: BOB.phone,
      ONCALL_TIMEOUT2: '20',
      ONCALL_LEVEL3: CAROL.phone,
      ONCALL_TIMEOUT3: '45',
    });
  });

  it('sets a single level when escalation is disabled', () => {
    const state = makeState({ legacy: { primary: '+15559990000', primary_name: null, schedule: [] } });
    const plan = getCallRoutingPlan(buildEscalationChain(state, monday));

    expect(toDialplanVariables(plan)).toEqual({
      ONCALL_NUMBER: '+15559990000',
      ONCALL_LEVEL1: '+15559990000',
      ESCALATION_ENABLED: '0',
      ESCALATION_LEVELS: '1',
    });
  });
});
