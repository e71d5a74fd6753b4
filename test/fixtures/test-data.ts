import {
  RotationPeriod,
  type EscalationPolicy,
  type LegacyConfig,
  type OncallState,
  type Person,
  type Rotation,
} from '../../src/oncall/oncall.types.js';

/**
 * Test fixture data shared by the engine and integration tests
 */

export const ALICE: Person = {
  id: 'user-alice',
  name: 'Alice Example',
  phone: '+15550000001',
  email: 'alice@example.com',
  timezone: 'UTC',
  active: true,
};

export const BOB: Person = {
  id: 'user-bob',
  name: 'Bob Example',
  phone: '+15550000002',
  email: 'bob@example.com',
  timezone: 'UTC',
  active: true,
};

export const CAROL: Person = {
  id: 'user-carol',
  name: 'Carol Example',
  phone: '+15550000003',
  email: 'carol@example.com',
  timezone: 'UTC',
  active: true,
};

export const TEST_USERS = [ALICE, BOB, CAROL];

export function makeRotation(overrides: Partial<Rotation> = {}): Rotation {
  return {
    id: 'rotation-1',
    name: 'Primary rotation',
    type: RotationPeriod.Weekly,
    user_ids: [ALICE.id, BOB.id, CAROL.id],
    start_date: '2025-01-06T00:00:00',
    active: true,
    ...overrides,
  };
}

export const EMPTY_LEGACY: LegacyConfig = { primary: null, primary_name: null, schedule: [] };

export const DISABLED_ESCALATION: EscalationPolicy = { enabled: false, levels: [] };

/** An `OncallState` with nothing configured except the three test users. */
export function makeState(overrides: Partial<OncallState> = {}): OncallState {
  return {
    users: TEST_USERS,
    overrides: [],
    rotations: [],
    legacy: EMPTY_LEGACY,
    escalationPolicy: DISABLED_ESCALATION,
    manualSchedule: {},
    ...overrides,
  };
}
