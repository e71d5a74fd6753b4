import { describe, it, expect } from 'vitest';
import {
  validateDateRange,
  validateEscalationLevels,
  validateLegacySchedule,
  validateOverrideRequest,
  validateRotationInput,
  validateUserInput,
  validateWebhookInput,
} from './validation.js';
import { ALICE, TEST_USERS } from '../../test/fixtures/test-data.js';

describe('validation utilities', () => {
  describe('validateUserInput', () => {
    it('requires a name and a phone', () => {
      expect(validateUserInput({ name: 'Dana', phone: '+15550000004' })).toEqual({ isValid: true });
      expect(validateUserInput({ name: '  ', phone: '+15550000004' })).toEqual({
        isValid: false,
        error: 'name is required',
      });
      expect(validateUserInput({ name: 'Dana' })).toEqual({ isValid: false, error: 'phone is required' });
    });

    it('rejects unknown time zones', () => {
      expect(validateUserInput({ name: 'Dana', phone: '1', timezone: 'Mars/Olympus' }).error).toBe(
        'timezone "Mars/Olympus" is not a valid IANA zone',
      );
      expect(validateUserInput({ name: 'Dana', phone: '1', timezone: 'Europe/Berlin' }).isValid).toBe(true);
    });
  });

  describe('validateDateRange', () => {
    it('accepts a window that starts and ends at the same instant', () => {
      expect(validateDateRange('2025-01-01T00:00:00', '2025-01-01T00:00:00', 'UTC').isValid).toBe(true);
    });

    it('rejects missing, unparsable and reversed windows', () => {
      expect(validateDateRange('', '2025-01-01', 'UTC').error).toBe('Both start_date and end_date are required');
      expect(validateDateRange('soon', '2025-01-01', 'UTC').error).toBe('start_date "soon" is not a valid date');
      expect(validateDateRange('2025-01-01', 'later', 'UTC').error).toBe('end_date "later" is not a valid date');
      expect(validateDateRange('2025-01-03', '2025-01-01', 'UTC').error).toBe('end_date must be on or after start_date');
    });
  });

  describe('validateOverrideRequest', () => {
    const request = { user_id: ALICE.id, start_date: '2025-01-01', end_date: '2025-01-02' };

    it('accepts a known user with a valid window', () => {
      expect(validateOverrideRequest(request, TEST_USERS, 'UTC')).toEqual({ isValid: true });
    });

    it('rejects unknown users', () => {
      expect(validateOverrideRequest({ ...request, user_id: 'user-gone' }, TEST_USERS, 'UTC')).toEqual({
        isValid: false,
        error: 'User user-gone not found',
      });
    });

    it('checks the window before the user', () => {
      expect(validateOverrideRequest({ ...request, user_id: 'user-gone', end_date: '2024-12-31' }, TEST_USERS, 'UTC').error).toBe(
        'end_date must be on or after start_date',
      );
    });
  });

  describe('validateRotationInput', () => {
    const rotation = { name: 'Primary', type: 'weekly', user_ids: [ALICE.id], start_date: '2025-01-06', active: true };

    it('accepts a well-formed rotation', () => {
      expect(validateRotationInput(rotation, 'UTC').isValid).toBe(true);
    });

    it('rejects unknown periods', () => {
      expect(validateRotationInput({ ...rotation, type: 'hourly' }, 'UTC').error).toBe(
        'type must be one of daily, weekly, monthly, yearly (got "hourly")',
      );
    });

    it('allows an inactive rotation without members but not an active one', () => {
      expect(validateRotationInput({ ...rotation, user_ids: [], active: false }, 'UTC').isValid).toBe(true);
      expect(validateRotationInput({ ...rotation, user_ids: [] }, 'UTC').error).toBe(
        'An active rotation needs at least one user',
      );
    });

    it('rejects an unparsable anchor', () => {
      expect(validateRotationInput({ ...rotation, start_date: 'next monday' }, 'UTC').error).toBe(
        'start_date "next monday" is not a valid date',
      );
    });
  });

  describe('validateEscalationLevels', () => {
    const level = { level: 2, user_id: ALICE.id, timeout: 30, attempts: 1 };

    it('accepts unique levels from 2 up', () => {
      expect(validateEscalationLevels([level, { ...level, level: 3 }]).isValid).toBe(true);
      expect(validateEscalationLevels([]).isValid).toBe(true);
    });

    it('rejects level 1, duplicates and bad limits', () => {
      expect(validateEscalationLevels([{ ...level, level: 1 }]).error).toBe(
        'Escalation level numbers must be integers >= 2 (got 1)',
      );
      expect(validateEscalationLevels([level, level]).error).toBe('Escalation level 2 is configured more than once');
      expect(validateEscalationLevels([{ ...level, timeout: 0 }]).error).toBe('Escalation level 2 timeout must be positive');
      expect(validateEscalationLevels([{ ...level, attempts: 0 }]).error).toBe(
        'Escalation level 2 attempts must be at least 1',
      );
    });
  });

  describe('validateLegacySchedule', () => {
    const entry = { day: 'Monday', start_hour: 9, end_hour: 17, number: '+15551110000', name: null };

    it('accepts weekday windows inside the day', () => {
      expect(validateLegacySchedule([entry, { ...entry, start_hour: 0, end_hour: 24 }]).isValid).toBe(true);
    });

    it('rejects bad days, empty windows and missing numbers', () => {
      expect(validateLegacySchedule([{ ...entry, day: 'Funday' }]).error).toBe('"Funday" is not a day of the week');
      expect(validateLegacySchedule([{ ...entry, end_hour: 9 }]).error).toBe('Invalid hour window 9-9 for Monday');
      expect(validateLegacySchedule([{ ...entry, number: '' }]).error).toBe(
        'Legacy schedule entry for Monday has no number',
      );
    });
  });

  describe('validateWebhookInput', () => {
    const webhook = { name: 'Chat', url: 'https://hooks.example.test/one', type: 'slack', events: ['user_created'] };

    it('accepts http(s) URLs and known kinds', () => {
      expect(validateWebhookInput(webhook).isValid).toBe(true);
    });

    it('rejects bad URLs and unknown kinds', () => {
      expect(validateWebhookInput({ ...webhook, url: 'not a url' }).error).toBe('url "not a url" is not a valid URL');
      expect(validateWebhookInput({ ...webhook, url: 'ftp://hooks.example.test' }).error).toBe(
        'url must use http or https',
      );
      expect(validateWebhookInput({ ...webhook, type: 'pagerduty' }).error).toBe(
        'type must be one of slack, discord, teams, generic (got "pagerduty")',
      );
    });
  });
});
