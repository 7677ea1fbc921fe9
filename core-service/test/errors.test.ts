/**
 * Errors & Logging - Test Suite
 *
 * Error message extraction, code formatting, the status registry and
 * ServiceError logging through log subscribers.
 */

import { describe, it, expect } from 'vitest';
import {
  createServiceError,
  extractServiceFromCode,
  formatToCapitalCamelCase,
  getAllErrorCodes,
  getErrorMessage,
  getErrorStatus,
  isDuplicateKeyError,
  normalizeError,
  registerServiceErrorCodes,
  ServiceError,
  subscribeToLogs,
  withCorrelationId,
  type LogEntry,
} from '../src/index.js';

registerServiceErrorCodes(['MSTestWidgetNotFound', 'MSTestWidgetBroken'], { MSTestWidgetNotFound: 404 });

// ═══════════════════════════════════════════════════════════════════
// GENERIC UTILITIES
// ═══════════════════════════════════════════════════════════════════

describe('getErrorMessage', () => {
  it('should read Error messages', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should pass strings through', () => {
    expect(getErrorMessage('plain failure')).toBe('plain failure');
  });

  it('should stringify a message property on plain objects', () => {
    expect(getErrorMessage({ message: 42 })).toBe('42');
  });

  it('should stringify anything else', () => {
    expect(getErrorMessage(17)).toBe('17');
    expect(getErrorMessage(null)).toBe('null');
  });
});

describe('normalizeError', () => {
  it('should keep the stack of Error instances', () => {
    const error = new Error('with stack');
    expect(normalizeError(error)).toEqual({ message: 'with stack', stack: error.stack });
  });

  it('should return only a message for non-errors', () => {
    expect(normalizeError('nope')).toEqual({ message: 'nope' });
  });
});

describe('formatToCapitalCamelCase', () => {
  it('should convert sentences and snake case', () => {
    expect(formatToCapitalCamelCase('user not found')).toBe('UserNotFound');
    expect(formatToCapitalCamelCase('prize_not_found')).toBe('PrizeNotFound');
  });

  it('should keep codes that are already capitalized', () => {
    expect(formatToCapitalCamelCase('MSRewardsPrizeNotFound')).toBe('MSRewardsPrizeNotFound');
  });

  it('should fall back to RuntimeError for empty input', () => {
    expect(formatToCapitalCamelCase('')).toBe('RuntimeError');
  });
});

// ═══════════════════════════════════════════════════════════════════
// SERVICE ERRORS
// ═══════════════════════════════════════════════════════════════════

describe('ServiceError', () => {
  it('should carry code, registered status and extensions', () => {
    const error = new ServiceError('MSTestWidgetNotFound', { widgetId: 7 });
    expect(error.message).toBe('MSTestWidgetNotFound');
    expect(error.code).toBe('MSTestWidgetNotFound');
    expect(error.status).toBe(404);
    expect(error.extensions).toEqual({ widgetId: 7, code: 'MSTestWidgetNotFound' });
    expect(error.name).toBe('ServiceError');
  });

  it('should map unregistered statuses to 500', () => {
    expect(new ServiceError('MSTestWidgetBroken').status).toBe(500);
    expect(getErrorStatus('MSTestUnknown')).toBe(500);
  });

  it('should build a response body without the stack', () => {
    const error = new ServiceError('MSTestWidgetNotFound', { widgetId: 7 });
    expect(error.toResponse()).toEqual({
      status: 404,
      body: { error: 'MSTestWidgetNotFound', details: { widgetId: 7, code: 'MSTestWidgetNotFound' } },
    });
  });

  it('should wrap foreign errors and return service errors as-is', () => {
    const wrapped = ServiceError.format(new Error('disk full'));
    expect(wrapped.code).toBe('DiskFull');
    expect(wrapped.extensions.originalError).toBe('disk full');

    const original = new ServiceError('MSTestWidgetBroken');
    expect(ServiceError.format(original)).toBe(original);
  });

  it('should log on construction with the active correlation id', async () => {
    const entries: LogEntry[] = [];
    const unsubscribe = subscribeToLogs(entry => entries.push(entry));
    try {
      await withCorrelationId('corr-1', async () => {
        new ServiceError('MSTestWidgetNotFound', { widgetId: 3 });
      });
    } finally {
      unsubscribe();
    }

    const logged = entries.find(entry => entry.message === 'Service Error');
    expect(logged?.level).toBe('error');
    expect(logged?.correlationId).toBe('corr-1');
    expect(logged?.data?.code).toBe('MSTestWidgetNotFound');
    expect(logged?.data?.status).toBe(404);
  });

  it('should prefix codes with the service name', () => {
    const error = createServiceError('rewards', 'prize not found');
    expect(error.code).toBe('MSRewardsPrizeNotFound');
  });
});

describe('Error code registry', () => {
  it('should list registered codes sorted', () => {
    const codes = getAllErrorCodes();
    expect(codes).toContain('MSTestWidgetBroken');
    expect(codes.indexOf('MSTestWidgetBroken')).toBeLessThan(codes.indexOf('MSTestWidgetNotFound'));
  });

  it('should extract the service from a code', () => {
    expect(extractServiceFromCode('MSRewardsPrizeNotFound')).toBe('Rewards');
    expect(extractServiceFromCode('PrizeNotFound')).toBeNull();
  });
});

// ═══════════════════════════════════════════════════════════════════
// MONGODB ERRORS
// ═══════════════════════════════════════════════════════════════════

describe('isDuplicateKeyError', () => {
  it('should recognise duplicate key codes', () => {
    expect(isDuplicateKeyError({ code: 11000 })).toBe(true);
    expect(isDuplicateKeyError({ code: 11001 })).toBe(true);
    expect(isDuplicateKeyError({ codeName: 'DuplicateKey' })).toBe(true);
  });

  it('should recognise duplicate key messages', () => {
    expect(isDuplicateKeyError(new Error('E11000 duplicate key error collection: rewards.user_rewards'))).toBe(true);
  });

  it('should reject other errors', () => {
    expect(isDuplicateKeyError(new Error('connection reset'))).toBe(false);
    expect(isDuplicateKeyError({ code: 112 })).toBe(false);
    expect(isDuplicateKeyError(undefined)).toBe(false);
  });
});
