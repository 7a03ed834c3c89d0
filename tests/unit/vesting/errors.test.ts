import { describe, it, expect } from 'vitest';
import { VestingError, isVestingError } from '../../../src/vesting/errors.js';

describe('VestingError', () => {
  it('derives the category from the code', () => {
    expect(new VestingError('InvalidPercent', 'x').category).toBe('validation');
    expect(new VestingError('ScheduleLimitExceeded', 'x').category).toBe('validation');
    expect(new VestingError('Unauthorized', 'x').category).toBe('authorization');
    expect(new VestingError('NothingToWithdraw', 'x').category).toBe('state');
    expect(new VestingError('TransferFailed', 'x').category).toBe('collaborator');
    expect(new VestingError('TransferUnconfirmed', 'x').category).toBe('collaborator');
    expect(new VestingError('ReentrantCall', 'x').category).toBe('concurrency');
  });

  it('carries details and cause', () => {
    const cause = new Error('rpc down');
    const error = new VestingError('TransferFailed', 'Token transfer out failed', { amount: '5' }, { cause });

    expect(error.name).toBe('VestingError');
    expect(error.details).toEqual({ amount: '5' });
    expect(error.cause).toBe(cause);
  });
});

describe('isVestingError', () => {
  it('matches by class and optionally by code', () => {
    const error = new VestingError('NoSchedules', 'none');

    expect(isVestingError(error)).toBe(true);
    expect(isVestingError(error, 'NoSchedules')).toBe(true);
    expect(isVestingError(error, 'NothingToClaim')).toBe(false);
    expect(isVestingError(new Error('none'))).toBe(false);
  });
});
