export type VestingErrorCode =
  | 'InvalidBeneficiary'
  | 'InvalidAddress'
  | 'InvalidAmount'
  | 'InvalidPercent'
  | 'InvalidTimeline'
  | 'LengthMismatch'
  | 'ScheduleLimitExceeded'
  | 'Unauthorized'
  | 'NoSchedules'
  | 'NothingToClaim'
  | 'NothingToWithdraw'
  | 'RecoveryAccountNotSet'
  | 'TransferFailed'
  | 'TransferUnconfirmed'
  | 'ReentrantCall';

export type VestingErrorCategory = 'validation' | 'authorization' | 'state' | 'collaborator' | 'concurrency';

const CATEGORY_BY_CODE: Record<VestingErrorCode, VestingErrorCategory> = {
  InvalidBeneficiary: 'validation',
  InvalidAddress: 'validation',
  InvalidAmount: 'validation',
  InvalidPercent: 'validation',
  InvalidTimeline: 'validation',
  LengthMismatch: 'validation',
  ScheduleLimitExceeded: 'validation',
  Unauthorized: 'authorization',
  NoSchedules: 'state',
  NothingToClaim: 'state',
  NothingToWithdraw: 'state',
  RecoveryAccountNotSet: 'state',
  TransferFailed: 'collaborator',
  TransferUnconfirmed: 'collaborator',
  ReentrantCall: 'concurrency',
};

/**
 * Every rejected vesting operation throws one of these. The operation has
 * made no lasting state change by the time it reaches the caller, except
 * for `TransferUnconfirmed`: the transfer was broadcast and may still land,
 * so the bookkeeping that assumes it did is kept.
 */
export class VestingError extends Error {
  readonly code: VestingErrorCode;
  readonly category: VestingErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: VestingErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VestingError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.details = details;
  }
}

export function isVestingError(error: unknown, code?: VestingErrorCode): error is VestingError {
  return error instanceof VestingError && (code === undefined || error.code === code);
}
