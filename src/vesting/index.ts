/**
 * Vesting ledger public API
 */

export { VestingService } from './VestingService.js';
export type { Solvency, VestingServiceOptions } from './VestingService.js';
export { createVestingRuntime } from './bootstrap.js';
export type { RuntimeOverrides, VestingRuntime } from './bootstrap.js';
export { dueAt, unlockedAt, upfrontFor } from './unlock.js';
export { VestingError, isVestingError } from './errors.js';
export type { VestingErrorCategory, VestingErrorCode } from './errors.js';
export { ManualClock, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { LoggingEventSink, RecordingEventSink } from './events.js';
export type { VestingEventSink } from './events.js';
export { ReentrancyGuard } from './guard.js';
export * from './store/index.js';
export * from './token/index.js';
export type * from './types.js';
