/**
 * Schedule store package index
 */

export type { IScheduleStore } from './IScheduleStore.js';
export { MemoryScheduleStore } from './MemoryScheduleStore.js';
export { SqliteScheduleStore } from './SqliteScheduleStore.js';
export { ScheduleStoreFactory } from './ScheduleStoreFactory.js';
export type * from './types.js';
