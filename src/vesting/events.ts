import type pino from 'pino';
import { vestingLogger } from '../logging/index.js';
import type { VestingEvent, VestingEventType } from './types.js';

/**
 * Receives structured notifications for off-system observers. Nothing in
 * the vesting service depends on what a sink does with them.
 */
export interface VestingEventSink {
  emit(event: VestingEvent): void;
}

function toLogFields(event: VestingEvent): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    fields[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return fields;
}

export class LoggingEventSink implements VestingEventSink {
  private readonly log: pino.Logger;

  constructor(log: pino.Logger = vestingLogger.child({ sink: 'events' })) {
    this.log = log;
  }

  emit(event: VestingEvent): void {
    this.log.info({ event: toLogFields(event) }, event.type);
  }
}

export class RecordingEventSink implements VestingEventSink {
  readonly events: VestingEvent[] = [];

  emit(event: VestingEvent): void {
    this.events.push(event);
  }

  ofType<T extends VestingEventType>(type: T): Extract<VestingEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<VestingEvent, { type: T }> => event.type === type);
  }
}
