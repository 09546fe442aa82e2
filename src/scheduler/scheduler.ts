import type { Action } from '../types/index.js';
import { ScheduledEvent } from './event.js';

export const DEFAULT_HISTORY_LIMIT = 100;

export interface SchedulerOptions {
  /** Fired events kept in history; oldest are dropped first. Infinity keeps all. */
  historyLimit?: number;
}

/**
 * Pending and fired events of a single controller.
 *
 * An event is either pending or in history, never both, and moves at most once.
 * When several events are due, the earliest timestamp fires first; equal
 * timestamps fire in the order they were scheduled.
 */
export class Scheduler {
  private readonly pending: ScheduledEvent[] = [];
  private readonly history: ScheduledEvent[] = [];
  private readonly historyLimit: number;
  private firedCount = 0;

  constructor(options: SchedulerOptions = {}) {
    const limit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    if (!(limit >= 0)) {
      throw new RangeError(`historyLimit must be >= 0, got ${limit}`);
    }
    this.historyLimit = limit;
  }

  scheduleOn(timestamp: Date): ScheduledEvent {
    return this.schedule('on', timestamp);
  }

  scheduleOff(timestamp: Date): ScheduledEvent {
    return this.schedule('off', timestamp);
  }

  scheduleRead(timestamp: Date): ScheduledEvent {
    return this.schedule('read', timestamp);
  }

  hasPendingEvents(): boolean {
    return this.pending.length > 0;
  }

  getPendingEvents(): readonly ScheduledEvent[] {
    return this.pending;
  }

  getHistory(): readonly ScheduledEvent[] {
    return this.history;
  }

  /**
   * Events fired since construction, including those trimmed from history
   */
  getFiredCount(): number {
    return this.firedCount;
  }

  /**
   * Fire at most one due event, moving it from pending to history
   */
  attemptExecution(time: Date): ScheduledEvent | undefined {
    let index = -1;
    for (let i = 0; i < this.pending.length; i++) {
      const candidate = this.pending[i];
      if (!candidate.shouldExecute(time)) {
        continue;
      }
      if (index === -1 || candidate.timestamp.getTime() < this.pending[index].timestamp.getTime()) {
        index = i;
      }
    }

    if (index === -1) {
      return undefined;
    }

    const [event] = this.pending.splice(index, 1);
    this.record(event);
    return event;
  }

  private schedule(action: Action, timestamp: Date): ScheduledEvent {
    const event = new ScheduledEvent(action, timestamp);
    this.pending.push(event);
    return event;
  }

  private record(event: ScheduledEvent): void {
    this.firedCount++;
    if (this.historyLimit === 0) {
      return;
    }
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
