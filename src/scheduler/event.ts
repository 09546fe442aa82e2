import type { Action, EventSummary } from '../types/index.js';

/**
 * A scheduled action bound to an instant
 */
export class ScheduledEvent {
  private value: string | undefined;

  constructor(
    readonly action: Action,
    readonly timestamp: Date
  ) {}

  /**
   * Due at the scheduled instant and at every later one
   */
  shouldExecute(time: Date): boolean {
    return this.timestamp.getTime() <= time.getTime();
  }

  getValue(): string | undefined {
    return this.value;
  }

  setValue(value: string): void {
    this.value = value;
  }

  toSummary(): EventSummary {
    return {
      action: this.action,
      timestamp: this.timestamp.toISOString(),
      value: this.value ?? null,
    };
  }
}
