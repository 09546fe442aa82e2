import { Message } from '../messages/message.js';
import type { Output } from '../io/output.js';
import { Scheduler } from '../scheduler/scheduler.js';
import type { ScheduledEvent } from '../scheduler/event.js';
import type { ControllerKind } from '../types/index.js';
import { ControllerStateError, UnexpectedActionError } from '../types/errors.js';

/**
 * What a ControllerGroup (and the status API) sees of a controller
 */
export interface Controller {
  readonly kind: ControllerKind;
  setName(name: string): void;
  getName(): string;
  start(now: Date): void;
  isStarted(): boolean;
  poll(time: Date): Message | undefined;
  getScheduler(): Scheduler;
  getOutputs(): Record<string, Output>;
}

export interface BaseControllerOptions {
  name?: string;
  historyLimit?: number;
}

/**
 * Lifecycle shared by every controller: constructed unscheduled, armed by
 * start(), then driven by poll().
 */
export abstract class BaseController implements Controller {
  abstract readonly kind: ControllerKind;

  protected readonly scheduler: Scheduler;
  private name: string;
  private started = false;

  constructor(options: BaseControllerOptions) {
    this.name = options.name ?? '';
    this.scheduler = new Scheduler({ historyLimit: options.historyLimit });
  }

  setName(name: string): void {
    this.name = name;
  }

  getName(): string {
    return this.name;
  }

  isStarted(): boolean {
    return this.started;
  }

  getScheduler(): Scheduler {
    return this.scheduler;
  }

  start(now: Date): void {
    if (this.started) {
      throw new ControllerStateError(`Controller "${this.name}" is already started`, this.name);
    }
    this.started = true;
    this.arm(now);
  }

  poll(time: Date): Message | undefined {
    if (!this.started) {
      throw new ControllerStateError(`Controller "${this.name}" polled before start()`, this.name);
    }

    const event = this.scheduler.attemptExecution(time);
    if (!event) {
      return undefined;
    }
    return this.handle(event, time);
  }

  abstract getOutputs(): Record<string, Output>;

  /** Schedule the first event(s) */
  protected abstract arm(now: Date): void;

  /** Act on a fired event and describe the transition */
  protected abstract handle(event: ScheduledEvent, time: Date): Message;

  protected message(content: string, time: Date, readState?: string): Message {
    return new Message(this.name, content, time, readState);
  }

  protected unexpected(event: ScheduledEvent): never {
    throw new UnexpectedActionError(this.name, event.action);
  }
}

/**
 * Parse a sensor sample as a finite number, or null
 */
export function parseSample(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function assertInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`Interval must be a positive number of milliseconds, got ${intervalMs}`);
  }
}
