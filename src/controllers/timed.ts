import type { Output } from '../io/output.js';
import type { Message } from '../messages/message.js';
import type { ScheduledEvent } from '../scheduler/event.js';
import type { TimeOfDay } from '../types/index.js';
import { MS_PER_DAY, addMs, atTimeOfDay, isValidTimeOfDay, msSinceMidnight, timeOfDayMs } from '../utils/time.js';
import { BaseController } from './controller.js';
import type { BaseControllerOptions } from './controller.js';

export interface TimedOutputOptions extends BaseControllerOptions {
  output: Output;
  /** Daily switch-on time, UTC */
  startTime: TimeOfDay;
  durationMs: number;
}

/**
 * Daily duty cycle anchored to wall-clock time: on at startTime, off
 * durationMs later (possibly past midnight), then on again the next day.
 */
export class TimedOutputController extends BaseController {
  readonly kind = 'timed' as const;

  private readonly output: Output;
  private readonly startTime: TimeOfDay;
  private readonly durationMs: number;

  constructor(options: TimedOutputOptions) {
    super(options);
    if (!Number.isFinite(options.durationMs) || options.durationMs < 0) {
      throw new RangeError(`Duration must be >= 0 milliseconds, got ${options.durationMs}`);
    }
    if (!isValidTimeOfDay(options.startTime)) {
      const { hour, minute, second } = options.startTime;
      throw new RangeError(`Start time out of range: ${hour}:${minute}:${second}`);
    }
    this.output = options.output;
    this.startTime = options.startTime;
    this.durationMs = options.durationMs;
  }

  getOutputs(): Record<string, Output> {
    return { output: this.output };
  }

  protected arm(now: Date): void {
    this.scheduleOn(now);
  }

  protected handle(event: ScheduledEvent, time: Date): Message {
    switch (event.action) {
      case 'on':
        this.output.activate();
        this.scheduleOff(time);
        return this.message('Activated', time);
      case 'off':
        this.output.deactivate();
        this.scheduleOn(time);
        return this.message('Deactivated', time);
      default:
        return this.unexpected(event);
    }
  }

  /** Next occurrence of startTime: today if it has not been reached yet */
  private scheduleOn(time: Date): void {
    const today = atTimeOfDay(time, this.startTime);
    const start = msSinceMidnight(time) < timeOfDayMs(this.startTime) ? today : addMs(today, MS_PER_DAY);
    this.scheduler.scheduleOn(start);
  }

  private scheduleOff(time: Date): void {
    this.scheduler.scheduleOff(addMs(atTimeOfDay(time, this.startTime), this.durationMs));
  }
}
