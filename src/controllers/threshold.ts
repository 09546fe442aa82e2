import type { Input } from '../io/input.js';
import type { Output } from '../io/output.js';
import type { Message } from '../messages/message.js';
import type { ScheduledEvent } from '../scheduler/event.js';
import { SensorReadError } from '../types/errors.js';
import { addMs } from '../utils/time.js';
import { BaseController, assertInterval, parseSample } from './controller.js';
import type { BaseControllerOptions } from './controller.js';

export interface ThresholdOptions extends BaseControllerOptions {
  threshold: number;
  /** Activate below the threshold instead of above */
  inverted?: boolean;
  intervalMs: number;
  input: Input;
  output: Output;
}

export const ABOVE_THRESHOLD = 'Above Threshold';
export const BELOW_THRESHOLD = 'Below Threshold';

/**
 * Samples an input every interval and switches one output on one side of a
 * set point. A sample equal to the threshold counts as below.
 */
export class ThresholdController extends BaseController {
  readonly kind = 'threshold' as const;

  private threshold: number;
  private readonly inverted: boolean;
  private readonly intervalMs: number;
  private readonly input: Input;
  private readonly output: Output;

  constructor(options: ThresholdOptions) {
    super(options);
    assertInterval(options.intervalMs);
    this.threshold = options.threshold;
    this.inverted = options.inverted ?? false;
    this.intervalMs = options.intervalMs;
    this.input = options.input;
    this.output = options.output;
  }

  getThreshold(): number {
    return this.threshold;
  }

  setThreshold(threshold: number): void {
    this.threshold = threshold;
  }

  isInverted(): boolean {
    return this.inverted;
  }

  getOutputs(): Record<string, Output> {
    return { output: this.output };
  }

  protected arm(now: Date): void {
    this.scheduler.scheduleRead(addMs(now, this.intervalMs));
  }

  protected handle(event: ScheduledEvent, time: Date): Message {
    if (event.action !== 'read') {
      return this.unexpected(event);
    }

    // Re-arm first so a bad sample does not stop the controller
    this.scheduler.scheduleRead(addMs(time, this.intervalMs));

    const raw = this.input.read();
    event.setValue(raw);
    const value = parseSample(raw);
    if (value === null) {
      throw new SensorReadError(this.getName(), raw);
    }

    const above = value > this.threshold;
    if (above !== this.inverted) {
      this.output.activate();
    } else {
      this.output.deactivate();
    }

    return this.message(above ? ABOVE_THRESHOLD : BELOW_THRESHOLD, time, raw);
  }
}
