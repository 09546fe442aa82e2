import type { Input } from '../io/input.js';
import type { Output } from '../io/output.js';
import type { Message } from '../messages/message.js';
import type { ScheduledEvent } from '../scheduler/event.js';
import { SensorReadError } from '../types/errors.js';
import { addMs } from '../utils/time.js';
import { BaseController, assertInterval, parseSample } from './controller.js';
import type { BaseControllerOptions } from './controller.js';

export interface BidirectionalThresholdOptions extends BaseControllerOptions {
  threshold: number;
  /** Half-width of the band around the threshold where nothing is driven */
  tolerance: number;
  intervalMs: number;
  input: Input;
  increaseOutput: Output;
  decreaseOutput: Output;
}

export type ToleranceState = 'above' | 'below' | 'within';

const STATE_LABELS: Record<ToleranceState, string> = {
  above: 'Above Threshold',
  below: 'Below Threshold',
  within: 'Within Tolerance',
};

export function classify(value: number, threshold: number, tolerance: number): ToleranceState {
  if (value > threshold + tolerance) return 'above';
  if (value < threshold - tolerance) return 'below';
  return 'within';
}

/**
 * Drives an increase output below the tolerance band and a decrease output
 * above it. The zone is recomputed on every read, so repeated reads in the
 * same zone repeat the same commands.
 */
export class BidirectionalThresholdController extends BaseController {
  readonly kind = 'bidirectional' as const;

  private readonly threshold: number;
  private readonly tolerance: number;
  private readonly intervalMs: number;
  private readonly input: Input;
  private readonly increaseOutput: Output;
  private readonly decreaseOutput: Output;

  constructor(options: BidirectionalThresholdOptions) {
    super(options);
    assertInterval(options.intervalMs);
    if (!(options.tolerance >= 0)) {
      throw new RangeError(`Tolerance must be >= 0, got ${options.tolerance}`);
    }
    this.threshold = options.threshold;
    this.tolerance = options.tolerance;
    this.intervalMs = options.intervalMs;
    this.input = options.input;
    this.increaseOutput = options.increaseOutput;
    this.decreaseOutput = options.decreaseOutput;
  }

  getOutputs(): Record<string, Output> {
    return { increase: this.increaseOutput, decrease: this.decreaseOutput };
  }

  protected arm(now: Date): void {
    this.scheduler.scheduleRead(addMs(now, this.intervalMs));
  }

  protected handle(event: ScheduledEvent, time: Date): Message {
    if (event.action !== 'read') {
      return this.unexpected(event);
    }

    this.scheduler.scheduleRead(addMs(time, this.intervalMs));

    const raw = this.input.read();
    event.setValue(raw);
    const value = parseSample(raw);
    if (value === null) {
      throw new SensorReadError(this.getName(), raw);
    }

    const state = classify(value, this.threshold, this.tolerance);
    switch (state) {
      case 'above':
        this.decreaseOutput.activate();
        this.increaseOutput.deactivate();
        break;
      case 'below':
        this.increaseOutput.activate();
        this.decreaseOutput.deactivate();
        break;
      case 'within':
        this.increaseOutput.deactivate();
        this.decreaseOutput.deactivate();
        break;
    }

    return this.message(STATE_LABELS[state], time, raw);
  }
}
