import type { ControllerGroup } from '../controllers/group.js';
import { MessageLog } from '../messages/log.js';
import type { Message } from '../messages/message.js';
import { Logger } from '../utils/logger.js';
import { emitWithin } from './sinks.js';
import type { MessageSink } from './sinks.js';

export const DEFAULT_SINK_TIMEOUT_MS = 5000;

export interface RuntimeOptions {
  intervalMs: number;
  sinks?: MessageSink[];
  log?: MessageLog;
  logger?: Logger;
  clock?: () => Date;
  /** Longest a sink may take to deliver one batch before it counts as failed */
  sinkTimeoutMs?: number;
}

export interface TickResult {
  messages: Message[];
  failedSinks: string[];
}

/**
 * Drives a ControllerGroup on a fixed cadence and hands the produced messages
 * to every sink. Delivery failures are logged, never retried, and a sink that
 * does not settle within `sinkTimeoutMs` is treated as failed.
 */
export class Runtime {
  private readonly intervalMs: number;
  private readonly sinks: MessageSink[];
  private readonly log: MessageLog;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly sinkTimeoutMs: number;
  private stopRequested = false;
  private running = false;
  private wake: (() => void) | undefined;

  constructor(
    private readonly group: ControllerGroup,
    options: RuntimeOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be positive, got ${options.intervalMs}`);
    }
    const sinkTimeoutMs = options.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS;
    if (!(sinkTimeoutMs > 0)) {
      throw new RangeError(`sinkTimeoutMs must be positive, got ${sinkTimeoutMs}`);
    }
    this.intervalMs = options.intervalMs;
    this.sinkTimeoutMs = sinkTimeoutMs;
    this.sinks = options.sinks ?? [];
    this.log = options.log ?? new MessageLog();
    this.logger = options.logger ?? new Logger('runtime');
    this.clock = options.clock ?? (() => new Date());
  }

  getGroup(): ControllerGroup {
    return this.group;
  }

  getLog(): MessageLog {
    return this.log;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One poll of the group at `now`, followed by delivery
   */
  async tick(now: Date = this.clock()): Promise<TickResult> {
    const { messages, errors } = this.group.pollDetailed(now);

    for (const error of errors) {
      this.logger.warn(error.message);
    }

    if (messages.length === 0) {
      return { messages, failedSinks: [] };
    }

    this.log.append(messages);
    for (const message of messages) {
      this.logger.info(`${message.name}: ${message.content}${message.readState ? ` (${message.readState})` : ''}`);
    }

    const results = await Promise.allSettled(this.sinks.map((sink) => emitWithin(sink, messages, this.sinkTimeoutMs)));
    const failedSinks: string[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const sink = this.sinks[index];
        failedSinks.push(sink.name);
        this.logger.error(`Sink ${sink.name} failed to deliver ${messages.length} message(s):`, result.reason);
      }
    });

    return { messages, failedSinks };
  }

  /**
   * Start the group and tick every interval until stop() is called
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Runtime is already running');
    }
    if (this.stopRequested) {
      throw new Error('Runtime has been stopped');
    }
    this.running = true;

    this.group.start(this.clock());
    this.logger.info(`Polling ${this.group.size} controller(s) every ${this.intervalMs}ms`);

    try {
      while (!this.stopRequested) {
        await new Promise<void>((resolve) => {
          const timer = setTimeout(() => {
            this.wake = undefined;
            resolve();
          }, this.intervalMs);
          this.wake = () => {
            clearTimeout(timer);
            this.wake = undefined;
            resolve();
          };
        });

        if (this.stopRequested) {
          break;
        }
        await this.tick();
      }
    } finally {
      this.running = false;
      this.logger.info('Runtime stopped');
    }
  }

  stop(): void {
    this.stopRequested = true;
    this.wake?.();
  }
}
