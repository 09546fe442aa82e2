import { CallbackInput } from '../io/input.js';
import { CallbackOutput } from '../io/output.js';
import { ControllerGroup } from '../controllers/group.js';
import { ThresholdController } from '../controllers/threshold.js';
import type { Message } from '../messages/message.js';
import { MessageLog } from '../messages/log.js';
import { Logger } from '../utils/logger.js';
import { Runtime } from './runtime.js';
import type { MessageSink } from './sinks.js';

const T0 = new Date('2024-06-01T08:00:00Z');
const SECOND = 1000;
const after = (seconds: number) => new Date(T0.getTime() + seconds * SECOND);

class RecordingSink implements MessageSink {
  readonly batches: string[][] = [];

  constructor(readonly name = 'recording') {}

  async emit(messages: readonly Message[]): Promise<void> {
    this.batches.push(messages.map((m) => `${m.name}:${m.content}`));
  }
}

class StalledSink implements MessageSink {
  readonly name = 'stalled';

  emit(): Promise<void> {
    return new Promise(() => {});
  }
}

class FailingSink implements MessageSink {
  readonly name = 'failing';

  async emit(): Promise<void> {
    throw new Error('collector unreachable');
  }
}

function threshold(name: string, read: () => string) {
  return new ThresholdController({
    name,
    threshold: 10,
    intervalMs: SECOND,
    input: new CallbackInput(read),
    output: new CallbackOutput(),
  });
}

describe('Runtime', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('tick', () => {
    it('should deliver the messages of a poll to every sink and the log', async () => {
      const group = new ControllerGroup().add(threshold('a', () => '20')).add(threshold('b', () => '1'));
      group.start(T0);
      const first = new RecordingSink('first');
      const second = new RecordingSink('second');
      const log = new MessageLog();
      const runtime = new Runtime(group, { intervalMs: SECOND, sinks: [first, second], log });

      const result = await runtime.tick(after(1));

      expect(result.failedSinks).toEqual([]);
      expect(first.batches).toEqual([['a:Above Threshold', 'b:Below Threshold']]);
      expect(second.batches).toEqual(first.batches);
      expect(log.recent().map((m) => m.name)).toEqual(['a', 'b']);
    });

    it('should not call sinks when nothing fired', async () => {
      const group = new ControllerGroup().add(threshold('a', () => '20'));
      group.start(T0);
      const sink = new RecordingSink();
      const runtime = new Runtime(group, { intervalMs: SECOND, sinks: [sink] });

      const result = await runtime.tick(after(0.5));

      expect(result.messages).toEqual([]);
      expect(sink.batches).toEqual([]);
    });

    it('should keep delivering to other sinks when one fails', async () => {
      const group = new ControllerGroup().add(threshold('a', () => '20'));
      group.start(T0);
      const sink = new RecordingSink();
      const runtime = new Runtime(group, { intervalMs: SECOND, sinks: [new FailingSink(), sink] });

      const result = await runtime.tick(after(1));

      expect(result.failedSinks).toEqual(['failing']);
      expect(sink.batches).toHaveLength(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should give up on a sink that does not settle in time', async () => {
      vi.useFakeTimers();
      const group = new ControllerGroup().add(threshold('a', () => '20'));
      group.start(T0);
      const sink = new RecordingSink();
      const runtime = new Runtime(group, {
        intervalMs: SECOND,
        sinks: [new StalledSink(), sink],
        sinkTimeoutMs: 50,
      });

      const pending = runtime.tick(after(1));
      await vi.advanceTimersByTimeAsync(50);
      const result = await pending;

      expect(result.failedSinks).toEqual(['stalled']);
      expect(sink.batches).toEqual([['a:Above Threshold']]);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should log a bad sample and still deliver the other messages', async () => {
      const group = new ControllerGroup().add(threshold('broken', () => '?')).add(threshold('ok', () => '20'));
      group.start(T0);
      const sink = new RecordingSink();
      const runtime = new Runtime(group, {
        intervalMs: SECOND,
        sinks: [sink],
        logger: new Logger('test'),
      });

      await runtime.tick(after(1));

      expect(sink.batches).toEqual([['ok:Above Threshold']]);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining('Controller "broken" read a non-numeric sample: "?"')
      );
    });
  });

  describe('run', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should start the group and poll every interval until stopped', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(T0);
      const controller = threshold('a', () => '20');
      const group = new ControllerGroup().add(controller);
      const sink = new RecordingSink();
      const runtime = new Runtime(group, { intervalMs: SECOND, sinks: [sink] });

      const done = runtime.run();
      expect(runtime.isRunning()).toBe(true);
      expect(controller.isStarted()).toBe(true);

      await vi.advanceTimersByTimeAsync(SECOND);
      expect(sink.batches).toEqual([['a:Above Threshold']]);

      await vi.advanceTimersByTimeAsync(SECOND);
      expect(sink.batches).toHaveLength(2);

      runtime.stop();
      await done;
      expect(runtime.isRunning()).toBe(false);
    });

    it('should keep polling while a sink never settles', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(T0);
      let reads = 0;
      const group = new ControllerGroup().add(
        threshold('a', () => {
          reads += 1;
          return '20';
        })
      );
      const runtime = new Runtime(group, { intervalMs: SECOND, sinks: [new StalledSink()], sinkTimeoutMs: 100 });

      const done = runtime.run();
      // each tick waits the interval, then at most the sink timeout
      await vi.advanceTimersByTimeAsync(3 * SECOND + 200);
      expect(reads).toBe(3);

      runtime.stop();
      await vi.advanceTimersByTimeAsync(100);
      await done;
      expect(runtime.isRunning()).toBe(false);
    });

    it('should not start once stop has been requested', async () => {
      const controller = threshold('a', () => '20');
      const runtime = new Runtime(new ControllerGroup().add(controller), { intervalMs: SECOND });

      runtime.stop();

      await expect(runtime.run()).rejects.toThrow('Runtime has been stopped');
      expect(controller.isStarted()).toBe(false);
    });

    it('should refuse to run twice at once', async () => {
      vi.useFakeTimers();
      const runtime = new Runtime(new ControllerGroup(), { intervalMs: SECOND });

      const done = runtime.run();
      await expect(runtime.run()).rejects.toThrow('Runtime is already running');

      runtime.stop();
      await done;
    });
  });

  it('should reject a non-positive interval', () => {
    expect(() => new Runtime(new ControllerGroup(), { intervalMs: 0 })).toThrow(RangeError);
  });

  it('should reject a non-positive sink timeout', () => {
    expect(() => new Runtime(new ControllerGroup(), { intervalMs: SECOND, sinkTimeoutMs: 0 })).toThrow(RangeError);
  });
});
