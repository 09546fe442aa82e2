import { CallbackInput } from '../io/input.js';
import { CallbackOutput } from '../io/output.js';
import { ControllerStateError, SensorReadError, UnexpectedActionError } from '../types/errors.js';
import { ThresholdController } from './threshold.js';

const T0 = new Date('2024-06-01T08:00:00Z');
const MINUTE = 60_000;
const after = (minutes: number) => new Date(T0.getTime() + minutes * MINUTE);

function setup(options: { threshold?: number; inverted?: boolean } = {}) {
  let sample = '0';
  const input = new CallbackInput(() => sample);
  const commands: boolean[] = [];
  const output = new CallbackOutput((on) => commands.push(on));
  const controller = new ThresholdController({
    name: 'sump',
    threshold: options.threshold ?? 10,
    inverted: options.inverted,
    intervalMs: MINUTE,
    input,
    output,
  });

  return {
    controller,
    input,
    output,
    commands,
    setSample: (value: string) => {
      sample = value;
    },
  };
}

describe('ThresholdController', () => {
  describe('lifecycle', () => {
    it('should refuse to poll before start', () => {
      const { controller } = setup();
      expect(() => controller.poll(T0)).toThrow(ControllerStateError);
    });

    it('should refuse to start twice', () => {
      const { controller } = setup();
      controller.start(T0);
      expect(() => controller.start(T0)).toThrow(ControllerStateError);
    });

    it('should arm the first read one interval after start', () => {
      const { controller } = setup();
      expect(controller.isStarted()).toBe(false);
      controller.start(T0);

      expect(controller.isStarted()).toBe(true);
      expect(controller.getScheduler().getPendingEvents().map((e) => e.toSummary())).toEqual([
        { action: 'read', timestamp: '2024-06-01T08:01:00.000Z', value: null },
      ]);
    });

    it('should reject a non-positive interval', () => {
      expect(
        () =>
          new ThresholdController({
            threshold: 1,
            intervalMs: 0,
            input: new CallbackInput(() => '1'),
            output: new CallbackOutput(),
          })
      ).toThrow(RangeError);
    });
  });

  it('should do nothing before the read is due', () => {
    const { controller, output, input } = setup();
    controller.start(T0);

    expect(controller.poll(after(0.5))).toBeUndefined();
    expect(output.getState()).toBeUndefined();
    expect(input.getState()).toBeUndefined();
  });

  it('should activate above the threshold and report the sample', () => {
    const { controller, output, setSample } = setup();
    controller.start(T0);
    setSample('15');

    const message = controller.poll(after(1));

    expect(output.getState()).toBe(true);
    expect(message?.name).toBe('sump');
    expect(message?.content).toBe('Above Threshold');
    expect(message?.readState).toBe('15');
    expect(message?.timestamp.toISOString()).toBe('2024-06-01T08:01:00.000Z');
  });

  it('should deactivate below the threshold', () => {
    const { controller, output, setSample } = setup();
    controller.start(T0);
    setSample('3.5');

    expect(controller.poll(after(1))?.content).toBe('Below Threshold');
    expect(output.getState()).toBe(false);
  });

  it('should classify a sample equal to the threshold as below', () => {
    const { controller, output, setSample } = setup();
    controller.start(T0);
    setSample('10');

    expect(controller.poll(after(1))?.content).toBe('Below Threshold');
    expect(output.getState()).toBe(false);
  });

  describe('inverted', () => {
    it('should activate when the sample equals the threshold', () => {
      const { controller, output, setSample } = setup({ inverted: true });
      controller.start(T0);
      setSample('10');

      expect(controller.poll(after(1))?.content).toBe('Below Threshold');
      expect(output.getState()).toBe(true);
    });

    it('should deactivate above the threshold', () => {
      const { controller, output, setSample } = setup({ inverted: true });
      controller.start(T0);
      setSample('11');

      expect(controller.poll(after(1))?.content).toBe('Above Threshold');
      expect(output.getState()).toBe(false);
    });
  });

  it('should re-arm the next read one interval after the poll time', () => {
    const { controller, setSample } = setup();
    controller.start(T0);
    setSample('12');

    controller.poll(after(5));

    const pending = controller.getScheduler().getPendingEvents();
    expect(pending).toHaveLength(1);
    expect(pending[0].timestamp.toISOString()).toBe('2024-06-01T08:06:00.000Z');
  });

  it('should record the sample on the fired event', () => {
    const { controller, setSample } = setup();
    controller.start(T0);
    setSample('12');

    controller.poll(after(1));

    expect(controller.getScheduler().getHistory()[0].getValue()).toBe('12');
  });

  it('should fire only once when polled twice at the same instant', () => {
    const { controller, commands, setSample } = setup();
    controller.start(T0);
    setSample('12');

    expect(controller.poll(after(1))).toBeDefined();
    expect(controller.poll(after(1))).toBeUndefined();
    expect(commands).toEqual([true]);
  });

  it('should repeat the command on every read in the same zone', () => {
    const { controller, commands, setSample } = setup();
    controller.start(T0);
    setSample('12');

    controller.poll(after(1));
    controller.poll(after(2));
    setSample('2');
    controller.poll(after(3));

    expect(commands).toEqual([true, true, false]);
  });

  it('should use a threshold changed at run time', () => {
    const { controller, output, setSample } = setup();
    controller.start(T0);
    controller.setThreshold(20);
    setSample('15');

    controller.poll(after(1));

    expect(controller.getThreshold()).toBe(20);
    expect(output.getState()).toBe(false);
  });

  describe('malformed samples', () => {
    it('should throw SensorReadError and leave the output alone', () => {
      const { controller, output, setSample } = setup();
      controller.start(T0);
      setSample('not-a-number');

      expect(() => controller.poll(after(1))).toThrow(SensorReadError);
      expect(output.getState()).toBeUndefined();
    });

    it('should keep reading after a bad sample', () => {
      const { controller, output, setSample } = setup();
      controller.start(T0);
      setSample('');
      expect(() => controller.poll(after(1))).toThrow(SensorReadError);

      setSample('42');
      expect(controller.poll(after(2))?.content).toBe('Above Threshold');
      expect(output.getState()).toBe(true);
    });
  });

  it('should treat an on/off event as a logic error', () => {
    const { controller } = setup();
    controller.start(T0);
    controller.getScheduler().scheduleOn(T0);

    expect(() => controller.poll(T0)).toThrow(UnexpectedActionError);
  });
});
