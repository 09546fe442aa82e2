import { CallbackOutput } from '../io/output.js';
import { MS_PER_HOUR } from '../utils/time.js';
import { TimedOutputController } from './timed.js';

const at = (iso: string) => new Date(iso);

function setup(start: { hour: number; minute?: number; second?: number }, durationHours: number) {
  const output = new CallbackOutput();
  const controller = new TimedOutputController({
    name: 'lights',
    output,
    startTime: { hour: start.hour, minute: start.minute ?? 0, second: start.second ?? 0 },
    durationMs: durationHours * MS_PER_HOUR,
  });
  return { controller, output };
}

const pendingTimes = (controller: TimedOutputController) =>
  controller
    .getScheduler()
    .getPendingEvents()
    .map((e) => `${e.action}@${e.timestamp.toISOString()}`);

describe('TimedOutputController', () => {
  it('should run a 05:00 + 12h duty cycle', () => {
    const { controller, output } = setup({ hour: 5 }, 12);
    controller.start(at('2024-06-01T00:00:00Z'));

    expect(controller.poll(at('2024-06-01T04:59:59Z'))).toBeUndefined();
    expect(output.getState()).toBeUndefined();

    const on = controller.poll(at('2024-06-01T05:00:00Z'));
    expect(on?.content).toBe('Activated');
    expect(on?.name).toBe('lights');
    expect(on?.readState).toBeUndefined();
    expect(output.getState()).toBe(true);

    expect(controller.poll(at('2024-06-01T16:59:59Z'))).toBeUndefined();
    expect(output.getState()).toBe(true);

    const off = controller.poll(at('2024-06-01T17:00:00Z'));
    expect(off?.content).toBe('Deactivated');
    expect(output.getState()).toBe(false);
  });

  it('should arm today when started before the start time', () => {
    const { controller } = setup({ hour: 5 }, 12);
    controller.start(at('2024-06-01T04:59:59.500Z'));
    expect(pendingTimes(controller)).toEqual(['on@2024-06-01T05:00:00.000Z']);
  });

  it('should arm tomorrow when started at or after the start time', () => {
    const exactly = setup({ hour: 5 }, 12);
    exactly.controller.start(at('2024-06-01T05:00:00Z'));
    expect(pendingTimes(exactly.controller)).toEqual(['on@2024-06-02T05:00:00.000Z']);

    const later = setup({ hour: 5 }, 12);
    later.controller.start(at('2024-06-01T18:30:00Z'));
    expect(pendingTimes(later.controller)).toEqual(['on@2024-06-02T05:00:00.000Z']);
  });

  it('should re-arm the next day after switching off', () => {
    const { controller } = setup({ hour: 5 }, 12);
    controller.start(at('2024-06-01T00:00:00Z'));
    controller.poll(at('2024-06-01T05:00:00Z'));
    expect(pendingTimes(controller)).toEqual(['off@2024-06-01T17:00:00.000Z']);

    controller.poll(at('2024-06-01T17:00:00Z'));
    expect(pendingTimes(controller)).toEqual(['on@2024-06-02T05:00:00.000Z']);
  });

  it('should let the on period run past midnight', () => {
    const { controller, output } = setup({ hour: 20, minute: 30 }, 8);
    controller.start(at('2024-06-01T12:00:00Z'));

    controller.poll(at('2024-06-01T20:30:00Z'));
    expect(pendingTimes(controller)).toEqual(['off@2024-06-02T04:30:00.000Z']);

    expect(controller.poll(at('2024-06-02T04:30:00Z'))?.content).toBe('Deactivated');
    expect(output.getState()).toBe(false);
    expect(pendingTimes(controller)).toEqual(['on@2024-06-02T20:30:00.000Z']);
  });

  it('should anchor the off time to the date the on event fired', () => {
    const { controller } = setup({ hour: 5 }, 12);
    controller.start(at('2024-06-01T00:00:00Z'));

    // First poll a day late
    expect(controller.poll(at('2024-06-02T03:00:00Z'))?.content).toBe('Activated');
    expect(pendingTimes(controller)).toEqual(['off@2024-06-02T17:00:00.000Z']);
  });

  it('should not fire twice at the same instant', () => {
    const { controller } = setup({ hour: 5 }, 12);
    controller.start(at('2024-06-01T00:00:00Z'));

    expect(controller.poll(at('2024-06-01T05:00:00Z'))).toBeDefined();
    expect(controller.poll(at('2024-06-01T05:00:00Z'))).toBeUndefined();
  });

  it('should reject a negative duration', () => {
    expect(
      () =>
        new TimedOutputController({
          output: new CallbackOutput(),
          startTime: { hour: 5, minute: 0, second: 0 },
          durationMs: -1,
        })
    ).toThrow(RangeError);
  });

  it('should reject a start time outside the day', () => {
    const create = (startTime: { hour: number; minute: number; second: number }) =>
      new TimedOutputController({ output: new CallbackOutput(), startTime, durationMs: MS_PER_HOUR });

    expect(() => create({ hour: 25, minute: 0, second: 0 })).toThrow(new RangeError('Start time out of range: 25:0:0'));
    expect(() => create({ hour: 5, minute: 60, second: 0 })).toThrow(RangeError);
    expect(() => create({ hour: 5, minute: 0, second: 1.5 })).toThrow(RangeError);
    expect(() => create({ hour: 23, minute: 59, second: 59 })).not.toThrow();
  });
});
