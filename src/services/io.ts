import type { IoResolver } from '../controllers/factory.js';
import { CallbackInput, staticInput } from '../io/input.js';
import type { Input } from '../io/input.js';
import { CallbackOutput } from '../io/output.js';
import type { Output } from '../io/output.js';
import { getLatestReading, publishCommand } from '../mqtt/bridge.js';
import type { InputBinding, OutputBinding } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { setDeviceState } from './devices.js';

export interface IoDependencies {
  latestReading(topic: string): string | undefined;
  publishCommand(device: string, on: boolean): void;
  setKasaState(device: string, on: boolean): Promise<void>;
  logger: Logger;
}

const defaultDependencies: IoDependencies = {
  latestReading: getLatestReading,
  publishCommand,
  setKasaState: setDeviceState,
  logger: new Logger('io'),
};

/**
 * Resolve bindings against the MQTT bridge and the Kasa device cache.
 *
 * MQTT inputs read the latest cached payload (empty until a reading arrives).
 * Kasa commands are sent asynchronously; a failed command is logged and the
 * output keeps its commanded state.
 */
export function createIoResolver(deps: IoDependencies = defaultDependencies): IoResolver {
  return {
    input(binding: InputBinding, controller: string): Input {
      switch (binding.type) {
        case 'mqtt':
          return new CallbackInput(() => {
            const value = deps.latestReading(binding.topic);
            if (value === undefined) {
              deps.logger.warn(`${controller}: no reading received yet on ${binding.topic}`);
            }
            return value ?? '';
          });
        case 'static':
          return staticInput(binding.value);
      }
    },

    output(binding: OutputBinding, controller: string): Output {
      switch (binding.type) {
        case 'mqtt':
          return new CallbackOutput((on) => deps.publishCommand(binding.device, on));
        case 'kasa':
          return new CallbackOutput((on) => {
            deps.setKasaState(binding.device, on).catch((err: unknown) => {
              deps.logger.error(`${controller}: failed to switch ${binding.device} ${on ? 'on' : 'off'}:`, err);
            });
          });
        case 'none':
          return new CallbackOutput((on) => {
            deps.logger.debug(`${controller}: output ${on ? 'on' : 'off'} (unbound)`);
          });
      }
    },
  };
}
