import type { Input } from '../io/input.js';
import type { Output } from '../io/output.js';
import type { ControllerConfig, InputBinding, OutputBinding } from '../types/index.js';
import { BidirectionalThresholdController } from './bidirectional.js';
import type { Controller } from './controller.js';
import { ThresholdController } from './threshold.js';
import { TimedOutputController } from './timed.js';

/**
 * Turns binding descriptors into live capabilities
 */
export interface IoResolver {
  input(binding: InputBinding, controller: string): Input;
  output(binding: OutputBinding, controller: string): Output;
}

export interface FactoryOptions {
  historyLimit?: number;
}

/**
 * Build an unstarted controller from a validated config entry
 */
export function createController(
  config: ControllerConfig,
  io: IoResolver,
  options: FactoryOptions = {}
): Controller {
  const { name } = config;
  const { historyLimit } = options;

  switch (config.kind) {
    case 'threshold':
      return new ThresholdController({
        name,
        historyLimit,
        threshold: config.threshold,
        inverted: config.inverted,
        intervalMs: config.intervalMs,
        input: io.input(config.input, name),
        output: io.output(config.output, name),
      });
    case 'bidirectional':
      return new BidirectionalThresholdController({
        name,
        historyLimit,
        threshold: config.threshold,
        tolerance: config.tolerance,
        intervalMs: config.intervalMs,
        input: io.input(config.input, name),
        increaseOutput: io.output(config.increaseOutput, name),
        decreaseOutput: io.output(config.decreaseOutput, name),
      });
    case 'timed':
      return new TimedOutputController({
        name,
        historyLimit,
        startTime: config.startTime,
        durationMs: config.durationMs,
        output: io.output(config.output, name),
      });
  }
}
