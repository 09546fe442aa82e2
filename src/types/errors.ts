/**
 * Error types for controllers, configuration and message delivery
 */

import type { Action } from './index.js';

/**
 * Base error for anything raised while a controller is polled
 */
export class ControllerError extends Error {
  constructor(
    message: string,
    readonly controller: string
  ) {
    super(message);
    this.name = 'ControllerError';
  }
}

/**
 * An input produced a sample that is not a finite number.
 * Recoverable: the controller has already re-armed its next read.
 */
export class SensorReadError extends ControllerError {
  constructor(
    controller: string,
    readonly raw: string
  ) {
    super(`Controller "${controller}" read a non-numeric sample: ${JSON.stringify(raw)}`, controller);
    this.name = 'SensorReadError';
  }
}

/**
 * A scheduled action reached a controller kind that does not handle it
 */
export class UnexpectedActionError extends ControllerError {
  constructor(
    controller: string,
    readonly action: Action
  ) {
    super(`Controller "${controller}" cannot handle action "${action}"`, controller);
    this.name = 'UnexpectedActionError';
  }
}

/**
 * Lifecycle misuse: polled before start(), or started twice
 */
export class ControllerStateError extends ControllerError {
  constructor(message: string, controller: string) {
    super(message, controller);
    this.name = 'ControllerStateError';
  }
}

/**
 * Invalid controllers file or environment value
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * A sink failed to deliver a batch of messages
 */
export class EmitError extends Error {
  constructor(
    message: string,
    readonly sink: string
  ) {
    super(message);
    this.name = 'EmitError';
  }
}
