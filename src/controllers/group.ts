import type { Message } from '../messages/message.js';
import { SensorReadError } from '../types/errors.js';
import type { Controller } from './controller.js';

export interface PollResult {
  messages: Message[];
  /** Controllers that failed to read a usable sample this poll */
  errors: SensorReadError[];
}

/**
 * Ordered collection of controllers polled together.
 *
 * Controllers are polled in the order they were added and their messages keep
 * that order. A SensorReadError is isolated to its controller; any other error
 * aborts the poll.
 */
export class ControllerGroup {
  private readonly controllers: Controller[] = [];

  add(controller: Controller): this {
    const name = controller.getName();
    if (name !== '' && this.find(name)) {
      throw new Error(`A controller named "${name}" is already in the group`);
    }
    this.controllers.push(controller);
    return this;
  }

  get size(): number {
    return this.controllers.length;
  }

  getControllers(): readonly Controller[] {
    return this.controllers;
  }

  find(name: string): Controller | undefined {
    return this.controllers.find((c) => c.getName() === name);
  }

  /**
   * Start every controller that has not been started yet
   */
  start(now: Date): void {
    for (const controller of this.controllers) {
      if (!controller.isStarted()) {
        controller.start(now);
      }
    }
  }

  poll(time: Date): Message[] {
    return this.pollDetailed(time).messages;
  }

  pollDetailed(time: Date): PollResult {
    const result: PollResult = { messages: [], errors: [] };

    for (const controller of this.controllers) {
      try {
        const message = controller.poll(time);
        if (message) {
          result.messages.push(message);
        }
      } catch (err) {
        if (err instanceof SensorReadError) {
          result.errors.push(err);
          continue;
        }
        throw err;
      }
    }

    return result;
  }
}
