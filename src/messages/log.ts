import type { Message } from './message.js';

export const DEFAULT_LOG_CAPACITY = 500;

/**
 * Bounded in-memory log of recent controller messages
 */
export class MessageLog {
  private readonly entries: Message[] = [];

  constructor(private readonly capacity = DEFAULT_LOG_CAPACITY) {}

  append(messages: readonly Message[]): void {
    this.entries.push(...messages);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * Most recent messages, oldest first, optionally for one controller
   */
  recent(limit = this.capacity, name?: string): Message[] {
    const matching = name === undefined ? this.entries : this.entries.filter((m) => m.name === name);
    return limit <= 0 ? [] : matching.slice(-limit);
  }

  get size(): number {
    return this.entries.length;
  }
}
