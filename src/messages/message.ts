import type { SerializedMessage } from '../types/index.js';

/**
 * Log entry produced when a controller's scheduled action fires
 */
export class Message {
  readonly timestamp: Date;

  constructor(
    readonly name: string,
    readonly content: string,
    timestamp: Date,
    readonly readState?: string
  ) {
    this.timestamp = new Date(timestamp.getTime());
    Object.freeze(this);
  }

  toJSON(): SerializedMessage {
    return serializeMessage(this);
  }
}

export function serializeMessage(message: Message): SerializedMessage {
  return {
    name: message.name,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
    read_state: message.readState ?? null,
  };
}

