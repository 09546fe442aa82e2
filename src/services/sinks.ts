import { serializeMessage } from '../messages/message.js';
import type { Message } from '../messages/message.js';
import { publishMessage } from '../mqtt/bridge.js';
import { EmitError } from '../types/errors.js';
import { broadcast } from '../websocket/index.js';
import { saveMessages } from './messages.js';

/**
 * Destination for the messages produced by a poll
 */
export interface MessageSink {
  readonly name: string;
  emit(messages: readonly Message[]): Promise<void>;
}

type Fetch = typeof fetch;

export const DEFAULT_HTTP_TIMEOUT_MS = 5000;

/**
 * Emit a batch, rejecting with an EmitError when the sink has not settled
 * within `timeoutMs`. The timer is cleared as soon as the sink settles.
 */
export function emitWithin(sink: MessageSink, messages: readonly Message[], timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new EmitError(`Sink ${sink.name} did not settle within ${timeoutMs}ms`, sink.name));
    }, timeoutMs);

    sink.emit(messages).then(
      () => {
        clearTimeout(timer);
        resolve();
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * POSTs each batch as a JSON array
 */
export class HttpSink implements MessageSink {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly fetchImpl: Fetch = fetch,
    private readonly timeoutMs = DEFAULT_HTTP_TIMEOUT_MS
  ) {}

  async emit(messages: readonly Message[]): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(messages.map(serializeMessage)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new EmitError(`POST ${this.url} failed: ${err instanceof Error ? err.message : String(err)}`, this.name);
    }

    if (!response.ok) {
      throw new EmitError(`POST ${this.url} returned ${response.status}`, this.name);
    }
  }
}

export class WebSocketSink implements MessageSink {
  readonly name = 'websocket';

  async emit(messages: readonly Message[]): Promise<void> {
    for (const message of messages) {
      broadcast({ type: 'controller_message', message: serializeMessage(message) });
    }
  }
}

/**
 * Publishes each batch as one JSON array on the message topic
 */
export class MqttSink implements MessageSink {
  readonly name = 'mqtt';

  constructor(
    private readonly topic: string,
    private readonly publish: (topic: string, payload: string) => Promise<void> = publishMessage
  ) {}

  async emit(messages: readonly Message[]): Promise<void> {
    await this.publish(this.topic, JSON.stringify(messages.map(serializeMessage)));
  }
}

export class DatabaseSink implements MessageSink {
  readonly name = 'database';

  constructor(private readonly save: (messages: readonly Message[]) => Promise<void> = saveMessages) {}

  async emit(messages: readonly Message[]): Promise<void> {
    await this.save(messages);
  }
}
