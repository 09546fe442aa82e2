import mqtt from 'mqtt';
import type { MqttClient } from 'mqtt';
import { getMqttConfig } from '../config/mqtt.js';
import type { MqttConfig } from '../config/mqtt.js';
import { broadcast } from '../websocket/index.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger('mqtt');

let client: MqttClient | null = null;
let commandPrefix = getMqttConfig().commandPrefix;

// Latest payload per sensor topic
const readings = new Map<string, { value: string; receivedAt: Date }>();

interface SensorPayload {
  value: number | string;
}

/**
 * Extract the sample from an MQTT payload.
 * Payloads can be:
 *   - JSON: {"value": 8.5, "unit": "C", "ts": 1766862028}
 *   - Plain text: "8.5"
 */
export function parsePayload(payload: string): string {
  try {
    const parsed: unknown = JSON.parse(payload);
    if (isSensorPayload(parsed)) {
      return String(parsed.value);
    }
  } catch {
    // Not JSON, use as plain value
  }
  return payload.trim();
}

function isSensorPayload(value: unknown): value is SensorPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'value' in value &&
    (typeof value.value === 'number' || typeof value.value === 'string')
  );
}

/**
 * Store a reading and forward it to WebSocket clients
 */
export function recordReading(topic: string, payload: string, receivedAt = new Date()): void {
  const value = parsePayload(payload);
  readings.set(topic, { value, receivedAt });

  broadcast({
    type: 'sensor_update',
    topic,
    value,
    timestamp: receivedAt.toISOString(),
  });
}

/**
 * Latest value seen on a topic, or undefined when nothing has arrived yet
 */
export function getLatestReading(topic: string): string | undefined {
  return readings.get(topic)?.value;
}

export function clearReadings(): void {
  readings.clear();
}

/**
 * Connect to the broker and subscribe to sensor topics
 */
export function setupMqttBridge(config: MqttConfig = getMqttConfig()): void {
  commandPrefix = config.commandPrefix;
  client = mqtt.connect(config.brokerUrl);

  client.on('connect', () => {
    logger.info(`Connected to MQTT broker ${config.brokerUrl}`);

    for (const topic of config.topics) {
      client?.subscribe(topic, (err) => {
        if (err) {
          logger.error(`Failed to subscribe to ${topic}:`, err);
        } else {
          logger.info(`Subscribed to ${topic}`);
        }
      });
    }
  });

  client.on('message', (topic, payload) => {
    recordReading(topic, payload.toString());
  });

  client.on('error', (err) => {
    logger.error('MQTT error:', err);
  });

  client.on('close', () => {
    logger.info('MQTT connection closed');
  });
}

export function commandTopic(device: string): string {
  return `${commandPrefix}/${device}/set`;
}

/**
 * Publish an on/off command for a device
 */
export function publishCommand(device: string, on: boolean): void {
  if (!client) {
    logger.warn(`MQTT client not connected, cannot command ${device}`);
    return;
  }

  const topic = commandTopic(device);
  const payload = on ? 'on' : 'off';

  client.publish(topic, payload, (err) => {
    if (err) {
      logger.error(`Failed to publish to ${topic}:`, err);
    } else {
      logger.debug(`Published ${topic}: ${payload}`);
    }
  });
}

/**
 * Publish a controller message on the message topic
 */
export function publishMessage(topic: string, payload: string): Promise<void> {
  return new Promise((resolve, reject) => {
    // A disconnected client queues the packet and never calls back
    if (!client?.connected) {
      reject(new Error(`MQTT client not connected, cannot publish to ${topic}`));
      return;
    }
    client.publish(topic, payload, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Close MQTT connection
 */
export function closeMqttBridge(): void {
  if (client) {
    client.end();
    client = null;
  }
}
