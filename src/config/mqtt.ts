export interface MqttConfig {
  brokerUrl: string;
  topics: string[];
  commandPrefix: string;
  messageTopic: string;
}

export function getMqttConfig(): MqttConfig {
  return {
    brokerUrl: process.env.MQTT_BROKER || 'mqtt://localhost:1883',
    topics: (process.env.MQTT_TOPICS || 'sensors/#')
      .split(',')
      .map((t) => t.trim())
      .filter((t) => t.length > 0),
    commandPrefix: process.env.MQTT_COMMAND_PREFIX || 'devices',
    messageTopic: process.env.MQTT_MESSAGE_TOPIC || 'controllers/messages',
  };
}
