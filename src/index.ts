import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { loadControllerConfigs } from './config/controllers.js';
import { isDatabaseEnabled } from './config/database.js';
import { getMqttConfig } from './config/mqtt.js';
import { getRuntimeConfig } from './config/runtime.js';
import { createController } from './controllers/factory.js';
import { ControllerGroup } from './controllers/group.js';
import { closePool } from './db/index.js';
import { MessageLog } from './messages/log.js';
import { closeMqttBridge, setupMqttBridge } from './mqtt/bridge.js';
import { createRoutes } from './routes/index.js';
import { discoverDevices } from './services/devices.js';
import { createIoResolver } from './services/io.js';
import { Runtime } from './services/runtime.js';
import { getHealth } from './services/status.js';
import type { ControllerConfig } from './types/index.js';
import { DatabaseSink, HttpSink, MqttSink, WebSocketSink } from './services/sinks.js';
import type { MessageSink } from './services/sinks.js';
import { Logger, setLogLevel } from './utils/logger.js';
import { setupWebSocket } from './websocket/index.js';

const logger = new Logger('app');

async function main(): Promise<void> {
  const config = getRuntimeConfig();
  const mqttConfig = getMqttConfig();
  setLogLevel(config.logLevel);

  const controllerConfigs = await loadControllerConfigs(config.controllersFile);
  const io = createIoResolver();
  const group = new ControllerGroup();
  for (const entry of controllerConfigs) {
    group.add(createController(entry, io, { historyLimit: config.historyLimit }));
  }
  logger.info(`Loaded ${group.size} controller(s) from ${config.controllersFile}`);

  const sinks: MessageSink[] = [new WebSocketSink(), new MqttSink(mqttConfig.messageTopic)];
  if (config.emitterUrl) {
    sinks.push(new HttpSink(config.emitterUrl));
  }
  if (isDatabaseEnabled()) {
    sinks.push(new DatabaseSink());
  }
  logger.info(`Message sinks: ${sinks.map((s) => s.name).join(', ')}`);

  const log = new MessageLog();
  const runtime = new Runtime(group, { intervalMs: config.pollIntervalMs, sinks, log });

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // REST routes
  app.use('/api', createRoutes(runtime));

  // Health check
  app.get('/health', (_req, res) => {
    res.json(getHealth(runtime));
  });

  // Create HTTP server
  const server = createServer(app);

  // Create WebSocket server
  const wss = new WebSocketServer({ server, path: '/ws' });
  setupWebSocket(wss, log);

  // Start MQTT bridge
  setupMqttBridge(mqttConfig);

  // Discover Kasa devices before the first command can be sent
  if (controllerConfigs.some(usesKasa)) {
    logger.info('Discovering Kasa devices...');
    await discoverDevices();
  }

  server.listen(config.port, () => {
    logger.info(`API server running on http://localhost:${config.port}`);
    logger.info(`WebSocket available at ws://localhost:${config.port}/ws`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down...`);
    runtime.stop();
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  await runtime.run();

  closeMqttBridge();
  await closePool();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  logger.info('Server closed');
}

function usesKasa(entry: ControllerConfig): boolean {
  const outputs = entry.kind === 'bidirectional' ? [entry.increaseOutput, entry.decreaseOutput] : [entry.output];
  return outputs.some((o) => o.type === 'kasa');
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
