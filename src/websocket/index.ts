import { WebSocket } from 'ws';
import type { WebSocketServer } from 'ws';
import type { MessageLog } from '../messages/log.js';
import { serializeMessage } from '../messages/message.js';
import type { SocketFrame } from '../types/index.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger('websocket');

// Track all connected clients
const clients = new Set<WebSocket>();

// Recent messages replayed to a client on connect
const REPLAY_COUNT = 50;

/**
 * Set up WebSocket server handlers
 */
export function setupWebSocket(wss: WebSocketServer, log: MessageLog): void {
  wss.on('connection', (ws) => {
    logger.info('WebSocket client connected');
    clients.add(ws);

    for (const message of log.recent(REPLAY_COUNT)) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify({ type: 'controller_message', message: serializeMessage(message) }));
      }
    }

    ws.on('close', () => {
      logger.info('WebSocket client disconnected');
      clients.delete(ws);
    });

    ws.on('error', (err) => {
      logger.error('WebSocket error:', err);
      clients.delete(ws);
    });
  });
}

/**
 * Broadcast a frame to all connected clients
 */
export function broadcast(frame: SocketFrame): void {
  const payload = JSON.stringify(frame);

  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(payload);
    }
  }
}

/**
 * Get count of connected clients
 */
export function getClientCount(): number {
  return clients.size;
}
