import { Router } from 'express';
import type { Request, Response } from 'express';
import { isDatabaseEnabled } from '../config/database.js';
import type { MessageLog } from '../messages/log.js';
import { serializeMessage } from '../messages/message.js';
import { getMessageHistory } from '../services/messages.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger('routes:messages');

function parseLimit(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function createMessagesRouter(log: MessageLog): Router {
  const router = Router();

  /**
   * GET /messages
   * Query params:
   *   - limit: number of recent messages (default 100)
   *   - name: only messages of this controller
   */
  router.get('/', (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, 100);
    const name = typeof req.query.name === 'string' ? req.query.name : undefined;
    res.json({ success: true, data: log.recent(limit, name).map(serializeMessage) });
  });

  /**
   * GET /messages/history
   * Stored messages, newest first (requires the database sink)
   */
  router.get('/history', async (req: Request, res: Response) => {
    if (!isDatabaseEnabled()) {
      res.status(503).json({ success: false, error: 'Message history requires DB_HOST to be configured' });
      return;
    }

    try {
      const limit = parseLimit(req.query.limit, 100);
      const name = typeof req.query.name === 'string' ? req.query.name : undefined;
      const history = await getMessageHistory(name, limit);
      res.json({ success: true, data: history });
    } catch (err) {
      logger.error('Error fetching message history:', err);
      res.status(500).json({
        success: false,
        error: err instanceof Error ? err.message : 'Internal server error',
      });
    }
  });

  return router;
}
