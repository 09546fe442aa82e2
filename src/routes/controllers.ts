import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ControllerGroup } from '../controllers/group.js';
import { ThresholdController } from '../controllers/threshold.js';
import { getControllerEvents, getControllerStatus } from '../services/status.js';
import type { SetThresholdRequest } from '../types/index.js';

export function createControllersRouter(group: ControllerGroup): Router {
  const router = Router();

  /**
   * GET /controllers
   * Returns every controller with its output states and pending events
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, data: group.getControllers().map(getControllerStatus) });
  });

  /**
   * GET /controllers/:name/events
   * Returns pending and fired events of one controller
   */
  router.get('/:name/events', (req: Request, res: Response) => {
    const controller = group.find(req.params.name);
    if (!controller) {
      res.status(404).json({ success: false, error: `Unknown controller: ${req.params.name}` });
      return;
    }
    res.json({ success: true, data: getControllerEvents(controller) });
  });

  /**
   * PUT /controllers/:name/threshold
   * Body: { threshold: number }
   */
  router.put('/:name/threshold', (req: Request<{ name: string }, unknown, Partial<SetThresholdRequest>>, res: Response) => {
    const controller = group.find(req.params.name);
    if (!controller) {
      res.status(404).json({ success: false, error: `Unknown controller: ${req.params.name}` });
      return;
    }
    if (!(controller instanceof ThresholdController)) {
      res.status(400).json({ success: false, error: `Controller ${req.params.name} is not a threshold controller` });
      return;
    }

    const threshold: unknown = req.body?.threshold;
    if (typeof threshold !== 'number' || !Number.isFinite(threshold)) {
      res.status(400).json({ success: false, error: 'threshold is required and must be a number' });
      return;
    }

    controller.setThreshold(threshold);
    res.json({ success: true, data: getControllerStatus(controller) });
  });

  return router;
}
