import { Router } from 'express';
import { createControllersRouter } from './controllers.js';
import { createMessagesRouter } from './messages.js';
import type { Runtime } from '../services/runtime.js';

export function createRoutes(runtime: Runtime): Router {
  const router = Router();

  router.use('/controllers', createControllersRouter(runtime.getGroup()));
  router.use('/messages', createMessagesRouter(runtime.getLog()));

  return router;
}
