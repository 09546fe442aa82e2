import type { Controller } from '../controllers/controller.js';
import type { ControllerStatus, EventSummary, HealthStatus } from '../types/index.js';
import { getClientCount } from '../websocket/index.js';
import { getDiscoveredDevices } from './devices.js';
import type { Runtime } from './runtime.js';

/**
 * Snapshot of a controller for the status API
 */
export function getControllerStatus(controller: Controller): ControllerStatus {
  const outputs: Record<string, boolean | null> = {};
  for (const [key, output] of Object.entries(controller.getOutputs())) {
    outputs[key] = output.getState() ?? null;
  }

  return {
    name: controller.getName(),
    kind: controller.kind,
    started: controller.isStarted(),
    outputs,
    pending: controller.getScheduler().getPendingEvents().map((e) => e.toSummary()),
  };
}

export function getControllerEvents(controller: Controller): { pending: EventSummary[]; fired: EventSummary[] } {
  const scheduler = controller.getScheduler();
  return {
    pending: scheduler.getPendingEvents().map((e) => e.toSummary()),
    fired: scheduler.getHistory().map((e) => e.toSummary()),
  };
}

/**
 * Payload of GET /health
 */
export function getHealth(runtime: Runtime, now = new Date()): HealthStatus {
  return {
    status: 'ok',
    running: runtime.isRunning(),
    controllers: runtime.getGroup().size,
    websocket_clients: getClientCount(),
    kasa_devices: getDiscoveredDevices().length,
    timestamp: now.toISOString(),
  };
}
