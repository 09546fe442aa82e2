import { Client } from 'tplink-smarthome-api';
import { Logger } from '../utils/logger.js';

const logger = new Logger('kasa');

// Kasa client singleton
let client: Client | null = null;

// Device cache (discovered devices by lower-cased alias)
const deviceCache = new Map<string, unknown>();

interface PowerControllable {
  setPowerState(state: boolean): Promise<unknown>;
}

function isPowerControllable(device: unknown): device is PowerControllable {
  return (
    typeof device === 'object' &&
    device !== null &&
    'setPowerState' in device &&
    typeof device.setPowerState === 'function'
  );
}

/**
 * Get or create the Kasa client
 */
function getClient(): Client {
  if (!client) {
    client = new Client();
  }
  return client;
}

/**
 * Discover devices on the network
 * Call this on startup to populate the device cache
 */
export async function discoverDevices(timeout: number = 5000): Promise<void> {
  return new Promise((resolve) => {
    const kasaClient = getClient();

    kasaClient.startDiscovery({ discoveryTimeout: timeout });

    kasaClient.on('device-new', (device: { alias: string }) => {
      logger.info(`Discovered Kasa device: ${device.alias}`);
      registerDevice(device.alias, device);
    });

    setTimeout(() => {
      kasaClient.stopDiscovery();
      logger.info(`Device discovery complete. Found ${deviceCache.size} devices.`);
      resolve();
    }, timeout);
  });
}

export function registerDevice(alias: string, device: unknown): void {
  deviceCache.set(alias.toLowerCase(), device);
}

export function clearDevices(): void {
  deviceCache.clear();
}

/**
 * Turn a device on or off
 */
export async function setDeviceState(alias: string, state: boolean): Promise<void> {
  const device = deviceCache.get(alias.toLowerCase());

  if (device === undefined) {
    throw new Error(
      `Device "${alias}" not found. Available: ${Array.from(deviceCache.keys()).join(', ') || 'none'}`
    );
  }

  if (!isPowerControllable(device)) {
    throw new Error(`Device "${alias}" does not support power control`);
  }

  await device.setPowerState(state);
  logger.info(`Set ${alias} to ${state ? 'ON' : 'OFF'}`);
}

/**
 * Get all discovered device names
 */
export function getDiscoveredDevices(): string[] {
  return Array.from(deviceCache.keys());
}
