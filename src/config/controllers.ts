import { readFile } from 'node:fs/promises';
import type {
  ControllerConfig,
  InputBinding,
  OutputBinding,
  TimeOfDay,
} from '../types/index.js';
import { ConfigValidationError } from '../types/errors.js';
import { MS_PER_HOUR, MS_PER_SECOND, parseTimeOfDay } from '../utils/time.js';

/**
 * Controllers file format:
 *
 *   {
 *     "controllers": [
 *       { "kind": "threshold", "name": "sump", "threshold": 40, "inverted": false,
 *         "interval_seconds": 30,
 *         "input": { "type": "mqtt", "topic": "sensors/sump/level" },
 *         "output": { "type": "kasa", "device": "sump pump" } },
 *       { "kind": "bidirectional", "name": "tank", "threshold": 20, "tolerance": 1,
 *         "interval_seconds": 60, "input": { ... },
 *         "increase_output": { ... }, "decrease_output": { ... } },
 *       { "kind": "timed", "name": "lights", "start_time": "05:00",
 *         "duration_hours": 12, "output": { "type": "mqtt", "device": "lights" } }
 *     ]
 *   }
 */
export async function loadControllerConfigs(path: string): Promise<ControllerConfig[]> {
  const text = await readFile(path, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError(
      `${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseControllerConfigs(raw);
}

export function parseControllerConfigs(raw: unknown): ControllerConfig[] {
  if (!isRecord(raw) || !Array.isArray(raw.controllers)) {
    throw new ConfigValidationError('Controllers file must be an object with a "controllers" array');
  }

  const seen = new Set<string>();
  return raw.controllers.map((entry: unknown, index: number) => {
    const config = parseEntry(entry, `controllers[${index}]`);
    if (seen.has(config.name)) {
      throw new ConfigValidationError(`controllers[${index}]: duplicate name "${config.name}"`);
    }
    seen.add(config.name);
    return config;
  });
}

function parseEntry(entry: unknown, at: string): ControllerConfig {
  if (!isRecord(entry)) {
    throw new ConfigValidationError(`${at}: must be an object`);
  }

  const name = requireString(entry, 'name', at);
  const where = `${at} ("${name}")`;

  switch (entry.kind) {
    case 'threshold':
      return {
        kind: 'threshold',
        name,
        threshold: requireNumber(entry, 'threshold', where),
        inverted: optionalBoolean(entry, 'inverted', where) ?? false,
        intervalMs: requirePositive(entry, 'interval_seconds', where) * MS_PER_SECOND,
        input: parseInput(entry.input, `${where}.input`),
        output: parseOutput(entry.output, `${where}.output`),
      };
    case 'bidirectional': {
      const tolerance = requireNumber(entry, 'tolerance', where);
      if (tolerance < 0) {
        throw new ConfigValidationError(`${where}: "tolerance" must be >= 0`);
      }
      return {
        kind: 'bidirectional',
        name,
        threshold: requireNumber(entry, 'threshold', where),
        tolerance,
        intervalMs: requirePositive(entry, 'interval_seconds', where) * MS_PER_SECOND,
        input: parseInput(entry.input, `${where}.input`),
        increaseOutput: parseOutput(entry.increase_output, `${where}.increase_output`),
        decreaseOutput: parseOutput(entry.decrease_output, `${where}.decrease_output`),
      };
    }
    case 'timed': {
      const durationHours = requireNumber(entry, 'duration_hours', where);
      if (durationHours < 0) {
        throw new ConfigValidationError(`${where}: "duration_hours" must be >= 0`);
      }
      return {
        kind: 'timed',
        name,
        startTime: requireTimeOfDay(entry, 'start_time', where),
        durationMs: Math.round(durationHours * MS_PER_HOUR),
        output: parseOutput(entry.output, `${where}.output`),
      };
    }
    default:
      throw new ConfigValidationError(
        `${where}: "kind" must be one of threshold, bidirectional, timed (got ${JSON.stringify(entry.kind)})`
      );
  }
}

function parseInput(value: unknown, at: string): InputBinding {
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${at}: must be an object`);
  }
  switch (value.type) {
    case 'mqtt':
      return { type: 'mqtt', topic: requireString(value, 'topic', at) };
    case 'static':
      return { type: 'static', value: requireString(value, 'value', at) };
    default:
      throw new ConfigValidationError(`${at}: "type" must be mqtt or static`);
  }
}

function parseOutput(value: unknown, at: string): OutputBinding {
  if (value === undefined) {
    return { type: 'none' };
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${at}: must be an object`);
  }
  switch (value.type) {
    case 'mqtt':
      return { type: 'mqtt', device: requireString(value, 'device', at) };
    case 'kasa':
      return { type: 'kasa', device: requireString(value, 'device', at) };
    case 'none':
      return { type: 'none' };
    default:
      throw new ConfigValidationError(`${at}: "type" must be mqtt, kasa or none`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, at: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigValidationError(`${at}: "${key}" is required and must be a non-empty string`);
  }
  return value;
}

function requireNumber(record: Record<string, unknown>, key: string, at: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigValidationError(`${at}: "${key}" is required and must be a number`);
  }
  return value;
}

function requirePositive(record: Record<string, unknown>, key: string, at: string): number {
  const value = requireNumber(record, key, at);
  if (value <= 0) {
    throw new ConfigValidationError(`${at}: "${key}" must be greater than 0`);
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, at: string): boolean | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(`${at}: "${key}" must be a boolean`);
  }
  return value;
}

function requireTimeOfDay(record: Record<string, unknown>, key: string, at: string): TimeOfDay {
  const value = requireString(record, key, at);
  const time = parseTimeOfDay(value);
  if (!time) {
    throw new ConfigValidationError(`${at}: "${key}" must be HH:MM or HH:MM:SS, got "${value}"`);
  }
  return time;
}
