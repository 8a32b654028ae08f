/**
 * Server configuration
 *
 * Environment variables (defaults in parentheses):
 *   PORT (3001), INSTRUMENTS_FILE (none), SIMULATE (off),
 *   CONNECTION_TIMEOUT ms (10000), READ_TIMEOUT ms (2000),
 *   RETRY_DELAY ms (1000), POLL_INTERVAL s (5)
 *
 * SIM_LATENCY_MS / SIM_LATENCY_JITTER_MS are read by the simulation module.
 *
 * INSTRUMENTS_FILE points at a JSON array, see instruments.example.json:
 *   [{ "id": "afg", "model": "AFG31000", "transport": { "type": "tcp", "host": "10.0.0.5" } }]
 */

import { readFileSync } from 'fs';
import type { TransportConfig, Result } from './devices/types.js';
import { Ok, Err } from '../shared/types.js';
import type { InstrumentConfig } from './sessions/SessionManager.js';
import { DEFAULT_POLL_INTERVAL_S } from './sessions/Poller.js';

export interface ServerConfig {
  port: number;
  instrumentsFile: string | null;
  simulate: boolean;
  connectionTimeoutMs: number;
  readTimeoutMs: number;
  retryDelayMs: number;
  pollIntervalSeconds: number;
}

type Env = Record<string, string | undefined>;

function parseNumber(env: Env, name: string, defaultValue: number): Result<number, Error> {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return Ok(defaultValue);
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    return Err(new Error(`${name} must be a non-negative number, got "${raw}"`));
  }
  return Ok(value);
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function loadServerConfig(env: Env = process.env): Result<ServerConfig, Error> {
  const port = parseNumber(env, 'PORT', 3001);
  if (!port.ok) return port;
  const connectionTimeoutMs = parseNumber(env, 'CONNECTION_TIMEOUT', 10000);
  if (!connectionTimeoutMs.ok) return connectionTimeoutMs;
  const readTimeoutMs = parseNumber(env, 'READ_TIMEOUT', 2000);
  if (!readTimeoutMs.ok) return readTimeoutMs;
  const retryDelayMs = parseNumber(env, 'RETRY_DELAY', 1000);
  if (!retryDelayMs.ok) return retryDelayMs;
  const pollIntervalSeconds = parseNumber(env, 'POLL_INTERVAL', DEFAULT_POLL_INTERVAL_S);
  if (!pollIntervalSeconds.ok) return pollIntervalSeconds;

  return Ok({
    port: port.value,
    instrumentsFile: env.INSTRUMENTS_FILE?.trim() || null,
    simulate: parseFlag(env.SIMULATE),
    connectionTimeoutMs: connectionTimeoutMs.value,
    readTimeoutMs: readTimeoutMs.value,
    retryDelayMs: retryDelayMs.value,
    pollIntervalSeconds: pollIntervalSeconds.value,
  });
}

// ============ Instrument list ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Accepts numbers and numeric strings such as "0x0957"
function toId(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 && n <= 0xffff ? n : undefined;
}

function optionalNumber(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isFinite(value) && value >= 0);
}

function parseTransport(value: unknown, where: string): Result<TransportConfig, Error> {
  if (!isRecord(value)) return Err(new Error(`${where}: transport must be an object`));

  switch (value.type) {
    case 'tcp': {
      const { host, port } = value;
      if (typeof host !== 'string' || host === '') return Err(new Error(`${where}: tcp transport needs a host`));
      if (!optionalNumber(port)) return Err(new Error(`${where}: tcp port must be a number`));
      return Ok({ type: 'tcp', host, port });
    }
    case 'serial': {
      const { path, baudRate } = value;
      if (typeof path !== 'string' || path === '') return Err(new Error(`${where}: serial transport needs a path`));
      if (!optionalNumber(baudRate)) return Err(new Error(`${where}: serial baudRate must be a number`));
      return Ok({ type: 'serial', path, baudRate });
    }
    case 'usbtmc': {
      const vendorId = toId(value.vendorId);
      const productId = toId(value.productId);
      if (vendorId === undefined || productId === undefined) {
        return Err(new Error(`${where}: usbtmc transport needs vendorId and productId`));
      }
      return Ok({ type: 'usbtmc', vendorId, productId });
    }
    case 'simulated': {
      const { latencyMs, offline } = value;
      if (!optionalNumber(latencyMs)) return Err(new Error(`${where}: simulated latencyMs must be a number`));
      if (offline !== undefined && typeof offline !== 'boolean') {
        return Err(new Error(`${where}: simulated offline must be a boolean`));
      }
      return Ok({ type: 'simulated', latencyMs, offline });
    }
    default:
      return Err(new Error(`${where}: unknown transport type ${JSON.stringify(value.type)}`));
  }
}

export function parseInstrumentList(json: unknown): Result<InstrumentConfig[], Error> {
  if (!Array.isArray(json)) return Err(new Error('Instrument list must be a JSON array'));

  const instruments: InstrumentConfig[] = [];
  const seen = new Set<string>();

  for (const [index, entry] of json.entries()) {
    const where = `instruments[${index}]`;
    if (!isRecord(entry)) return Err(new Error(`${where}: must be an object`));

    const { id, model, minPollIntervalSeconds } = entry;
    if (typeof id !== 'string' || id === '') return Err(new Error(`${where}: id is required`));
    if (seen.has(id)) return Err(new Error(`${where}: duplicate id ${id}`));
    if (typeof model !== 'string' || model === '') return Err(new Error(`${where}: model is required`));
    if (!optionalNumber(minPollIntervalSeconds)) {
      return Err(new Error(`${where}: minPollIntervalSeconds must be a number`));
    }

    const transport = parseTransport(entry.transport, where);
    if (!transport.ok) return transport;

    seen.add(id);
    instruments.push({ id, model, transport: transport.value, minPollIntervalSeconds });
  }

  return Ok(instruments);
}

export function loadInstrumentsFile(path: string): Result<InstrumentConfig[], Error> {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return Err(new Error(`Failed to read ${path}: ${message}`));
  }
  return parseInstrumentList(json);
}

/**
 * Instruments to run with SIMULATE set: the configured list with every
 * transport swapped for a simulated one, or one simulated instrument per
 * model when nothing is configured.
 */
export function simulatedInstruments(configured: InstrumentConfig[], models: string[]): InstrumentConfig[] {
  if (configured.length > 0) {
    return configured.map(instrument => ({ ...instrument, transport: { type: 'simulated' } }));
  }
  return models.map(model => ({
    id: `sim-${model.toLowerCase()}`,
    model,
    transport: { type: 'simulated' },
  }));
}
