/**
 * InstrumentSession - one instrument, one transport, one command lock
 *
 * Wires Dispatcher, Poller and ConnectionSupervisor together and is the only
 * object the HTTP and WebSocket surfaces talk to:
 * - Holds the status line and the subscriber list
 * - Broadcasts connection transitions, parameter updates, read-back
 *   mismatches and catalog refreshes
 * - Rejects user operations with NOT_CONNECTED unless connected
 */

import type {
  InstrumentSchema,
  Transport,
  ParameterInput,
  ParameterValue,
  ParameterSnapshot,
  InstrumentSessionState,
  InstrumentSummary,
  ServerMessage,
  Result,
} from '../devices/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError, InstrumentErrors } from '../devices/errors.js';
import { ScpiParser } from '../devices/scpi-parser.js';
import { findParameter, listParameterInstances, toParameterInfo } from '../devices/schema.js';
import { createCommandLock } from './CommandLock.js';
import { createDispatcher, type WriteOutcome } from './Dispatcher.js';
import { createPoller } from './Poller.js';
import { createConnectionSupervisor } from './ConnectionSupervisor.js';

export interface InstrumentSessionConfig {
  /** Global minimum poll interval in seconds */
  minPollIntervalSeconds?: number;
  connectionTimeoutMs?: number;
  readTimeoutMs?: number;
  retryDelayMs?: number;
  /** Returns false when the handshake reply names a different instrument */
  checkIdentity?: (identity: string) => boolean;
}

type SubscriberCallback = (message: ServerMessage) => void;

export interface InstrumentSession {
  readonly id: string;
  readonly schema: InstrumentSchema;

  connect(): void;
  setParameter(key: string, channel: string | null, value: ParameterInput): Promise<Result<WriteOutcome, InstrumentError>>;
  /** Live query; the reply is also stored and broadcast */
  getParameter(key: string, channel: string | null): Promise<Result<ParameterValue, InstrumentError>>;
  /** Last known value without touching the wire */
  readCached(key: string, channel: string | null): Result<ParameterSnapshot | undefined, InstrumentError>;
  refreshCatalog(path?: string): Promise<Result<string[], InstrumentError>>;
  setMinPollInterval(seconds: number): number;

  getState(): InstrumentSessionState;
  getSummary(): InstrumentSummary;

  subscribe(clientId: string, callback: SubscriberCallback): void;
  unsubscribe(clientId: string): void;
  getSubscriberCount(): number;
  hasSubscriber(clientId: string): boolean;

  /** Resolves when the current connect attempt has finished */
  settled(): Promise<void>;
  stop(): Promise<void>;
}

export function createInstrumentSession(
  id: string,
  schema: InstrumentSchema,
  transport: Transport,
  config: InstrumentSessionConfig = {}
): InstrumentSession {
  const subscribers = new Map<string, SubscriberCallback>();
  let status = 'Disconnected';
  let lastUpdated = Date.now();

  function broadcast(message: ServerMessage): void {
    for (const [clientId, callback] of subscribers) {
      try {
        callback(message);
      } catch (err) {
        console.error(`[Session] ${id}: subscriber ${clientId} failed:`, err);
      }
    }
  }

  function setStatus(message: string): void {
    status = message;
    lastUpdated = Date.now();
    broadcast({ type: 'status', instrumentId: id, status: message });
  }

  const lock = createCommandLock();

  const dispatcher = createDispatcher(
    schema,
    transport,
    lock,
    { readTimeoutMs: config.readTimeoutMs },
    {
      onTransportError: error => supervisor.handleTransportError(error),
      onParameterUpdate: parameter => {
        lastUpdated = Date.now();
        broadcast({ type: 'parameter', instrumentId: id, parameter });
      },
      onStatus: setStatus,
      onReadBackMismatch: report => {
        broadcast({ type: 'readBackMismatch', instrumentId: id, report });
      },
    }
  );

  const poller = createPoller(schema, dispatcher, {
    minIntervalSeconds: config.minPollIntervalSeconds,
  });

  const supervisor = createConnectionSupervisor(
    schema,
    transport,
    lock,
    dispatcher,
    poller,
    {
      connectionTimeoutMs: config.connectionTimeoutMs,
      retryDelayMs: config.retryDelayMs,
      readTimeoutMs: config.readTimeoutMs,
      name: id,
    },
    {
      onStateChange: (state, message) => {
        status = message;
        lastUpdated = Date.now();
        broadcast({ type: 'connection', instrumentId: id, state, status: message });
      },
      onConnected: async () => {
        const identity = supervisor.getIdentity();
        if (identity && config.checkIdentity && !config.checkIdentity(identity)) {
          console.warn(`[Session] ${id}: instrument reports "${identity}", expected a ${schema.manufacturer} ${schema.model}`);
          setStatus(`Connected, but the instrument does not identify as ${schema.model}`);
        }
        if (!schema.catalog?.refreshOnConnect) return;
        const refreshed = await refreshCatalog();
        if (!refreshed.ok) {
          console.warn(`[Session] ${id}: catalog refresh failed: ${refreshed.error.message}`);
        }
      },
    }
  );

  function requireConnected(): Result<void, InstrumentError> {
    return supervisor.getState() === 'connected' ? Ok() : Err(InstrumentErrors.notConnected());
  }

  async function refreshCatalog(path?: string): Promise<Result<string[], InstrumentError>> {
    const catalog = schema.catalog;
    if (!catalog) {
      return Err(InstrumentErrors.unknownParameter('catalog', null));
    }
    const connected = requireConnected();
    if (!connected.ok) return connected;

    const found = findParameter(schema, catalog.key, null);
    if (!found.ok) return found;

    const listingPath = (path ?? catalog.defaultPath).replace(/\\+$/, '');
    const reply = await dispatcher.request(found.value.descriptor, null, `"${listingPath}"`);
    if (!reply.ok) return reply;

    // The instrument selects and reports waveforms by full path
    const options = ScpiParser.parseCatalog(reply.value).map(name => `${listingPath}\\${name}`);
    dispatcher.setDiscoveredOptions(options);
    lastUpdated = Date.now();
    console.log(`[Session] ${id}: catalog lists ${options.length} waveform(s)`);
    broadcast({ type: 'catalog', instrumentId: id, options });
    return Ok(options);
  }

  function getState(): InstrumentSessionState {
    return {
      info: {
        id,
        model: schema.model,
        manufacturer: schema.manufacturer,
        identity: supervisor.getIdentity(),
      },
      connectionState: supervisor.getState(),
      status,
      parameters: listParameterInstances(schema).map(toParameterInfo),
      values: dispatcher.snapshot(),
      discoveredOptions: dispatcher.getDiscoveredOptions(),
      lastUpdated,
    };
  }

  return {
    id,
    schema,

    connect(): void {
      supervisor.connect();
    },

    async setParameter(key, channel, value) {
      const connected = requireConnected();
      if (!connected.ok) return connected;

      const found = findParameter(schema, key, channel);
      if (!found.ok) return found;

      return dispatcher.write(found.value.descriptor, found.value.channel, value);
    },

    async getParameter(key, channel) {
      const connected = requireConnected();
      if (!connected.ok) return connected;

      const found = findParameter(schema, key, channel);
      if (!found.ok) return found;

      return dispatcher.query(found.value.descriptor, found.value.channel);
    },

    readCached(key, channel) {
      const found = findParameter(schema, key, channel);
      if (!found.ok) return found;
      return Ok(dispatcher.getValue(found.value.descriptor, found.value.channel));
    },

    refreshCatalog,

    setMinPollInterval(seconds: number): number {
      return poller.setMinInterval(seconds);
    },

    getState,

    getSummary(): InstrumentSummary {
      const state = getState();
      return {
        id,
        info: state.info,
        connectionState: state.connectionState,
        status: state.status,
      };
    },

    subscribe(clientId: string, callback: SubscriberCallback): void {
      subscribers.set(clientId, callback);
    },

    unsubscribe(clientId: string): void {
      subscribers.delete(clientId);
    },

    getSubscriberCount(): number {
      return subscribers.size;
    },

    hasSubscriber(clientId: string): boolean {
      return subscribers.has(clientId);
    },

    settled(): Promise<void> {
      return supervisor.settled();
    },

    async stop(): Promise<void> {
      await supervisor.disconnect();
      subscribers.clear();
    },
  };
}
