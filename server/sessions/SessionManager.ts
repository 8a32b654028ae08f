/**
 * SessionManager - Creates and looks up InstrumentSession instances
 *
 * - One session per configured instrument (sessions persist through disconnects)
 * - Instruments run independently; the manager is only an id -> session table
 * - Provides instrument summaries for listing
 */

import type { ModelRegistry } from '../devices/registry.js';
import type { Transport, TransportConfig, InstrumentSchema, ParameterInput, ParameterValue, InstrumentSummary, ServerMessage, Result } from '../devices/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser } from '../devices/scpi-parser.js';
import { createTransport, describeTransport } from '../devices/transports/index.js';
import { createInstrumentSession, type InstrumentSession, type InstrumentSessionConfig } from './InstrumentSession.js';
import type { WriteOutcome } from './Dispatcher.js';

export interface InstrumentConfig {
  id: string;
  model: string;
  transport: TransportConfig;
  /** Overrides the manager-wide minimum poll interval for this instrument */
  minPollIntervalSeconds?: number;
}

export type SessionManagerConfig = InstrumentSessionConfig;

export type TransportFactory = (config: TransportConfig, schema: InstrumentSchema) => Transport;

type SubscriberCallback = (message: ServerMessage) => void;

export interface SessionManager {
  addInstrument(instrument: InstrumentConfig): Result<InstrumentSession, Error>;
  hasSession(instrumentId: string): boolean;
  getSession(instrumentId: string): InstrumentSession | undefined;
  getSessionCount(): number;
  getInstrumentSummaries(): InstrumentSummary[];

  subscribe(instrumentId: string, clientId: string, callback: SubscriberCallback): boolean;
  unsubscribe(instrumentId: string, clientId: string): void;
  unsubscribeAll(clientId: string): void;
  isSubscribed(instrumentId: string, clientId: string): boolean;

  connect(instrumentId: string): Result<void, Error>;
  connectAll(): void;
  setParameter(instrumentId: string, key: string, channel: string | null, value: ParameterInput): Promise<Result<WriteOutcome, Error>>;
  getParameter(instrumentId: string, key: string, channel: string | null): Promise<Result<ParameterValue, Error>>;
  refreshCatalog(instrumentId: string, path?: string): Promise<Result<string[], Error>>;

  stop(): Promise<void>;
}

function sessionNotFound(instrumentId: string): Error {
  return new Error(`Session not found: ${instrumentId}`);
}

export function createSessionManager(
  registry: ModelRegistry,
  config: SessionManagerConfig = {},
  transportFactory: TransportFactory = createTransport
): SessionManager {
  const sessions = new Map<string, InstrumentSession>();

  function addInstrument(instrument: InstrumentConfig): Result<InstrumentSession, Error> {
    if (sessions.has(instrument.id)) {
      return Err(new Error(`Duplicate instrument id: ${instrument.id}`));
    }

    const registration = registry.getModel(instrument.model);
    if (!registration) {
      return Err(new Error(`Unknown model for ${instrument.id}: ${instrument.model}`));
    }

    const schema = registration.createSchema();
    if (!schema.ok) {
      return Err(new Error(`Schema for ${instrument.model} is invalid: ${schema.error.message}`));
    }

    const usb = instrument.transport;
    if (usb.type === 'usbtmc' && !registry.matchUSB(usb.vendorId, usb.productId).includes(registration)) {
      console.warn(`[SessionManager] ${instrument.id}: USB ids ${describeTransport(usb)} are not known for ${instrument.model}`);
    }

    const transport = transportFactory(instrument.transport, schema.value);
    const session = createInstrumentSession(instrument.id, schema.value, transport, {
      ...config,
      minPollIntervalSeconds: instrument.minPollIntervalSeconds ?? config.minPollIntervalSeconds,
      checkIdentity: identity => {
        const idn = ScpiParser.parseIdn(identity);
        return idn.ok && registry.matchIDN(idn.value.manufacturer, idn.value.model) === registration;
      },
    });
    sessions.set(instrument.id, session);
    console.log(`[SessionManager] Created session for: ${instrument.id} (${instrument.model} via ${describeTransport(instrument.transport)})`);
    return Ok(session);
  }

  function subscribe(instrumentId: string, clientId: string, callback: SubscriberCallback): boolean {
    const session = sessions.get(instrumentId);
    if (!session) return false;
    session.subscribe(clientId, callback);
    return true;
  }

  function unsubscribe(instrumentId: string, clientId: string): void {
    sessions.get(instrumentId)?.unsubscribe(clientId);
  }

  function unsubscribeAll(clientId: string): void {
    for (const session of sessions.values()) {
      session.unsubscribe(clientId);
    }
  }

  function isSubscribed(instrumentId: string, clientId: string): boolean {
    return sessions.get(instrumentId)?.hasSubscriber(clientId) ?? false;
  }

  function connect(instrumentId: string): Result<void, Error> {
    const session = sessions.get(instrumentId);
    if (!session) return Err(sessionNotFound(instrumentId));
    session.connect();
    return Ok();
  }

  async function setParameter(
    instrumentId: string,
    key: string,
    channel: string | null,
    value: ParameterInput
  ): Promise<Result<WriteOutcome, Error>> {
    const session = sessions.get(instrumentId);
    if (!session) return Err(sessionNotFound(instrumentId));
    return session.setParameter(key, channel, value);
  }

  async function getParameter(
    instrumentId: string,
    key: string,
    channel: string | null
  ): Promise<Result<ParameterValue, Error>> {
    const session = sessions.get(instrumentId);
    if (!session) return Err(sessionNotFound(instrumentId));
    return session.getParameter(key, channel);
  }

  async function refreshCatalog(instrumentId: string, path?: string): Promise<Result<string[], Error>> {
    const session = sessions.get(instrumentId);
    if (!session) return Err(sessionNotFound(instrumentId));
    return session.refreshCatalog(path);
  }

  async function stop(): Promise<void> {
    await Promise.all([...sessions.values()].map(session => session.stop()));
    sessions.clear();
  }

  return {
    addInstrument,
    hasSession: instrumentId => sessions.has(instrumentId),
    getSession: instrumentId => sessions.get(instrumentId),
    getSessionCount: () => sessions.size,
    getInstrumentSummaries: () => [...sessions.values()].map(s => s.getSummary()),
    subscribe,
    unsubscribe,
    unsubscribeAll,
    isSubscribed,
    connect,
    connectAll(): void {
      for (const session of sessions.values()) {
        session.connect();
      }
    },
    setParameter,
    getParameter,
    refreshCatalog,
    stop,
  };
}
