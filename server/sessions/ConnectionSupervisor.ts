/**
 * ConnectionSupervisor - transport lifecycle and connection state machine
 *
 *   disconnected -> connecting     connect()
 *   connecting   -> connected      handshake ok, sweep done, poller started
 *   connecting   -> faulted        handshake timeout / refused / link error
 *   faulted      -> connecting     automatic retry after retryDelayMs
 *   connected    -> faulted        transport error during operation
 *   any          -> disconnected   disconnect() (teardown)
 *
 * Each connect attempt carries a generation number; starting a new attempt
 * or tearing down bumps it, and a stale attempt stops at its next await.
 */

import type { InstrumentSchema, Transport, ConnectionState, Result } from '../devices/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError, InstrumentErrors } from '../devices/errors.js';
import type { CommandLock } from './CommandLock.js';
import type { Dispatcher } from './Dispatcher.js';
import type { Poller } from './Poller.js';

export interface ConnectionSupervisorConfig {
  connectionTimeoutMs?: number;
  retryDelayMs?: number;
  readTimeoutMs?: number;
  /** Used in log lines and status messages */
  name?: string;
}

export interface SupervisorHooks {
  onStateChange?: (state: ConnectionState, status: string) => void;
  /** Runs after the poller has started; failures stay with the caller */
  onConnected?: () => Promise<void>;
}

export interface ConnectionSupervisor {
  /** No-op when connected; otherwise (re)starts a connect attempt */
  connect(): void;
  /** Teardown: cancel retries and polling, close the transport under the lock */
  disconnect(): Promise<void>;
  handleTransportError(error: InstrumentError): void;
  getState(): ConnectionState;
  getStatus(): string;
  /** Raw reply to the handshake query of the current connection */
  getIdentity(): string | undefined;
  /** Resolves when the current attempt (including onConnected) has finished */
  settled(): Promise<void>;
}

const DEFAULT_CONFIG: Required<ConnectionSupervisorConfig> = {
  connectionTimeoutMs: 10000,
  retryDelayMs: 1000,
  readTimeoutMs: 2000,
  name: 'instrument',
};

function withTimeout<T>(
  task: Promise<Result<T, InstrumentError>>,
  ms: number,
  message: string
): Promise<Result<T, InstrumentError>> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Result<T, InstrumentError>>(resolve => {
    timeoutId = setTimeout(() => resolve(Err(InstrumentErrors.timeout(message))), ms);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timeoutId));
}

export function createConnectionSupervisor(
  schema: InstrumentSchema,
  transport: Transport,
  lock: CommandLock,
  dispatcher: Dispatcher,
  poller: Poller,
  config: ConnectionSupervisorConfig = {},
  hooks: SupervisorHooks = {}
): ConnectionSupervisor {
  const cfg: Required<ConnectionSupervisorConfig> = { ...DEFAULT_CONFIG, ...config };

  let state: ConnectionState = 'disconnected';
  let status = 'Disconnected';
  let identity: string | undefined;
  let generation = 0;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;
  let attemptTask: Promise<void> = Promise.resolve();
  let lastFaultMessage: string | null = null;

  function setState(next: ConnectionState, message: string): void {
    state = next;
    status = message;
    hooks.onStateChange?.(next, message);
  }

  function cancelRetry(): void {
    if (retryTimer) {
      clearTimeout(retryTimer);
      retryTimer = null;
    }
  }

  function fault(error: InstrumentError): void {
    // Log once per distinct message; repeated identical failures stay quiet
    if (error.message !== lastFaultMessage) {
      console.error(`[Supervisor] ${cfg.name}: ${error.message}`);
      lastFaultMessage = error.message;
    }
    setState('faulted', error.message);
  }

  function closeUnderLock(): Promise<Result<void, Error>> {
    return lock.run(() => transport.close());
  }

  async function handshake(gen: number): Promise<Result<string | undefined, InstrumentError>> {
    return lock.run(async (): Promise<Result<string | undefined, InstrumentError>> => {
      if (gen !== generation) return Ok(undefined);

      const opened = await transport.open();
      if (!opened.ok) return opened;

      const query = schema.handshakeQuery;
      if (query === null) return Ok(undefined);

      const sent = await transport.write(query);
      if (!sent.ok) return sent;
      const reply = await transport.readLine(cfg.readTimeoutMs);
      if (!reply.ok) return reply;
      if (reply.value === '') {
        return Err(InstrumentErrors.transport(`Empty reply to ${query.trim()}`));
      }
      return Ok(reply.value);
    });
  }

  async function attempt(gen: number): Promise<void> {
    poller.halt();
    await closeUnderLock();
    if (gen !== generation) return;

    const shaken = await withTimeout(
      handshake(gen),
      cfg.connectionTimeoutMs,
      `${cfg.name}: no handshake within ${cfg.connectionTimeoutMs}ms`
    );
    if (gen !== generation) return;
    if (!shaken.ok) {
      fail(gen, shaken.error);
      return;
    }
    identity = shaken.value;

    const sweep = await dispatcher.runConnectSweep();
    if (gen !== generation) return;
    if (sweep.abortedBy) {
      fail(gen, sweep.abortedBy);
      return;
    }

    const failed = sweep.items.filter(i => i.error !== null).length;
    if (lastFaultMessage !== null) {
      console.log(`[Supervisor] ${cfg.name}: recovered`);
    }
    lastFaultMessage = null;
    setState('connected', failed > 0
      ? `Connected (${failed} parameter(s) could not be initialised)`
      : 'Connected');
    console.log(`[Supervisor] ${cfg.name}: connected${identity ? ` to ${identity}` : ''}`);

    poller.start();
    await hooks.onConnected?.();
  }

  function fail(gen: number, error: InstrumentError): void {
    fault(error);
    retryTimer = setTimeout(() => {
      retryTimer = null;
      if (gen === generation) begin();
    }, cfg.retryDelayMs);
  }

  function begin(): void {
    cancelRetry();
    generation++;
    const gen = generation;
    setState('connecting', `Connecting to ${cfg.name}`);
    attemptTask = attempt(gen);
  }

  return {
    connect(): void {
      if (state === 'connected') return;
      begin();
    },

    async disconnect(): Promise<void> {
      generation++;
      cancelRetry();
      await poller.stop();
      // In-flight requests finish (or time out) before the handle is released
      await closeUnderLock();
      identity = undefined;
      lastFaultMessage = null;
      setState('disconnected', 'Disconnected');
    },

    handleTransportError(error: InstrumentError): void {
      // Connect attempts handle their own failures
      if (state !== 'connected') return;
      poller.halt();
      fault(error);
      begin();
    },

    getState(): ConnectionState {
      return state;
    },

    getStatus(): string {
      return status;
    },

    getIdentity(): string | undefined {
      return identity;
    },

    settled(): Promise<void> {
      return attemptTask;
    },
  };
}
