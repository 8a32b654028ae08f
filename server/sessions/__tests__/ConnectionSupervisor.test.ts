import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createConnectionSupervisor } from '../ConnectionSupervisor.js';
import { createDispatcher } from '../Dispatcher.js';
import { createPoller } from '../Poller.js';
import { createCommandLock } from '../CommandLock.js';
import { createAfg31000Schema } from '../../devices/models/afg31000.js';
import { createSimulatedInstrument } from '../../devices/simulation/index.js';
import { createSimulatedTransport, type SimulatedTransport } from '../../devices/simulation/simulated-transport.js';
import { InstrumentErrors } from '../../devices/errors.js';
import type { InstrumentSchema, ConnectionState } from '../../devices/types.js';

function afg(): InstrumentSchema {
  const schema = createAfg31000Schema();
  if (!schema.ok) throw schema.error;
  return schema.value;
}

function build(
  schema: InstrumentSchema,
  transport: SimulatedTransport,
  config: { connectionTimeoutMs?: number; readTimeoutMs?: number } = {}
) {
  const readTimeoutMs = config.readTimeoutMs ?? 100;
  const lock = createCommandLock();
  const dispatcher = createDispatcher(schema, transport, lock, { readTimeoutMs });
  const poller = createPoller(schema, dispatcher, { minIntervalSeconds: 1000 });
  const states: Array<[ConnectionState, string]> = [];
  const onConnected = vi.fn(async () => {});
  const supervisor = createConnectionSupervisor(
    schema,
    transport,
    lock,
    dispatcher,
    poller,
    {
      name: 'afg-1',
      retryDelayMs: 1000,
      connectionTimeoutMs: config.connectionTimeoutMs ?? 500,
      readTimeoutMs,
    },
    {
      onStateChange: (state, status) => states.push([state, status]),
      onConnected,
    }
  );
  return { supervisor, poller, states, onConnected };
}

describe('ConnectionSupervisor', () => {
  let log: ReturnType<typeof vi.spyOn>;
  let error: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('connects: handshake, sweep, then polling', async () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, poller, states, onConnected } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();

    expect(states).toEqual([
      ['connecting', 'Connecting to afg-1'],
      ['connected', 'Connected'],
    ]);
    expect(transport.written[0]).toBe('*IDN?\n');
    expect(supervisor.getIdentity()).toBe('TEKTRONIX,AFG31000,SIM000001,1.0.0');
    expect(log).toHaveBeenCalledWith('[Supervisor] afg-1: connected to TEKTRONIX,AFG31000,SIM000001,1.0.0');
    expect(poller.isRunning()).toBe(true);
    expect(onConnected).toHaveBeenCalledTimes(1);

    await supervisor.disconnect();
  });

  it('ignores connect() while connected', async () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, states } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();
    supervisor.connect();

    expect(states).toHaveLength(2);
    await supervisor.disconnect();
  });

  it('retries a refused connection and logs the fault once', async () => {
    vi.useFakeTimers();
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0, offline: true });
    const { supervisor, states } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();
    expect(supervisor.getState()).toBe('faulted');
    expect(supervisor.getStatus()).toBe('AFG31000-sim: connection refused');

    await vi.advanceTimersByTimeAsync(1000);
    await supervisor.settled();
    expect(states.map(([state]) => state)).toEqual(['connecting', 'faulted', 'connecting', 'faulted']);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('[Supervisor] afg-1: AFG31000-sim: connection refused');

    transport.setOffline(false);
    await vi.advanceTimersByTimeAsync(1000);
    await supervisor.settled();
    expect(supervisor.getState()).toBe('connected');
    expect(log).toHaveBeenCalledWith('[Supervisor] afg-1: recovered');

    await supervisor.disconnect();
  });

  it('gives up on a handshake that takes too long', async () => {
    vi.useFakeTimers();
    const schema = afg();
    const transport = createSimulatedTransport(() => null, { name: 'silent' });
    const { supervisor } = build(schema, transport, { connectionTimeoutMs: 300, readTimeoutMs: 1000 });

    supervisor.connect();
    await vi.advanceTimersByTimeAsync(300);
    await supervisor.settled();

    expect(supervisor.getState()).toBe('faulted');
    expect(supervisor.getStatus()).toBe('afg-1: no handshake within 300ms');

    const done = supervisor.disconnect();
    await vi.advanceTimersByTimeAsync(1000);
    await done;
    expect(supervisor.getState()).toBe('disconnected');
  });

  it('rejects an empty handshake reply', async () => {
    const schema = afg();
    const transport = createSimulatedTransport(cmd => (cmd === '*IDN?\n' ? '' : null));
    const { supervisor } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();

    expect(supervisor.getState()).toBe('faulted');
    expect(supervisor.getStatus()).toBe('Empty reply to *IDN?');
    await supervisor.disconnect();
  });

  it('reports parameters that could not be initialised', async () => {
    const schema = afg();
    const { simulator } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const transport = createSimulatedTransport(cmd =>
      cmd === 'SOURce2:PHASe?\n' ? 'not-a-number' : simulator.handleCommand(cmd)
    );
    const { supervisor } = build(schema, transport, { readTimeoutMs: 20 });

    supervisor.connect();
    await supervisor.settled();

    expect(supervisor.getState()).toBe('connected');
    expect(supervisor.getStatus()).toBe('Connected (1 parameter(s) could not be initialised)');
    await supervisor.disconnect();
  });

  it('reconnects after a transport error while connected', async () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, states, poller } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();

    supervisor.handleTransportError(InstrumentErrors.transport('cable pulled'));
    expect(poller.isRunning()).toBe(false);
    await supervisor.settled();

    expect(states.map(([state]) => state)).toEqual(['connecting', 'connected', 'faulted', 'connecting', 'connected']);
    expect(states[2]).toEqual(['faulted', 'cable pulled']);
    expect(error).toHaveBeenCalledWith('[Supervisor] afg-1: cable pulled');
    await supervisor.disconnect();
  });

  it('ignores transport errors outside the connected state', () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, states } = build(schema, transport);

    supervisor.handleTransportError(InstrumentErrors.transport('late'));
    expect(states).toEqual([]);
    expect(supervisor.getState()).toBe('disconnected');
  });

  it('tears down: stops polling, closes the transport, clears identity', async () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, poller, states } = build(schema, transport);

    supervisor.connect();
    await supervisor.settled();
    await supervisor.disconnect();

    expect(states[states.length - 1]).toEqual(['disconnected', 'Disconnected']);
    expect(poller.isRunning()).toBe(false);
    expect(transport.isOpen()).toBe(false);
    expect(supervisor.getIdentity()).toBeUndefined();
  });

  it('abandons an attempt overtaken by disconnect()', async () => {
    const schema = afg();
    const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
    const { supervisor, states, onConnected } = build(schema, transport);

    supervisor.connect();
    await supervisor.disconnect();
    await supervisor.settled();

    expect(states.map(([state]) => state)).toEqual(['connecting', 'disconnected']);
    expect(onConnected).not.toHaveBeenCalled();
  });
});
