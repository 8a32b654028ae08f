import { describe, it, expect, vi } from 'vitest';
import { createDispatcher, type DispatcherHooks } from '../Dispatcher.js';
import { createCommandLock } from '../CommandLock.js';
import { createAfg31000Schema } from '../../devices/models/afg31000.js';
import { createKeysight33512Schema } from '../../devices/models/keysight-33500.js';
import { findParameter, listParameterInstances } from '../../devices/schema.js';
import { createSimulatedInstrument } from '../../devices/simulation/index.js';
import { createSimulatedTransport, type CommandHandler } from '../../devices/simulation/simulated-transport.js';
import type { InstrumentSchema, ParameterInstance } from '../../devices/types.js';

function afg(): InstrumentSchema {
  const schema = createAfg31000Schema();
  if (!schema.ok) throw schema.error;
  return schema.value;
}

function keysight(): InstrumentSchema {
  const schema = createKeysight33512Schema();
  if (!schema.ok) throw schema.error;
  return schema.value;
}

function instance(schema: InstrumentSchema, key: string, channel: string | null): ParameterInstance {
  const found = findParameter(schema, key, channel);
  if (!found.ok) throw found.error;
  return found.value;
}

async function setup(schema: InstrumentSchema, hooks: DispatcherHooks = {}) {
  const { transport, simulator } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
  await transport.open();
  const dispatcher = createDispatcher(schema, transport, createCommandLock(), { readTimeoutMs: 50 }, hooks);
  return { transport, simulator, dispatcher };
}

async function setupWithHandler(schema: InstrumentSchema, handler: CommandHandler, hooks: DispatcherHooks = {}) {
  const transport = createSimulatedTransport(handler);
  await transport.open();
  const dispatcher = createDispatcher(schema, transport, createCommandLock(), { readTimeoutMs: 20 }, hooks);
  return { transport, dispatcher };
}

describe('Dispatcher', () => {
  describe('write', () => {
    it('sends the SET line, reads the value back and stores it', async () => {
      const schema = afg();
      const onParameterUpdate = vi.fn();
      const { transport, dispatcher } = await setup(schema, { onParameterUpdate });
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');

      const result = await dispatcher.write(descriptor, channel, 1000);

      expect(result).toEqual({ ok: true, value: { value: 1000, mismatch: null } });
      expect(transport.written).toEqual(['SOURce1:FREQ 1000\n', 'SOURce1:FREQ?\n']);
      expect(dispatcher.getValue(descriptor, channel)).toMatchObject({
        key: 'frequency',
        channel: 'channel_1',
        raw: '+1.000000000000000E+3',
        value: 1000,
        pendingWrite: false,
      });
      expect(onParameterUpdate).toHaveBeenCalledTimes(1);
    });

    it('rejects out-of-range values without touching the wire', async () => {
      const schema = afg();
      const onStatus = vi.fn();
      const { transport, dispatcher } = await setup(schema, { onStatus });
      const { descriptor, channel } = instance(schema, 'triggerTime', null);

      const result = await dispatcher.write(descriptor, channel, 600);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('INVALID_OPTION');
      expect(onStatus).toHaveBeenCalledWith('Invalid value for triggerTime: 600. Must be at most 500.');
      expect(transport.written).toEqual([]);
      expect(dispatcher.getValue(descriptor, channel)).toBeUndefined();
    });

    it('appends the unit suffix for trigger time', async () => {
      const schema = afg();
      const { transport, dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'triggerTime', null);

      const result = await dispatcher.write(descriptor, channel, 10);

      expect(result).toEqual({ ok: true, value: { value: 10, mismatch: null } });
      expect(transport.written).toEqual(['TRIG:TIM 10 s\n', 'TRIG:TIM?\n']);
    });

    it('refuses read-only parameters', async () => {
      const schema = afg();
      const { transport, dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'identification', null);

      const result = await dispatcher.write(descriptor, channel, 'x');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('READ_ONLY');
        expect(result.error.message).toBe('Parameter identification is read-only');
      }
      expect(transport.written).toEqual([]);
    });

    it('keeps the hardware value and reports a read-back mismatch', async () => {
      const schema = afg();
      const onReadBackMismatch = vi.fn();
      const onStatus = vi.fn();
      const { dispatcher } = await setupWithHandler(
        schema,
        cmd => (cmd === 'SOURce1:FREQ?\n' ? '+5.0E+2' : null),
        { onReadBackMismatch, onStatus }
      );
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');

      const result = await dispatcher.write(descriptor, channel, 1000);

      const report = { key: 'frequency', channel: 'channel_1', requested: 1000, actual: 500 };
      expect(result).toEqual({ ok: true, value: { value: 500, mismatch: report } });
      expect(onReadBackMismatch).toHaveBeenCalledWith(report);
      expect(onStatus).toHaveBeenCalledWith('Read-back mismatch on channel_1.frequency: requested 1000, instrument reports 500');
      expect(dispatcher.getValue(descriptor, channel)?.value).toBe(500);
    });

    it('translates human enum names and reads back the same name', async () => {
      const schema = afg();
      const { transport, dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'functionShape', 'channel_2');

      const result = await dispatcher.write(descriptor, channel, 'Square');

      expect(result).toEqual({ ok: true, value: { value: 'Square', mismatch: null } });
      expect(transport.written).toEqual(['SOURce2:FUNCtion SQU\n', 'SOURce2:FUNCtion?\n']);
    });

    it('enforces pulse width against the stored period of the same channel', async () => {
      const schema = afg();
      const { dispatcher } = await setup(schema);
      const period = instance(schema, 'pulsePeriod', 'channel_1');
      const width = instance(schema, 'pulseWidth', 'channel_1');
      const otherWidth = instance(schema, 'pulseWidth', 'channel_2');

      await dispatcher.write(period.descriptor, period.channel, 0.002);

      const rejected = await dispatcher.write(width.descriptor, width.channel, 0.003);
      expect(rejected.ok).toBe(false);
      if (!rejected.ok) expect(rejected.error.code).toBe('INVALID_OPTION');

      // channel 2 has no known period yet
      const accepted = await dispatcher.write(otherWidth.descriptor, otherWidth.channel, 0.003);
      expect(accepted.ok).toBe(true);
    });

    it('validates pulse width against a period written concurrently', async () => {
      const schema = keysight();
      const { dispatcher } = await setup(schema);
      const period = instance(schema, 'pulsePeriod', 'channel_1');
      const width = instance(schema, 'pulseWidth', 'channel_1');

      await dispatcher.write(period.descriptor, period.channel, 5);

      const [periodResult, widthResult] = await Promise.all([
        dispatcher.write(period.descriptor, period.channel, 1),
        dispatcher.write(width.descriptor, width.channel, 2),
      ]);

      expect(periodResult).toEqual({ ok: true, value: { value: 1, mismatch: null } });
      expect(widthResult.ok).toBe(false);
      if (!widthResult.ok) {
        expect(widthResult.error.code).toBe('INVALID_OPTION');
        expect(widthResult.error.message).toBe(
          'Invalid value for pulseWidth: 2. Has to be smaller than pulsePeriod 1 (pulse-width-within-period).'
        );
      }
      expect(dispatcher.getValue(width.descriptor, width.channel)).toBeUndefined();
    });

    it('marks the value pending only while its exchange holds the lock', async () => {
      const schema = afg();
      const lock = createCommandLock();
      const { transport } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
      await transport.open();
      const dispatcher = createDispatcher(schema, transport, lock, { readTimeoutMs: 50 });
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');

      let release = () => {};
      const held = lock.run(() => new Promise<void>(resolve => { release = resolve; }));
      const write = dispatcher.write(descriptor, channel, 1000);

      await new Promise(resolve => setTimeout(resolve, 0));
      expect(dispatcher.getValue(descriptor, channel)).toBeUndefined();
      expect(transport.written).toEqual([]);

      release();
      await held;
      expect(await write).toEqual({ ok: true, value: { value: 1000, mismatch: null } });
      expect(dispatcher.getValue(descriptor, channel)?.pendingWrite).toBe(false);
    });

    it('checks arbitrary forms against the discovered catalog by full path', async () => {
      const schema = keysight();
      const { dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'arbitraryForm', 'channel_1');

      dispatcher.setDiscoveredOptions(['INT:\\BUILTIN\\SINC.arb', 'INT:\\BUILTIN\\HAVERSINE.arb']);
      expect(dispatcher.getDiscoveredOptions()).toEqual(['INT:\\BUILTIN\\SINC.arb', 'INT:\\BUILTIN\\HAVERSINE.arb']);

      const rejected = await dispatcher.write(descriptor, channel, 'SINC.arb');
      expect(rejected.ok).toBe(false);
      if (!rejected.ok) expect(rejected.error.code).toBe('INVALID_OPTION');

      const accepted = await dispatcher.write(descriptor, channel, 'INT:\\BUILTIN\\SINC.arb');
      expect(accepted).toEqual({ ok: true, value: { value: 'INT:\\BUILTIN\\SINC.arb', mismatch: null } });
    });

    it('writes and reads back an infinite output load', async () => {
      const schema = keysight();
      const { transport, dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'outputLoad', 'channel_2');

      const result = await dispatcher.write(descriptor, channel, 'inf');

      expect(result).toEqual({ ok: true, value: { value: 'INF', mismatch: null } });
      expect(transport.written).toEqual(['OUTPut2:LOAD INF\n', 'OUTPut2:LOAD?\n']);
      expect(dispatcher.getValue(descriptor, channel)).toMatchObject({
        raw: '+9.900000000000000E+37',
        value: 'INF',
      });
      expect(await dispatcher.query(descriptor, channel)).toEqual({ ok: true, value: 'INF' });
    });

    it('hands link failures to the supervisor hook', async () => {
      const schema = afg();
      const onTransportError = vi.fn();
      const { transport, dispatcher } = await setup(schema, { onTransportError });
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');
      transport.drop();

      const result = await dispatcher.write(descriptor, channel, 1000);

      expect(result.ok).toBe(false);
      expect(onTransportError).toHaveBeenCalledTimes(1);
      expect(onTransportError.mock.calls[0][0].message).toBe('AFG31000-sim: link down');
      expect(dispatcher.getValue(descriptor, channel)?.pendingWrite).toBe(false);
    });
  });

  describe('query', () => {
    it('substitutes the channel alias into the GET line', async () => {
      const schema = afg();
      const { transport, simulator, dispatcher } = await setup(schema);
      simulator.setToken('SOURce2:VOLT:OFFS', '+2.5E-1');
      const { descriptor, channel } = instance(schema, 'offset', 'channel_2');

      const result = await dispatcher.query(descriptor, channel);

      expect(result).toEqual({ ok: true, value: 0.25 });
      expect(transport.written).toEqual(['SOURce2:VOLT:OFFS?\n']);
    });

    it('reports malformed replies as status without storing them', async () => {
      const schema = afg();
      const onStatus = vi.fn();
      const { dispatcher } = await setupWithHandler(schema, () => 'garbage', { onStatus });
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');

      const result = await dispatcher.query(descriptor, channel);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('MALFORMED_RESPONSE');
      expect(onStatus).toHaveBeenCalledWith('frequency return value non-numeric response: "garbage"');
      expect(dispatcher.getValue(descriptor, channel)).toBeUndefined();
    });

    it('does not let an empty error queue overwrite the last error', async () => {
      const schema = afg();
      const { simulator, dispatcher } = await setup(schema);
      const { descriptor, channel } = instance(schema, 'systemError', null);

      simulator.pushError('-222,"Data out of range"');
      expect(await dispatcher.query(descriptor, channel)).toEqual({ ok: true, value: '-222,"Data out of range"' });
      expect(await dispatcher.query(descriptor, channel)).toEqual({ ok: true, value: '+0,"No error"' });
      expect(dispatcher.getValue(descriptor, channel)?.value).toBe('-222,"Data out of range"');
    });

    it('times out with TRANSPORT_TIMEOUT when nothing answers', async () => {
      const schema = afg();
      const onTransportError = vi.fn();
      const { dispatcher } = await setupWithHandler(schema, () => null, { onTransportError });
      const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');

      const result = await dispatcher.query(descriptor, channel);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('TRANSPORT_TIMEOUT');
      expect(onTransportError).toHaveBeenCalledTimes(1);
    });
  });

  it('never interleaves exchanges', async () => {
    const schema = afg();
    const { transport, dispatcher } = await setup(schema);
    const freq = instance(schema, 'frequency', 'channel_1');
    const offset = instance(schema, 'offset', 'channel_2');

    await Promise.all([
      dispatcher.write(freq.descriptor, freq.channel, 1000),
      dispatcher.query(offset.descriptor, offset.channel),
      dispatcher.write(freq.descriptor, freq.channel, 2000),
    ]);

    expect(transport.written).toEqual([
      'SOURce1:FREQ 1000\n',
      'SOURce1:FREQ?\n',
      'SOURce2:VOLT:OFFS?\n',
      'SOURce1:FREQ 2000\n',
      'SOURce1:FREQ?\n',
    ]);
  });

  it('sends the query-with-argument form for requests', async () => {
    const schema = keysight();
    const { transport, dispatcher } = await setup(schema);
    const { descriptor, channel } = instance(schema, 'arbCatalog', null);

    const result = await dispatcher.request(descriptor, channel, '"INT:\\BUILTIN"');

    expect(transport.written).toEqual(['MMEMory:CAT:DATA:ARB? "INT:\\BUILTIN"\n']);
    expect(result).toEqual({
      ok: true,
      value: '+3000,+2000000,"SINC.arb,ARB,1000","HAVERSINE.arb,ARB,1000","EXP_RISE.arb,ARB,1000"',
    });
  });

  describe('runConnectSweep', () => {
    it('reads every parameter in schema order', async () => {
      const schema = afg();
      const { dispatcher } = await setup(schema);

      const report = await dispatcher.runConnectSweep();

      expect(report.abortedBy).toBeNull();
      expect(report.items).toHaveLength(listParameterInstances(schema).length);
      expect(report.items[0]).toEqual({ key: 'identification', channel: null, action: 'read', error: null });
      expect(report.items.filter(i => i.error !== null)).toEqual([]);
      expect(report.items.every(i => i.action === 'read')).toBe(true);
    });

    it('writes writeOnConnect parameters, replaying the user value', async () => {
      const schema = keysight();
      const { transport, dispatcher } = await setup(schema);
      const display = instance(schema, 'display', null);

      await dispatcher.runConnectSweep();
      expect(transport.written).toContain('DISPlay OFF\n');
      expect(transport.written).not.toContain('MMEMory:CAT:DATA:ARB?\n');

      await dispatcher.write(display.descriptor, display.channel, 'ON');
      transport.written.length = 0;
      await dispatcher.runConnectSweep();
      expect(transport.written).toContain('DISPlay ON\n');
      expect(transport.written).not.toContain('DISPlay OFF\n');
    });

    it('keeps going after a timeout on one item', async () => {
      const schema = afg();
      const { simulator } = createSimulatedInstrument(schema, { latencyMs: 0, latencyJitterMs: 0 });
      const { dispatcher } = await setupWithHandler(schema, cmd =>
        cmd === 'SOURce1:FREQ?\n' ? null : simulator.handleCommand(cmd)
      );

      const report = await dispatcher.runConnectSweep();

      expect(report.abortedBy).toBeNull();
      const failed = report.items.filter(i => i.error !== null);
      expect(failed.map(i => [i.key, i.channel, i.error?.code])).toEqual([['frequency', 'channel_1', 'TRANSPORT_TIMEOUT']]);
    });

    it('stops on a broken link', async () => {
      const schema = afg();
      const onTransportError = vi.fn();
      const { transport, dispatcher } = await setup(schema, { onTransportError });
      transport.drop();

      const report = await dispatcher.runConnectSweep();

      expect(report.items).toHaveLength(1);
      expect(report.abortedBy?.code).toBe('TRANSPORT_ERROR');
      // The supervisor handles its own sweep failures
      expect(onTransportError).not.toHaveBeenCalled();
    });
  });

  it('snapshots copies of the store', async () => {
    const schema = afg();
    const { dispatcher } = await setup(schema);
    const { descriptor, channel } = instance(schema, 'frequency', 'channel_1');
    await dispatcher.query(descriptor, channel);

    const [first] = dispatcher.snapshot();
    first.value = 42;
    expect(dispatcher.getValue(descriptor, channel)?.value).toBe(0);
  });
});
