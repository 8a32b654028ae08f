/**
 * Dispatcher - the only path from parameters to the wire
 *
 * - Validates and encodes SET commands, decodes GET replies
 * - Holds the command lock for each exchange, including the read-back query
 *   that follows a write, so nothing interleaves with it
 * - Resolves {channel} aliasing per channel node
 * - Owns the per-instance value store (raw, typed value, pendingWrite)
 * - Runs the connect-time sweep in schema order
 *
 * Transport-level failures go to onTransportError (the supervisor);
 * parameter-level failures go to onStatus. Both are reported after the lock
 * is released.
 */

import type {
  InstrumentSchema,
  ParameterDescriptor,
  ChannelNode,
  Transport,
  ParameterValue,
  ParameterInput,
  ParameterSnapshot,
  ReadBackReport,
  Result,
} from '../devices/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError, InstrumentErrors, isTransportError } from '../devices/errors.js';
import { ScpiCodec, type CodecContext } from '../devices/codec.js';
import { listParameterInstances } from '../devices/schema.js';
import type { CommandLock } from './CommandLock.js';

export interface WriteOutcome {
  /** Value stored after the write (the hardware's when read back) */
  value: ParameterValue;
  mismatch: ReadBackReport | null;
}

export interface SweepItem {
  key: string;
  channel: string | null;
  action: 'write' | 'read';
  error: InstrumentError | null;
}

export interface SweepReport {
  items: SweepItem[];
  /** Set when a link failure stopped the sweep early */
  abortedBy: InstrumentError | null;
}

export interface DispatcherHooks {
  onTransportError?: (error: InstrumentError) => void;
  onParameterUpdate?: (snapshot: ParameterSnapshot) => void;
  onStatus?: (message: string) => void;
  onReadBackMismatch?: (report: ReadBackReport) => void;
}

export interface DispatcherConfig {
  readTimeoutMs?: number;
}

export interface Dispatcher {
  write(descriptor: ParameterDescriptor, channel: ChannelNode | null, value: ParameterInput): Promise<Result<WriteOutcome, InstrumentError>>;
  query(descriptor: ParameterDescriptor, channel: ChannelNode | null): Promise<Result<ParameterValue, InstrumentError>>;
  request(descriptor: ParameterDescriptor, channel: ChannelNode | null, argument: string): Promise<Result<string, InstrumentError>>;
  runConnectSweep(): Promise<SweepReport>;
  getValue(descriptor: ParameterDescriptor, channel: ChannelNode | null): ParameterSnapshot | undefined;
  snapshot(): ParameterSnapshot[];
  setDiscoveredOptions(options: string[]): void;
  getDiscoveredOptions(): string[];
}

const DEFAULT_READ_TIMEOUT_MS = 2000;

type Origin = 'user' | 'sweep';

function nodeName(channel: ChannelNode | null): string {
  return channel?.name ?? 'device';
}

function storeKey(descriptor: ParameterDescriptor, channel: ChannelNode | null): string {
  return `${nodeName(channel)}/${descriptor.key}`;
}

function label(descriptor: ParameterDescriptor, channel: ChannelNode | null): string {
  return channel ? `${channel.name}.${descriptor.key}` : descriptor.key;
}

export function createDispatcher(
  schema: InstrumentSchema,
  transport: Transport,
  lock: CommandLock,
  config: DispatcherConfig = {},
  hooks: DispatcherHooks = {}
): Dispatcher {
  const readTimeoutMs = config.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

  const values = new Map<string, ParameterSnapshot>();
  // Last value the user set, replayed by writeOnConnect sweeps
  const userValues = new Map<string, ParameterValue>();
  let discoveredOptions: string[] = [];

  function entry(descriptor: ParameterDescriptor, channel: ChannelNode | null): ParameterSnapshot {
    const id = storeKey(descriptor, channel);
    let current = values.get(id);
    if (!current) {
      current = {
        key: descriptor.key,
        channel: channel?.name ?? null,
        raw: null,
        value: null,
        lastUpdated: null,
        pendingWrite: false,
      };
      values.set(id, current);
    }
    return current;
  }

  function store(descriptor: ParameterDescriptor, channel: ChannelNode | null, raw: string, value: ParameterValue): void {
    const current = entry(descriptor, channel);
    current.raw = raw;
    current.value = value;
    current.lastUpdated = Date.now();
    hooks.onParameterUpdate?.({ ...current });
  }

  function contextFor(channel: ChannelNode | null): CodecContext {
    const node = nodeName(channel);
    return {
      currentValue(key: string): ParameterValue | undefined {
        return values.get(`${node}/${key}`)?.value ?? undefined;
      },
      discoveredOptions,
    };
  }

  function report(error: InstrumentError, notifySupervisor: boolean): void {
    if (isTransportError(error)) {
      if (notifySupervisor) hooks.onTransportError?.(error);
    } else {
      hooks.onStatus?.(error.message);
    }
  }

  // Must run under the lock
  async function exchange(line: string): Promise<Result<string, InstrumentError>> {
    const sent = await transport.write(line);
    if (!sent.ok) return sent;
    return transport.readLine(readTimeoutMs);
  }

  async function writeValue(
    descriptor: ParameterDescriptor,
    channel: ChannelNode | null,
    value: ParameterInput,
    origin: Origin
  ): Promise<Result<WriteOutcome, InstrumentError>> {
    const notify = origin === 'user';

    if (descriptor.readOnly) {
      const error = InstrumentErrors.readOnly(descriptor.key);
      report(error, notify);
      return Err(error);
    }

    const alias = channel?.alias ?? null;

    // Validation sees the store as it is when the command goes out
    const result = await lock.run(async (): Promise<Result<WriteOutcome, InstrumentError>> => {
      const validated = ScpiCodec.validate(descriptor, value, contextFor(channel));
      if (!validated.ok) return validated;
      const requested = validated.value;

      const current = entry(descriptor, channel);
      current.pendingWrite = true;
      try {
        const sent = await transport.write(ScpiCodec.formatCommand(descriptor, alias, requested));
        if (!sent.ok) return sent;

        if (origin === 'user') {
          userValues.set(storeKey(descriptor, channel), requested);
        }

        // No read-back: the requested value is what we believe is set
        if (!descriptor.commandReadBack) {
          current.pendingWrite = false;
          store(descriptor, channel, ScpiCodec.toDeviceToken(descriptor, requested), requested);
          return Ok({ value: requested, mismatch: null });
        }

        const raw = await exchange(ScpiCodec.encodeQuery(descriptor, alias));
        if (!raw.ok) return raw;
        const decoded = ScpiCodec.decode(descriptor, raw.value);
        if (!decoded.ok) return decoded;

        current.pendingWrite = false;
        store(descriptor, channel, raw.value, decoded.value);

        if (ScpiCodec.valuesEqual(descriptor, requested, decoded.value)) {
          return Ok({ value: decoded.value, mismatch: null });
        }
        const mismatch: ReadBackReport = {
          key: descriptor.key,
          channel: channel?.name ?? null,
          requested,
          actual: decoded.value,
        };
        return Ok({ value: decoded.value, mismatch });
      } finally {
        current.pendingWrite = false;
      }
    });

    if (!result.ok) {
      report(result.error, notify);
      return result;
    }

    const { mismatch } = result.value;
    if (mismatch) {
      hooks.onReadBackMismatch?.(mismatch);
      const error = InstrumentErrors.readBackMismatch(
        `Read-back mismatch on ${label(descriptor, channel)}: requested ${mismatch.requested}, instrument reports ${mismatch.actual}`
      );
      report(error, notify);
    }
    return result;
  }

  async function queryValue(
    descriptor: ParameterDescriptor,
    channel: ChannelNode | null,
    origin: Origin
  ): Promise<Result<ParameterValue, InstrumentError>> {
    const notify = origin === 'user';
    const line = ScpiCodec.encodeQuery(descriptor, channel?.alias ?? null);

    const result = await lock.run(async (): Promise<Result<ParameterValue, InstrumentError>> => {
      const raw = await exchange(line);
      if (!raw.ok) return raw;

      const decoded = ScpiCodec.decode(descriptor, raw.value);
      if (!decoded.ok) return decoded;

      if (!descriptor.ignoreResponsePattern?.test(raw.value)) {
        store(descriptor, channel, raw.value, decoded.value);
      }
      return decoded;
    });

    if (!result.ok) report(result.error, notify);
    return result;
  }

  return {
    write(descriptor, channel, value) {
      return writeValue(descriptor, channel, value, 'user');
    },

    query(descriptor, channel) {
      return queryValue(descriptor, channel, 'user');
    },

    async request(descriptor, channel, argument) {
      const line = ScpiCodec.encodeQuery(descriptor, channel?.alias ?? null, argument);
      const result = await lock.run(() => exchange(line));
      if (!result.ok) report(result.error, true);
      return result;
    },

    async runConnectSweep(): Promise<SweepReport> {
      const items: SweepItem[] = [];

      for (const { descriptor, channel } of listParameterInstances(schema)) {
        const steps: Array<'write' | 'read'> = [];
        if (descriptor.writeOnConnect && !descriptor.readOnly) steps.push('write');
        if (descriptor.readOnConnect) steps.push('read');

        for (const action of steps) {
          let error: InstrumentError | null = null;

          if (action === 'write') {
            const value = userValues.get(storeKey(descriptor, channel)) ?? descriptor.defaultValue;
            if (value === undefined) continue;
            const written = await writeValue(descriptor, channel, value, 'sweep');
            if (!written.ok) error = written.error;
          } else {
            const read = await queryValue(descriptor, channel, 'sweep');
            if (!read.ok) error = read.error;
          }

          items.push({ key: descriptor.key, channel: channel?.name ?? null, action, error });

          // A timeout is local to this item; a broken link ends the sweep
          if (error && isTransportError(error) && error.code !== 'TRANSPORT_TIMEOUT') {
            return { items, abortedBy: error };
          }
        }
      }

      return { items, abortedBy: null };
    },

    getValue(descriptor, channel) {
      const current = values.get(storeKey(descriptor, channel));
      return current ? { ...current } : undefined;
    },

    snapshot(): ParameterSnapshot[] {
      return [...values.values()].map(v => ({ ...v }));
    },

    setDiscoveredOptions(options: string[]): void {
      discoveredOptions = [...options];
    },

    getDiscoveredOptions(): string[] {
      return [...discoveredOptions];
    },
  };
}
