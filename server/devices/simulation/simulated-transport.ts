/**
 * Simulated Transport
 * Implements Transport interface for simulated instruments
 *
 * Routes SCPI lines to a simulator and queues its replies for readLine().
 * Adds configurable latency to mimic real device timing, and can be taken
 * offline, muted or dropped to exercise reconnect handling.
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { InstrumentError, InstrumentErrors } from '../errors.js';
import { createLineBuffer } from '../transports/line-buffer.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 0) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 0) */
  jitterMs?: number;
  /** Name for error messages */
  name?: string;
  /** Start unreachable: open() is refused */
  offline?: boolean;
}

export type CommandHandler = (cmd: string) => string | null;

export interface SimulatedTransport extends Transport {
  /** Refuse further open() calls (and drop the link when going offline) */
  setOffline(offline: boolean): void;
  /** Swallow replies so queries time out */
  setMuted(muted: boolean): void;
  /** Break the link as if the cable was pulled */
  drop(): void;
  /** Every line written, in order */
  readonly written: string[];
}

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): SimulatedTransport {
  const { latencyMs = 0, jitterMs = 0, name = 'simulated' } = config;
  const lines = createLineBuffer();
  const written: string[] = [];

  let opened = false;
  let offline = config.offline ?? false;
  let muted = false;

  async function delay(): Promise<void> {
    const totalDelay = latencyMs + Math.random() * jitterMs;
    if (totalDelay <= 0) return;
    await new Promise(r => setTimeout(r, totalDelay));
  }

  function linkDown(): InstrumentError {
    return InstrumentErrors.transport(`${name}: link down`);
  }

  function drop(): void {
    if (!opened) return;
    opened = false;
    lines.fail(linkDown());
  }

  return {
    written,

    async open(): Promise<Result<void, InstrumentError>> {
      await delay();
      if (offline) {
        return Err(InstrumentErrors.refused(`${name}: connection refused`));
      }
      lines.clear();
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      lines.fail(linkDown());
      lines.clear();
      return Ok();
    },

    async write(data: string): Promise<Result<void, InstrumentError>> {
      if (!opened) return Err(linkDown());
      lines.clear();
      written.push(data);
      await delay();
      // The link may have dropped while the line was in flight
      if (!opened) return Err(linkDown());

      const reply = handler(data);
      if (reply !== null && !muted) {
        lines.push(reply);
      }
      return Ok();
    },

    async readLine(timeoutMs: number): Promise<Result<string, InstrumentError>> {
      if (!opened) return Err(linkDown());
      return lines.next(timeoutMs);
    },

    isOpen(): boolean {
      return opened;
    },

    setOffline(value: boolean): void {
      offline = value;
      if (value) drop();
    },

    setMuted(value: boolean): void {
      muted = value;
    },

    drop,
  };
}
