/**
 * Line Buffer
 * Queues response lines from a stream transport and hands them to readLine()
 */

import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { InstrumentError, InstrumentErrors } from '../errors.js';

export interface LineBuffer {
  /** Feed one received line (terminators are trimmed here) */
  push(line: string): void;
  /** Wait for the next line, or TRANSPORT_TIMEOUT after timeoutMs */
  next(timeoutMs: number): Promise<Result<string, InstrumentError>>;
  /** Fail the pending reader, e.g. when the port goes away */
  fail(error: InstrumentError): void;
  /** Drop unread lines so a late reply is never taken for the next one */
  clear(): void;
  pending(): number;
}

interface Waiter {
  resolve: (result: Result<string, InstrumentError>) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

export function createLineBuffer(): LineBuffer {
  const lines: string[] = [];
  let waiter: Waiter | null = null;

  function settle(result: Result<string, InstrumentError>): void {
    if (!waiter) return;
    const { resolve, timeoutId } = waiter;
    waiter = null;
    clearTimeout(timeoutId);
    resolve(result);
  }

  return {
    push(line: string): void {
      const trimmed = line.replace(/[\r\n]+$/, '').trim();
      if (waiter) {
        settle(Ok(trimmed));
      } else {
        lines.push(trimmed);
      }
    },

    next(timeoutMs: number): Promise<Result<string, InstrumentError>> {
      const queued = lines.shift();
      if (queued !== undefined) {
        return Promise.resolve(Ok(queued));
      }
      // Only one reader at a time; a stale one is failed
      settle(Err(InstrumentErrors.transport('Superseded by a newer read')));

      return new Promise(resolve => {
        const timeoutId = setTimeout(() => {
          settle(Err(InstrumentErrors.timeout(`No response within ${timeoutMs}ms`)));
        }, timeoutMs);
        waiter = { resolve, timeoutId };
      });
    },

    fail(error: InstrumentError): void {
      settle(Err(error));
    },

    clear(): void {
      lines.length = 0;
    },

    pending(): number {
      return lines.length;
    },
  };
}
