/**
 * TCP Transport
 * Raw SCPI socket (LXI instruments listen on port 5025)
 */

import { Socket } from 'net';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { InstrumentError, InstrumentErrors, toTransportError } from '../errors.js';
import { createLineBuffer } from './line-buffer.js';

export const DEFAULT_SCPI_PORT = 5025;

export interface TcpConfig {
  host: string;
  port?: number;
  connectTimeout?: number;  // ms (default: 5000)
}

export function createTcpTransport(config: TcpConfig): Transport {
  const { host, port = DEFAULT_SCPI_PORT, connectTimeout = 5000 } = config;
  const address = `${host}:${port}`;
  const lines = createLineBuffer();

  let socket: Socket | null = null;
  let partial = '';
  let opened = false;
  let disconnectError: InstrumentError | null = null;

  function onData(chunk: Buffer): void {
    partial += chunk.toString('ascii');
    let newline = partial.indexOf('\n');
    while (newline >= 0) {
      lines.push(partial.slice(0, newline));
      partial = partial.slice(newline + 1);
      newline = partial.indexOf('\n');
    }
  }

  function markDisconnected(error: InstrumentError): void {
    if (!opened) return;
    opened = false;
    disconnectError = error;
    lines.fail(error);
  }

  return {
    async open(): Promise<Result<void, InstrumentError>> {
      if (opened) return Ok();

      const sock = new Socket();
      sock.setNoDelay(true);
      partial = '';
      lines.clear();

      try {
        await new Promise<void>((resolve, reject) => {
          const timeoutId = setTimeout(() => {
            sock.destroy();
            reject(InstrumentErrors.timeout(`Connecting to ${address} timed out after ${connectTimeout}ms`));
          }, connectTimeout);

          sock.once('error', (err) => {
            clearTimeout(timeoutId);
            reject(err);
          });
          sock.connect(port, host, () => {
            clearTimeout(timeoutId);
            sock.removeAllListeners('error');
            resolve();
          });
        });
      } catch (e) {
        sock.destroy();
        return Err(toTransportError(e, `Failed to connect to ${address}`));
      }

      sock.on('data', onData);
      sock.on('error', (err) => markDisconnected(toTransportError(err, address)));
      sock.on('close', () => markDisconnected(InstrumentErrors.transport(`${address}: connection closed by peer`)));

      socket = sock;
      opened = true;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      const sock = socket;
      socket = null;
      opened = false;
      disconnectError = null;
      if (!sock) return Ok();

      sock.removeAllListeners();
      lines.fail(InstrumentErrors.transport(`${address}: connection closed`));

      await new Promise<void>((resolve) => {
        if (sock.destroyed) {
          resolve();
          return;
        }
        sock.once('close', () => resolve());
        sock.end();
        sock.destroy();
      });
      return Ok();
    },

    async write(data: string): Promise<Result<void, InstrumentError>> {
      const sock = socket;
      if (!sock || !opened) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${address}: not connected`));
      }

      lines.clear();
      partial = '';
      try {
        await new Promise<void>((resolve, reject) => {
          sock.write(data, 'ascii', (err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(toTransportError(e, `Write to ${address} failed`));
      }
      return Ok();
    },

    async readLine(timeoutMs: number): Promise<Result<string, InstrumentError>> {
      if (!socket || !opened) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${address}: not connected`));
      }
      return lines.next(timeoutMs);
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
