/**
 * Serial Transport
 * Line-oriented SCPI over a serial port (RS-232 or USB virtual COM)
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { InstrumentError, InstrumentErrors, toTransportError } from '../errors.js';
import { createLineBuffer } from './line-buffer.js';

export interface SerialConfig {
  path: string;
  baudRate?: number;  // default: 9600
}

export function createSerialTransport(config: SerialConfig): Transport {
  const { path, baudRate = 9600 } = config;
  const lines = createLineBuffer();

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: InstrumentError | null = null;

  function markDisconnected(error: InstrumentError): void {
    disconnected = true;
    disconnectError = error;
    opened = false;
    lines.fail(error);
  }

  function detach(): void {
    parser?.removeAllListeners();
    port?.removeAllListeners();
    port = null;
    parser = null;
    opened = false;
  }

  return {
    async open(): Promise<Result<void, InstrumentError>> {
      if (opened) return Ok();

      const serial = new SerialPort({
        path,
        baudRate,
        autoOpen: false,
      });

      // Listen for port disconnection events
      serial.on('close', () => {
        markDisconnected(InstrumentErrors.transport(`${path}: port closed`));
      });

      serial.on('error', (err: Error) => {
        markDisconnected(toTransportError(err, path));
      });

      const lineParser = serial.pipe(new ReadlineParser({ delimiter: '\n' }));
      lineParser.on('data', (line: string) => lines.push(line));

      port = serial;
      parser = lineParser;

      try {
        await new Promise<void>((resolve, reject) => {
          serial.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        detach();
        return Err(toTransportError(e, `Failed to open ${path}`));
      }

      lines.clear();
      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      const serial = port;
      if (!serial) return Ok();

      const wasOpen = opened && !disconnected;
      detach();
      lines.fail(InstrumentErrors.transport(`${path}: port closed`));

      if (wasOpen) {
        await new Promise<void>((resolve) => {
          serial.close(() => resolve());
        });
      }

      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async write(data: string): Promise<Result<void, InstrumentError>> {
      if (disconnected) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${path}: port disconnected`));
      }
      const serial = port;
      if (!serial || !opened) {
        return Err(InstrumentErrors.transport(`${path}: port not opened`));
      }

      lines.clear();
      try {
        await new Promise<void>((resolve, reject) => {
          serial.write(data, (err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(toTransportError(e, `Write to ${path} failed`));
      }
      return Ok();
    },

    async readLine(timeoutMs: number): Promise<Result<string, InstrumentError>> {
      if (disconnected) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${path}: port disconnected`));
      }
      if (!port || !opened) {
        return Err(InstrumentErrors.transport(`${path}: port not opened`));
      }
      return lines.next(timeoutMs);
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

