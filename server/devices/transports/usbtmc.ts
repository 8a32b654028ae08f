/**
 * USB-TMC (Test & Measurement Class) Transport
 * Implements the USB-TMC bulk protocol for line-oriented SCPI
 */

import { findByIds } from 'usb';
import type { Device, Interface, InEndpoint, OutEndpoint } from 'usb';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { InstrumentError, InstrumentErrors, toTransportError } from '../errors.js';

// USB-TMC Message IDs
export const DEV_DEP_MSG_OUT = 1;
export const REQUEST_DEV_DEP_MSG_IN = 2;

const HEADER_SIZE = 12;
const MAX_TRANSFER = 64 * 1024;
// Upper bound on messages making up one response
const MAX_MESSAGES = 64;

// Fatal USB errors that indicate device disconnection
const FATAL_USB_ERRORS = [
  'LIBUSB_ERROR_NO_DEVICE',
  'LIBUSB_ERROR_IO',
  'LIBUSB_ERROR_PIPE',
  'LIBUSB_TRANSFER_NO_DEVICE',
];

export interface USBTMCConfig {
  vendorId: number;
  productId: number;
}

export type DeviceLocator = (vendorId: number, productId: number) => Device | undefined;

// Exported for testing
export function buildDevDepMsgOut(message: string, bTag: number): Buffer {
  const msgBytes = Buffer.from(message, 'ascii');

  // Header: 12 bytes + message + padding to 4-byte boundary
  const paddedLen = Math.ceil((HEADER_SIZE + msgBytes.length) / 4) * 4;
  const buf = Buffer.alloc(paddedLen);

  buf[0] = DEV_DEP_MSG_OUT;      // MsgID
  buf[1] = bTag;                  // bTag
  buf[2] = ~bTag & 0xFF;         // bTagInverse
  buf.writeUInt32LE(msgBytes.length, 4);  // TransferSize
  buf[8] = 0x01;                  // bmTransferAttributes (EOM)
  msgBytes.copy(buf, HEADER_SIZE);

  return buf;
}

// Exported for testing
export function buildRequestDevDepMsgIn(maxLength: number, bTag: number): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);

  buf[0] = REQUEST_DEV_DEP_MSG_IN;  // MsgID
  buf[1] = bTag;                     // bTag
  buf[2] = ~bTag & 0xFF;            // bTagInverse
  buf.writeUInt32LE(maxLength, 4);   // TransferSize

  return buf;
}

// Exported for testing - parse one DEV_DEP_MSG_IN message
export function parseDevDepMsgIn(response: Buffer): Result<{ data: Buffer; eom: boolean }, string> {
  if (response.length < HEADER_SIZE) {
    return Err(`USBTMC response too short: ${response.length} bytes (need at least ${HEADER_SIZE})`);
  }
  const transferSize = response.readUInt32LE(4);
  const eom = (response[8] & 0x01) !== 0;
  return Ok({ data: response.subarray(HEADER_SIZE, HEADER_SIZE + transferSize), eom });
}

// Tag generator - cycles 1-255
export function createTagGenerator(): () => number {
  let bTag = 0;
  return () => {
    bTag = (bTag % 255) + 1;
    return bTag;
  };
}

const locateDevice: DeviceLocator = (vendorId, productId) => findByIds(vendorId, productId);

/**
 * The device is looked up again on every open(), so a replugged
 * instrument is found by the next reconnect attempt.
 */
export function createUSBTMCTransport(config: USBTMCConfig, locate: DeviceLocator = locateDevice): Transport {
  const { vendorId, productId } = config;
  const label = `USB ${vendorId.toString(16).padStart(4, '0')}:${productId.toString(16).padStart(4, '0')}`;
  const nextTag = createTagGenerator();

  let device: Device | null = null;
  let iface: Interface | null = null;
  let bulkOutEndpoint: OutEndpoint | null = null;
  let bulkInEndpoint: InEndpoint | null = null;
  let opened = false;
  let disconnectError: InstrumentError | null = null;

  // Check if an error indicates device disconnection
  function isFatalError(err: Error): boolean {
    return FATAL_USB_ERRORS.some(code => err.message.includes(code));
  }

  function markDisconnected(err: Error): void {
    disconnectError = toTransportError(err, `${label} disconnected`);
    opened = false;
  }

  function transferOut(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!bulkOutEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }
      bulkOutEndpoint.transfer(data, (err) => {
        if (err) {
          if (isFatalError(err)) markDisconnected(err);
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  function transferIn(length: number, timeoutMs: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (!bulkInEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }

      let settled = false;

      const timeoutId = setTimeout(() => {
        if (!settled) {
          settled = true;
          reject(InstrumentErrors.timeout(`${label}: no response within ${timeoutMs}ms`));
        }
      }, timeoutMs);

      bulkInEndpoint.transfer(length, (err, data) => {
        // A late transfer after a timeout is dropped here
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);

        if (err) {
          if (isFatalError(err)) markDisconnected(err);
          reject(err);
        } else {
          resolve(data ?? Buffer.alloc(0));
        }
      });
    });
  }

  function release(): void {
    const dev = device;
    const claimed = iface;
    device = null;
    iface = null;
    bulkInEndpoint = null;
    bulkOutEndpoint = null;
    opened = false;
    if (!dev) return;
    try {
      claimed?.release(true);
      dev.close();
    } catch (err) {
      // The device may already be gone after an unplug
      console.warn(`[USBTMC] ${label} close: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return {
    async open(): Promise<Result<void, InstrumentError>> {
      if (opened) return Ok();

      const found = locate(vendorId, productId);
      if (!found) {
        return Err(InstrumentErrors.refused(`${label}: device not found`));
      }

      try {
        found.open();
      } catch (e) {
        return Err(toTransportError(e, `Failed to open ${label}`));
      }
      device = found;

      try {
        if (!found.interfaces || found.interfaces.length === 0) {
          release();
          return Err(InstrumentErrors.transport(`${label}: no interfaces found on device`));
        }

        const claimed = found.interfaces[0];
        iface = claimed;

        if (claimed.isKernelDriverActive()) {
          claimed.detachKernelDriver();
        }
        claimed.claim();

        // Find bulk endpoints (transfer type 2 = bulk)
        for (const endpoint of claimed.endpoints) {
          if (endpoint.transferType === 2) {  // BULK
            if (endpoint.direction === 'in') {
              bulkInEndpoint = endpoint as InEndpoint;
            } else if (endpoint.direction === 'out') {
              bulkOutEndpoint = endpoint as OutEndpoint;
            }
          }
        }

        if (!bulkInEndpoint || !bulkOutEndpoint) {
          release();
          return Err(InstrumentErrors.transport(`${label}: could not find bulk endpoints`));
        }
      } catch (err) {
        release();
        return Err(toTransportError(err, `Failed to claim ${label}`));
      }

      opened = true;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      release();
      disconnectError = null;
      return Ok();
    },

    // Responses are pulled with REQUEST_DEV_DEP_MSG_IN, so no input is held on the host between exchanges
    async write(data: string): Promise<Result<void, InstrumentError>> {
      if (!opened) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${label}: not opened`));
      }

      try {
        await transferOut(buildDevDepMsgOut(data, nextTag()));
        return Ok();
      } catch (e) {
        return Err(toTransportError(e, `Write to ${label} failed`));
      }
    },

    async readLine(timeoutMs: number): Promise<Result<string, InstrumentError>> {
      if (!opened) {
        return Err(disconnectError ?? InstrumentErrors.transport(`${label}: not opened`));
      }

      const chunks: Buffer[] = [];
      try {
        for (let i = 0; i < MAX_MESSAGES; i++) {
          await transferOut(buildRequestDevDepMsgIn(MAX_TRANSFER, nextTag()));
          const response = await transferIn(MAX_TRANSFER + HEADER_SIZE, timeoutMs);

          const message = parseDevDepMsgIn(response);
          if (!message.ok) {
            return Err(InstrumentErrors.transport(`${label}: ${message.error}`));
          }
          chunks.push(message.value.data);
          if (message.value.eom) break;
        }
      } catch (e) {
        return Err(toTransportError(e, `Read from ${label} failed`));
      }

      return Ok(Buffer.concat(chunks).toString('ascii').replace(/[\r\n]+$/, '').trim());
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
