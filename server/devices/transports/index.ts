/**
 * Transport factory
 */

import type { Transport, TransportConfig, InstrumentSchema } from '../types.js';
import { createTcpTransport } from './tcp.js';
import { createSerialTransport } from './serial.js';
import { createUSBTMCTransport } from './usbtmc.js';
import { createSimulatedInstrument } from '../simulation/index.js';

export function createTransport(config: TransportConfig, schema: InstrumentSchema): Transport {
  switch (config.type) {
    case 'tcp':
      return createTcpTransport({ host: config.host, port: config.port });
    case 'serial':
      return createSerialTransport({ path: config.path, baudRate: config.baudRate });
    case 'usbtmc':
      return createUSBTMCTransport({ vendorId: config.vendorId, productId: config.productId });
    case 'simulated':
      return createSimulatedInstrument(schema, {
        latencyMs: config.latencyMs,
        offline: config.offline,
      }).transport;
  }
}

export function describeTransport(config: TransportConfig): string {
  switch (config.type) {
    case 'tcp':
      return `tcp://${config.host}:${config.port ?? 5025}`;
    case 'serial':
      return `serial:${config.path}`;
    case 'usbtmc':
      return `usbtmc:${config.vendorId.toString(16)}:${config.productId.toString(16)}`;
    case 'simulated':
      return 'simulated';
  }
}
