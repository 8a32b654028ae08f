/**
 * Model Registry
 * Maps model names to schema factories and matches instruments by *IDN? or USB ids
 */

import type { ModelRegistration } from './types.js';
import { createAfg31000Schema } from './models/afg31000.js';
import { createKeysight33511Schema, createKeysight33512Schema } from './models/keysight-33500.js';

export const TEKTRONIX_VENDOR_ID = 0x0699;
export const KEYSIGHT_VENDOR_ID = 0x0957;

export interface ModelRegistry {
  registerModel(registration: ModelRegistration): void;
  getModel(model: string): ModelRegistration | undefined;
  getModels(): ModelRegistration[];
  matchIDN(manufacturer: string, model: string): ModelRegistration | undefined;
  // Every registration for the vendor; the product id narrows it when declared
  matchUSB(vendorId: number, productId: number): ModelRegistration[];
}

// Helper to match string or regex
function matchPattern(value: string, pattern: string | RegExp): boolean {
  if (typeof pattern === 'string') return value.toUpperCase().includes(pattern.toUpperCase());
  return pattern.test(value);
}

export function createModelRegistry(): ModelRegistry {
  const registrations = new Map<string, ModelRegistration>();

  return {
    registerModel(registration: ModelRegistration): void {
      if (registrations.has(registration.model)) {
        console.warn(`[Registry] Replacing model registration: ${registration.model}`);
      }
      registrations.set(registration.model, registration);
    },

    getModel(model: string): ModelRegistration | undefined {
      return registrations.get(model);
    },

    getModels(): ModelRegistration[] {
      return [...registrations.values()];
    },

    matchIDN(manufacturer: string, model: string): ModelRegistration | undefined {
      return [...registrations.values()].find(r =>
        matchPattern(manufacturer, r.match.manufacturer) &&
        matchPattern(model, r.match.model)
      );
    },

    matchUSB(vendorId: number, productId: number): ModelRegistration[] {
      return [...registrations.values()].filter(r =>
        r.match.vendorId === vendorId &&
        (r.match.productId === undefined || r.match.productId === productId)
      );
    },
  };
}

export function createDefaultModelRegistry(): ModelRegistry {
  const registry = createModelRegistry();

  registry.registerModel({
    model: 'AFG31000',
    createSchema: createAfg31000Schema,
    match: { manufacturer: /TEKTRONIX/i, model: /^AFG31/i, vendorId: TEKTRONIX_VENDOR_ID },
  });

  registry.registerModel({
    model: '33511B',
    createSchema: createKeysight33511Schema,
    match: { manufacturer: /KEYSIGHT|AGILENT/i, model: /^33511/, vendorId: KEYSIGHT_VENDOR_ID },
  });

  registry.registerModel({
    model: '33512B',
    createSchema: createKeysight33512Schema,
    match: { manufacturer: /KEYSIGHT|AGILENT/i, model: /^33512/, vendorId: KEYSIGHT_VENDOR_ID },
  });

  return registry;
}
