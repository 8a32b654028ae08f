/**
 * Function Generator Simulator
 * Answers the command set of any instrument schema from in-memory state
 *
 * Command handling:
 * - <alias>? / <alias> <value>     - every parameter instance of the schema
 * - *IDN?                          - identification string
 * - SYSTem:ERRor?                  - pops the error queue, +0,"No error" when empty
 * - <catalog alias>? "<path>"      - waveform catalog listing
 *
 * Enum values are kept as device tokens, on/off values as 1/0 and numbers
 * are answered in SCPI exponent form. Unknown headers and illegal values go
 * to the error queue; unknown queries get no reply.
 */

import type { InstrumentSchema, ParameterDescriptor } from '../types.js';
import { ScpiCodec } from '../codec.js';
import { listParameterInstances } from '../schema.js';

export interface FunctionGeneratorSimulatorOptions {
  /** Serial number used in the *IDN? reply (default: SIM000001) */
  serial?: string;
  /** Waveform names listed by the catalog query */
  catalog?: string[];
}

export interface FunctionGeneratorSimulator {
  handleCommand(cmd: string): string | null;
  /** Stored device token for a resolved address, e.g. "SOURce1:FREQ" */
  getToken(address: string): string | undefined;
  setToken(address: string, token: string): void;
  /** Queue an error as the instrument would after a rejected command */
  pushError(error: string): void;
}

const NO_ERROR = '+0,"No error"';
const UNDEFINED_HEADER = '-113,"Undefined header"';
const ILLEGAL_VALUE = '-224,"Illegal parameter value"';

const SCPI_INFINITY = 9.9e37;

const DEFAULT_CATALOG = ['SINC.arb', 'HAVERSINE.arb', 'EXP_RISE.arb'];

interface Slot {
  descriptor: ParameterDescriptor;
  token: string;
}

function formatNumber(value: number): string {
  const text = value.toExponential(15).toUpperCase();
  return value >= 0 ? `+${text}` : text;
}

function unitSuffix(descriptor: ParameterDescriptor): string {
  const template = descriptor.commandFormatTemplate;
  const index = template.indexOf('{value}');
  if (index < 0) return '';
  return template.slice(index + '{value}'.length).trim();
}

export function createFunctionGeneratorSimulator(
  schema: InstrumentSchema,
  options: FunctionGeneratorSimulatorOptions = {}
): FunctionGeneratorSimulator {
  const serial = options.serial ?? 'SIM000001';
  const catalog = options.catalog ?? DEFAULT_CATALOG;
  const identity = `${schema.manufacturer.toUpperCase()},${schema.model},${serial},1.0.0`;

  const slots = new Map<string, Slot>();
  const errors: string[] = [];

  function initialToken(descriptor: ParameterDescriptor): string {
    const kind = descriptor.kind;
    if (descriptor.defaultValue !== undefined) {
      const canonical = ScpiCodec.validate(descriptor, descriptor.defaultValue);
      if (canonical.ok) return toStoredToken(descriptor, ScpiCodec.toDeviceToken(descriptor, canonical.value));
    }
    if (kind.type === 'enum') {
      const isOnOff = descriptor.policies.some(p => p.type === 'bool-normalize');
      return isOnOff ? '0' : kind.options[0];
    }
    if (kind.type === 'number') {
      return formatNumber(kind.min ?? 0);
    }
    return kind.quoted ? '""' : '';
  }

  // Instruments report on/off state as 1/0
  function toStoredToken(descriptor: ParameterDescriptor, token: string): string {
    const isOnOff = descriptor.policies.some(p => p.type === 'bool-normalize');
    if (!isOnOff) return token;
    const upper = token.toUpperCase();
    if (upper === 'ON' || upper === '1') return '1';
    if (upper === 'OFF' || upper === '0') return '0';
    return token;
  }

  for (const { descriptor, channel } of listParameterInstances(schema)) {
    const address = ScpiCodec.resolveAlias(descriptor, channel?.alias ?? null).toUpperCase();
    slots.set(address, { descriptor, token: initialToken(descriptor) });
  }

  const catalogAddress = schema.catalog
    ? schema.deviceParameters.find(d => d.key === schema.catalog?.key)?.aliasTemplate.toUpperCase()
    : undefined;

  function catalogListing(): string {
    const used = catalog.length * 1000;
    const entries = catalog.map(name => `"${name},ARB,1000"`);
    return [`+${used}`, '+2000000', ...entries].join(',');
  }

  function applySet(slot: Slot, argument: string): void {
    const { descriptor } = slot;
    const suffix = unitSuffix(descriptor);
    let text = argument.trim();
    if (suffix && text.toUpperCase().endsWith(` ${suffix.toUpperCase()}`)) {
      text = text.slice(0, -(suffix.length + 1)).trim();
    }

    const kind = descriptor.kind;
    switch (kind.type) {
      case 'number': {
        if (text.toUpperCase().startsWith('INF') && kind.keywords?.includes('INF')) {
          slot.token = formatNumber(SCPI_INFINITY);
          return;
        }
        const value = Number(text);
        if (text === '' || !Number.isFinite(value)) {
          errors.push(ILLEGAL_VALUE);
          return;
        }
        slot.token = formatNumber(value);
        return;
      }
      case 'enum': {
        const stored = toStoredToken(descriptor, text);
        const option = kind.options.find(o => toStoredToken(descriptor, o) === stored || o.toUpperCase() === text.toUpperCase());
        if (option === undefined) {
          errors.push(ILLEGAL_VALUE);
          return;
        }
        slot.token = toStoredToken(descriptor, option);
        return;
      }
      case 'string':
        slot.token = text;
        return;
    }
  }

  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim();
    if (trimmed === '') return null;

    const space = trimmed.indexOf(' ');
    const header = (space < 0 ? trimmed : trimmed.slice(0, space)).toUpperCase();
    const argument = space < 0 ? '' : trimmed.slice(space + 1);

    if (header === '*IDN?') {
      return identity;
    }
    if (header === 'SYSTEM:ERROR?' || header === 'SYST:ERR?') {
      return errors.shift() ?? NO_ERROR;
    }

    if (header.endsWith('?')) {
      const address = header.slice(0, -1);
      if (catalogAddress !== undefined && address === catalogAddress) {
        return catalogListing();
      }
      const slot = slots.get(address);
      if (!slot) {
        errors.push(UNDEFINED_HEADER);
        return null;
      }
      return slot.token;
    }

    const slot = slots.get(header);
    if (!slot || slot.descriptor.readOnly) {
      errors.push(UNDEFINED_HEADER);
      return null;
    }
    applySet(slot, argument);
    return null;
  }

  return {
    handleCommand,

    getToken(address: string): string | undefined {
      return slots.get(address.toUpperCase())?.token;
    },

    setToken(address: string, token: string): void {
      const slot = slots.get(address.toUpperCase());
      if (slot) slot.token = token;
    },

    pushError(error: string): void {
      errors.push(error);
    },
  };
}
