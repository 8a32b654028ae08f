/**
 * Keysight 33500B series: 33511B (one channel) and 33512B (two channels)
 *
 * The two-channel model also exposes the arbitrary waveform catalog, which
 * is listed on connect and used to validate arbitraryForm.
 */

import type { InstrumentSchema } from '../types.js';
import type { Result } from '../../../shared/types.js';
import type { ParameterDefinition } from '../schema.js';
import { createSchema, composeParameters, ON_OFF } from '../schema.js';
import {
  deviceParameters,
  channelParameters,
  channelDefinitions,
  functionShapeParameter,
  pulseParameters,
  FUNCTION_GENERATOR_DEFAULTS,
} from './function-generator.js';

const SHAPES = ['SIN', 'SQU', 'RAMP', 'NRAM', 'TRI', 'PULS', 'NOIS', 'PRBS', 'ARB', 'DC'];

export const BUILTIN_ARB_PATH = 'INT:\\BUILTIN';

const keysightChannelParameters: ParameterDefinition[] = [
  {
    key: 'outputLoad',
    displayName: 'Output Load',
    description: 'Expected output termination.',
    alias: 'OUTPut{channel}:LOAD',
    kind: { type: 'number', keywords: ['INF'] },
    unit: 'Ω',
  },
  functionShapeParameter(SHAPES, 'SIN', 'Selects the output function.'),
  ...pulseParameters({
    width: 'SOURce{channel}:FUNC:PULS:WIDT',
    period: 'SOURce{channel}:FUNC:PULS:PER',
  }),
  {
    key: 'arbitraryForm',
    displayName: 'Arbitrary Form',
    description: 'Arbitrary waveform in memory. Listed by the waveform catalog.',
    alias: 'SOURce{channel}:FUNC:ARB',
    kind: { type: 'string', quoted: true },
    discoveredOptions: true,
  },
  {
    key: 'loadForm',
    displayName: 'Load Arbitrary Form',
    description: 'Load a waveform file into volatile memory.',
    alias: 'MMEMory:LOAD:DATA{channel}',
    kind: { type: 'string', quoted: true },
    // Command only, the instrument has no matching query
    readOnConnect: false,
    commandReadBack: false,
  },
  {
    key: 'arbitraryPeriod',
    displayName: 'Arbitrary Period',
    description: 'Period of the arbitrary waveform.',
    alias: 'SOURce{channel}:FUNC:ARB:PER',
    kind: { type: 'number' },
    unit: 's',
    unitSuffix: 's',
  },
  {
    key: 'rampSymmetry',
    displayName: 'Ramp Symmetry',
    description: 'Symmetry of the ramp waveform in percent.',
    alias: 'SOURce{channel}:FUNC:RAMP:SYMM',
    kind: { type: 'number', min: 0, max: 100 },
    unit: '%',
  },
  {
    key: 'triggerSource',
    displayName: 'Trigger Source',
    description: 'Immediate or timed internal trigger, external or software (BUS) trigger.',
    alias: 'TRIG{channel}:SOUR',
    kind: { type: 'enum', options: ['TIM', 'EXT', 'BUS', 'IMM'] },
    defaultValue: 'TIM',
  },
  {
    key: 'triggerTime',
    displayName: 'Trigger Time',
    description: 'Period of the internal trigger clock.',
    alias: 'TRIG{channel}:TIM',
    kind: { type: 'number' },
    unit: 's',
    unitSuffix: 's',
    defaultValue: 10,
  },
];

const keysightDeviceParameters: ParameterDefinition[] = [
  {
    key: 'phaseUnit',
    displayName: 'Phase Unit',
    alias: 'UNIT:ANGLe',
    kind: { type: 'enum', options: ['DEG', 'RAD'] },
    defaultValue: 'DEG',
  },
  {
    key: 'display',
    displayName: 'Display',
    description: "Front panel display. Turned off on connect; press 'Local' to reclaim the panel.",
    alias: 'DISPlay',
    kind: { type: 'enum', options: ON_OFF },
    onOff: 'lenient',
    readOnConnect: false,
    writeOnConnect: true,
    defaultValue: 'OFF',
  },
  {
    key: 'arbCatalog',
    displayName: 'Waveform Catalog',
    description: 'Lists the arbitrary waveforms stored under a path.',
    alias: 'MMEMory:CAT:DATA:ARB',
    kind: { type: 'string' },
    commandFormat: '{alias}? {value}\n',
    accessLevel: 'expert',
    readOnly: true,
    readOnConnect: false,
  },
];

export function createKeysight33511Schema(): Result<InstrumentSchema, Error> {
  return createSchema({
    model: '33511B',
    manufacturer: 'Keysight',
    deviceParameters,
    channelParameters: composeParameters(channelParameters, keysightChannelParameters),
    channels: channelDefinitions(1),
    defaults: FUNCTION_GENERATOR_DEFAULTS,
  });
}

export function createKeysight33512Schema(): Result<InstrumentSchema, Error> {
  return createSchema({
    model: '33512B',
    manufacturer: 'Keysight',
    deviceParameters: composeParameters(deviceParameters, keysightDeviceParameters),
    channelParameters: composeParameters(channelParameters, keysightChannelParameters),
    channels: channelDefinitions(2),
    defaults: FUNCTION_GENERATOR_DEFAULTS,
    catalog: {
      key: 'arbCatalog',
      defaultPath: BUILTIN_ARB_PATH,
      refreshOnConnect: true,
    },
  });
}
