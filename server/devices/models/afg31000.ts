/**
 * Tektronix AFG31000 series (two channels)
 */

import type { InstrumentSchema } from '../types.js';
import type { Result } from '../../../shared/types.js';
import type { ParameterDefinition } from '../schema.js';
import { createSchema, composeParameters } from '../schema.js';
import {
  deviceParameters,
  channelParameters,
  channelDefinitions,
  functionShapeParameter,
  pulseParameters,
  FUNCTION_GENERATOR_DEFAULTS,
} from './function-generator.js';

const SHAPES = ['SIN', 'SQU', 'PULS', 'RAMP', 'PRN', 'DC', 'SINC', 'GAUS', 'LOR', 'ERIS', 'EDEC', 'EMEM'];

const afgDeviceParameters: ParameterDefinition[] = [
  {
    key: 'triggerMode',
    displayName: 'Trigger Mode',
    description: 'Mode of the Trigger Output signal (trigger or sync).',
    alias: 'OUTP:TRIG:MODE',
    kind: { type: 'enum', options: ['TRIG', 'SYNC'] },
    defaultValue: 'TRIG',
  },
  {
    key: 'triggerSource',
    displayName: 'Trigger Source',
    description: 'TIM: internal clock. EXT: external trigger input.',
    alias: 'TRIG:SOUR',
    kind: { type: 'enum', options: ['TIM', 'EXT'] },
    defaultValue: 'TIM',
  },
  {
    key: 'triggerTime',
    displayName: 'Trigger Time',
    description: 'Period of the internal trigger clock.',
    alias: 'TRIG:TIM',
    kind: { type: 'number', min: 1e-6, max: 500 },
    unit: 's',
    unitSuffix: 's',
    defaultValue: 10,
  },
  {
    key: 'runMode',
    displayName: 'Run Mode',
    alias: 'SEQC:RMOD',
    kind: { type: 'enum', options: ['CONT', 'TRIG', 'GAT', 'SEQ'] },
    defaultValue: 'CONT',
  },
];

const afgChannelParameters: ParameterDefinition[] = [
  functionShapeParameter(SHAPES, 'PULS', 'Shape of the output waveform.'),
  ...pulseParameters({
    width: 'SOURce{channel}:PULS:WIDT',
    period: 'SOURce{channel}:PULS:PER',
  }),
  {
    key: 'burstIdle',
    displayName: 'Burst Idle',
    description: 'Output level between two bursts.',
    alias: 'SOURce{channel}:BURSt:IDLE',
    kind: { type: 'enum', options: ['START', 'DC', 'END', 'OFF'] },
    defaultValue: 'OFF',
  },
  {
    key: 'burstDelay',
    displayName: 'Burst Delay',
    description: 'Delay between trigger and output in triggered burst mode. A time, MIN or MAX.',
    alias: 'SOURce{channel}:BURS:TDEL',
    kind: { type: 'string' },
    unit: 's',
    unitSuffix: 's',
    defaultValue: 'MIN',
  },
  {
    key: 'sweepMode',
    displayName: 'Sweep Mode',
    description: 'AUTO: continuous sweep. MAN: one sweep per trigger.',
    alias: 'SOURce{channel}:SWE:MODE',
    kind: { type: 'enum', options: ['AUTO', 'MAN'] },
    defaultValue: 'AUTO',
  },
];

export function createAfg31000Schema(): Result<InstrumentSchema, Error> {
  return createSchema({
    model: 'AFG31000',
    manufacturer: 'Tektronix',
    deviceParameters: composeParameters(deviceParameters, afgDeviceParameters),
    channelParameters: composeParameters(channelParameters, afgChannelParameters),
    channels: channelDefinitions(2),
    defaults: FUNCTION_GENERATOR_DEFAULTS,
  });
}
