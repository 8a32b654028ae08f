/**
 * Common function generator parameters
 *
 * Device-level identification and error queue plus the channel parameters
 * every supported generator shares. Model files compose on top of these.
 */

import type { CrossFieldRule } from '../types.js';
import type { ParameterDefinition, ChannelDefinition } from '../schema.js';
import { ON_OFF, restrictMap } from '../schema.js';

/** Human name -> SCPI token for waveform shapes */
export const FUNCTION_SHAPES: Readonly<Record<string, string>> = {
  'Sine': 'SIN',
  'Square': 'SQU',
  'Ramp': 'RAMP',
  'Triangle': 'TRI',
  'Pulse': 'PULS',
  'Noise': 'NOIS',
  'PRBS': 'PRBS',
  'Arbitrary': 'ARB',
  'DC': 'DC',
  'PR Noise': 'PRN',
  'Sin(x)/x': 'SINC',
  'Lorentz': 'LOR',
  'Exponential Rise': 'ERSI',
  'Exponential Decay': 'EDEC',
  'Harvesine': 'HAV',
};

export const PULSE_WIDTH_WITHIN_PERIOD: CrossFieldRule = {
  name: 'pulse-width-within-period',
  relation: 'at-most',
  otherKey: 'pulsePeriod',
};

export function functionShapeParameter(
  options: readonly string[],
  defaultValue: string,
  description: string
): ParameterDefinition {
  return {
    key: 'functionShape',
    displayName: 'Function Shape',
    description,
    alias: 'SOURce{channel}:FUNCtion',
    kind: { type: 'enum', options },
    encodeMap: restrictMap(FUNCTION_SHAPES, options),
    defaultValue,
  };
}

export function pulseParameters(alias: { width: string; period: string }): ParameterDefinition[] {
  return [
    {
      key: 'pulseWidth',
      displayName: 'Pulse Width',
      description: 'Pulse width. Must not exceed the pulse period.',
      alias: alias.width,
      kind: { type: 'number', min: 0 },
      unit: 's',
      unitSuffix: 's',
      crossField: PULSE_WIDTH_WITHIN_PERIOD,
    },
    {
      key: 'pulsePeriod',
      displayName: 'Pulse Period',
      description: 'Period of pulse waveform.',
      alias: alias.period,
      kind: { type: 'number', min: 0 },
      unit: 's',
      unitSuffix: 's',
    },
  ];
}

export function channelDefinitions(count: number): ChannelDefinition[] {
  return Array.from({ length: count }, (_, i) => ({
    name: `channel_${i + 1}`,
    displayName: `Channel ${i + 1}`,
    alias: String(i + 1),
  }));
}

export const deviceParameters: ParameterDefinition[] = [
  {
    key: 'identification',
    displayName: 'Identification',
    description: 'Identification information.',
    alias: '*IDN',
    kind: { type: 'string' },
    readOnly: true,
  },
  {
    key: 'systemError',
    displayName: 'System Error',
    description: 'System error raised on hardware.',
    alias: 'SYSTem:ERRor',
    kind: { type: 'string' },
    readOnly: true,
    poll: true,
    // An empty queue must not overwrite the last real error
    ignoreResponse: /No error/,
  },
];

export const channelParameters: ParameterDefinition[] = [
  {
    key: 'outputState',
    displayName: 'Output State',
    description: 'Enable the output for the channel.',
    alias: 'OUTPut{channel}',
    kind: { type: 'enum', options: ON_OFF },
    onOff: 'strict',
  },
  {
    key: 'outputPol',
    displayName: 'Output Polarity',
    description: 'Inverts waveform relative to offset voltage.',
    alias: 'OUTPut{channel}:POL',
    kind: { type: 'enum', options: ['NORM', 'INV'] },
  },
  {
    key: 'offset',
    displayName: 'Offset',
    description: 'Offset level for the channel.',
    alias: 'SOURce{channel}:VOLT:OFFS',
    kind: { type: 'number' },
    unit: 'V',
    poll: true,
  },
  {
    key: 'amplitude',
    displayName: 'Amplitude',
    description: 'Output amplitude, in the unit selected by amplitudeUnit.',
    alias: 'SOURce{channel}:VOLT',
    kind: { type: 'number' },
    poll: true,
  },
  {
    key: 'amplitudeUnit',
    displayName: 'Amplitude Unit',
    alias: 'SOURce{channel}:VOLT:UNIT',
    kind: { type: 'enum', options: ['VPP', 'VRMS', 'DBM'] },
    defaultValue: 'VPP',
  },
  {
    key: 'voltageLow',
    displayName: 'Voltage Low',
    description: 'Waveform low voltage.',
    alias: 'SOURce{channel}:VOLT:LOW',
    kind: { type: 'number' },
    unit: 'V',
    poll: true,
  },
  {
    key: 'voltageHigh',
    displayName: 'Voltage High',
    description: 'Waveform high voltage.',
    alias: 'SOURce{channel}:VOLT:HIGH',
    kind: { type: 'number' },
    unit: 'V',
    poll: true,
  },
  {
    key: 'frequency',
    displayName: 'Frequency',
    alias: 'SOURce{channel}:FREQ',
    kind: { type: 'number' },
    unit: 'Hz',
    poll: true,
  },
  {
    key: 'phase',
    displayName: 'Phase',
    description: 'Phase offset angle of the waveform.',
    alias: 'SOURce{channel}:PHASe',
    kind: { type: 'number' },
    poll: true,
  },
  {
    key: 'burstState',
    displayName: 'Burst State',
    alias: 'SOURce{channel}:BURSt:STAT',
    kind: { type: 'enum', options: ON_OFF },
    onOff: 'strict',
    defaultValue: 'OFF',
    poll: true,
  },
  {
    key: 'burstMode',
    displayName: 'Burst Mode',
    description: 'TRIG: triggered burst. GAT: gated burst.',
    alias: 'SOURce{channel}:BURSt:MODE',
    kind: { type: 'enum', options: ['TRIG', 'GAT'] },
    defaultValue: 'TRIG',
  },
  {
    key: 'burstCycles',
    displayName: 'Burst Cycles',
    description: 'Number of cycles per burst, or INF.',
    alias: 'SOURce{channel}:BURSt:NCYC',
    kind: { type: 'string' },
    defaultValue: 'INF',
  },
  {
    key: 'frequencyStart',
    displayName: 'Start Frequency',
    alias: 'SOURce{channel}:FREQ:STAR',
    kind: { type: 'number' },
    unit: 'Hz',
  },
  {
    key: 'frequencyStop',
    displayName: 'Stop Frequency',
    alias: 'SOURce{channel}:FREQ:STOP',
    kind: { type: 'number' },
    unit: 'Hz',
  },
  {
    key: 'sweepTime',
    displayName: 'Sweep Time',
    alias: 'SOURce{channel}:SWE:TIME',
    kind: { type: 'number' },
    unit: 's',
  },
  {
    key: 'sweepHoldTime',
    displayName: 'Sweep Hold Time',
    alias: 'SOURce{channel}:SWE:HTIM',
    kind: { type: 'number' },
    unit: 's',
  },
  {
    key: 'sweepReturnTime',
    displayName: 'Sweep Return Time',
    description: 'Time from stop frequency back to start frequency.',
    alias: 'SOURce{channel}:SWE:RTIM',
    kind: { type: 'number' },
    unit: 's',
  },
];

// Generators do not answer SET commands, so every value is read back
export const FUNCTION_GENERATOR_DEFAULTS = {
  readOnConnect: true,
  commandReadBack: true,
};
