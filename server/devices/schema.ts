/**
 * Parameter Schema Builder
 *
 * Instrument schemas are declared as plain parameter definitions, composed
 * from a shared base plus model-specific groups, then frozen once by
 * createSchema(). Nothing mutates a schema after that.
 */

import type {
  ParameterDescriptor,
  ParameterKind,
  ValidationPolicy,
  CrossFieldRule,
  ChannelNode,
  CatalogDeclaration,
  InstrumentSchema,
  ParameterInstance,
  ParameterInfo,
} from './types.js';
import type { Result, AccessLevel, ParameterValue } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError, InstrumentErrors } from './errors.js';
import { ScpiCodec } from './codec.js';

export const ON_OFF: readonly string[] = ['ON', 'OFF'];

const DEFAULT_COMMAND_FORMAT = '{alias} {value}\n';
const DEFAULT_QUERY_FORMAT = '{alias}?\n';

type CrossFieldPolicy = Extract<ValidationPolicy, { type: 'cross-field' }>;

export interface ParameterDefinition {
  key: string;
  displayName: string;
  description?: string;
  alias: string;
  kind: ParameterKind;
  unit?: string;
  /** Appended after the value on SET, e.g. 's' gives "{alias} {value} s\n" */
  unitSuffix?: string;
  commandFormat?: string;
  queryFormat?: string;
  readOnConnect?: boolean;
  writeOnConnect?: boolean;
  commandReadBack?: boolean;
  /** true = at the global interval, a number = at most this often (seconds) */
  poll?: true | number;
  accessLevel?: AccessLevel;
  readOnly?: boolean;
  defaultValue?: ParameterValue;
  encodeMap?: Readonly<Record<string, string>>;
  decodeMap?: Readonly<Record<string, string>>;
  onOff?: 'strict' | 'lenient';
  crossField?: CrossFieldRule;
  /** Validate against the options discovered from the instrument catalog */
  discoveredOptions?: boolean;
  ignoreResponse?: RegExp;
}

export interface ChannelDefinition {
  name: string;
  displayName: string;
  alias: string;
}

export interface SchemaDefinition {
  model: string;
  manufacturer: string;
  deviceParameters: readonly ParameterDefinition[];
  channelParameters: readonly ParameterDefinition[];
  channels: readonly ChannelDefinition[];
  sweepOrder?: InstrumentSchema['sweepOrder'];
  handshakeQuery?: string | null;
  catalog?: CatalogDeclaration;
  /** Node-wide policy defaults, overridden per definition */
  defaults?: {
    readOnConnect?: boolean;
    commandReadBack?: boolean;
  };
}

/**
 * Merge parameter groups by key. A later definition with an existing key
 * replaces the earlier one in place (keeping sweep order); new keys append.
 */
export function composeParameters(
  base: readonly ParameterDefinition[],
  ...overrides: readonly ParameterDefinition[][]
): ParameterDefinition[] {
  const merged = [...base];
  for (const group of overrides) {
    for (const definition of group) {
      const index = merged.findIndex(d => d.key === definition.key);
      if (index >= 0) {
        merged[index] = definition;
      } else {
        merged.push(definition);
      }
    }
  }
  return merged;
}

/**
 * Keep the map entries whose device token the parameter actually offers,
 * so a shared human table can be attached to models with fewer options.
 */
export function restrictMap(
  map: Readonly<Record<string, string>>,
  options: readonly string[]
): Record<string, string> {
  const restricted: Record<string, string> = {};
  for (const [human, token] of Object.entries(map)) {
    if (options.includes(token)) restricted[human] = token;
  }
  return restricted;
}

function invertMap(map: Readonly<Record<string, string>>): Record<string, string> {
  const inverted: Record<string, string> = {};
  for (const [human, token] of Object.entries(map)) {
    inverted[token] = human;
  }
  return inverted;
}

function resolveMaps(
  definition: ParameterDefinition
): Result<{ encodeMap?: Record<string, string>; decodeMap?: Record<string, string> }, Error> {
  const { encodeMap, decodeMap, key } = definition;
  if (!encodeMap && !decodeMap) return Ok({});

  const encode = encodeMap ? { ...encodeMap } : invertMap(decodeMap ?? {});
  const decode = decodeMap ? { ...decodeMap } : invertMap(encode);

  for (const [human, token] of Object.entries(encode)) {
    if (decode[token] !== human) {
      return Err(new Error(`${key}: encodeMap ${human} -> ${token} has no matching decodeMap entry`));
    }
  }
  for (const [token, human] of Object.entries(decode)) {
    if (encode[human] !== token) {
      return Err(new Error(`${key}: decodeMap ${token} -> ${human} has no matching encodeMap entry`));
    }
  }
  if (definition.kind.type === 'enum') {
    const options = definition.kind.options;
    const stray = Object.values(encode).find(token => !options.includes(token));
    if (stray !== undefined) {
      return Err(new Error(`${key}: map token ${stray} is not one of the options`));
    }
  }
  return Ok({ encodeMap: encode, decodeMap: decode });
}

function derivePolicies(definition: ParameterDefinition): ValidationPolicy[] {
  const policies: ValidationPolicy[] = [];
  const kind = definition.kind;

  if (kind.type === 'enum') {
    if (definition.onOff) {
      policies.push({ type: 'bool-normalize', lenient: definition.onOff === 'lenient' });
    } else {
      policies.push({ type: 'enum', options: kind.options });
    }
  }
  if (kind.type === 'number' && (kind.min !== undefined || kind.max !== undefined)) {
    policies.push({ type: 'numeric-range', min: kind.min, max: kind.max });
  }
  if (definition.crossField) {
    policies.push({ type: 'cross-field', rule: definition.crossField });
  }
  if (definition.discoveredOptions) {
    policies.push({ type: 'discovered-options' });
  }
  return policies;
}

function buildDescriptor(
  definition: ParameterDefinition,
  defaults: { readOnConnect: boolean; commandReadBack: boolean }
): Result<ParameterDescriptor, Error> {
  const maps = resolveMaps(definition);
  if (!maps.ok) return maps;

  const commandFormat = definition.commandFormat
    ?? (definition.unitSuffix ? `{alias} {value} ${definition.unitSuffix}\n` : DEFAULT_COMMAND_FORMAT);

  const readOnly = definition.readOnly ?? false;

  const descriptor: ParameterDescriptor = {
    key: definition.key,
    displayName: definition.displayName,
    description: definition.description,
    unit: definition.unit,
    kind: Object.freeze({ ...definition.kind }),
    aliasTemplate: definition.alias,
    commandFormatTemplate: commandFormat,
    queryFormatTemplate: definition.queryFormat ?? DEFAULT_QUERY_FORMAT,
    readOnConnect: definition.readOnConnect ?? defaults.readOnConnect,
    writeOnConnect: definition.writeOnConnect ?? false,
    // Nothing to read back on a parameter that is never written
    commandReadBack: readOnly ? false : (definition.commandReadBack ?? defaults.commandReadBack),
    pollIntervalSeconds: definition.poll === true ? 0 : definition.poll,
    accessLevel: definition.accessLevel ?? 'normal',
    readOnly,
    defaultValue: definition.defaultValue,
    encodeMap: maps.value.encodeMap && Object.freeze(maps.value.encodeMap),
    decodeMap: maps.value.decodeMap && Object.freeze(maps.value.decodeMap),
    policies: Object.freeze(derivePolicies(definition)),
    ignoreResponsePattern: definition.ignoreResponse,
  };

  if (descriptor.defaultValue !== undefined && !definition.discoveredOptions) {
    const checked = ScpiCodec.validate(descriptor, descriptor.defaultValue);
    if (!checked.ok) {
      return Err(new Error(`${definition.key}: default ${checked.error.message}`));
    }
  }

  return Ok(Object.freeze(descriptor));
}

function buildNode(
  definitions: readonly ParameterDefinition[],
  defaults: { readOnConnect: boolean; commandReadBack: boolean },
  scope: string
): Result<readonly ParameterDescriptor[], Error> {
  const seen = new Set<string>();
  const descriptors: ParameterDescriptor[] = [];

  for (const definition of definitions) {
    if (seen.has(definition.key)) {
      return Err(new Error(`Duplicate parameter key ${definition.key} in ${scope}`));
    }
    seen.add(definition.key);

    const descriptor = buildDescriptor(definition, defaults);
    if (!descriptor.ok) return descriptor;
    descriptors.push(descriptor.value);
  }

  for (const descriptor of descriptors) {
    const rule = descriptor.policies.find((p): p is CrossFieldPolicy => p.type === 'cross-field');
    if (!rule) continue;
    const other = descriptors.find(d => d.key === rule.rule.otherKey);
    if (!other) {
      return Err(new Error(`${descriptor.key}: rule ${rule.rule.name} refers to unknown ${rule.rule.otherKey} in ${scope}`));
    }
    if (other.kind.type !== 'number' || descriptor.kind.type !== 'number') {
      return Err(new Error(`${descriptor.key}: rule ${rule.rule.name} needs two numeric parameters`));
    }
  }

  return Ok(Object.freeze(descriptors));
}

/**
 * Build and freeze an instrument schema.
 * Fails on duplicate keys, {channel} in device-scoped aliases,
 * inconsistent translation maps, dangling rule or catalog keys and
 * defaults that do not validate.
 */
export function createSchema(definition: SchemaDefinition): Result<InstrumentSchema, Error> {
  const defaults = {
    readOnConnect: definition.defaults?.readOnConnect ?? false,
    commandReadBack: definition.defaults?.commandReadBack ?? false,
  };

  const scoped = definition.deviceParameters.find(d => d.alias.includes('{channel}'));
  if (scoped) {
    return Err(new Error(`Device parameter ${scoped.key} must not use {channel} in its alias`));
  }

  const device = buildNode(definition.deviceParameters, defaults, 'device');
  if (!device.ok) return device;

  const channelParameters = buildNode(definition.channelParameters, defaults, 'channel');
  if (!channelParameters.ok) return channelParameters;

  const names = new Set<string>();
  const channels: ChannelNode[] = [];
  for (const channel of definition.channels) {
    if (names.has(channel.name)) {
      return Err(new Error(`Duplicate channel ${channel.name}`));
    }
    names.add(channel.name);
    channels.push(Object.freeze({ ...channel, parameters: channelParameters.value }));
  }

  if (definition.catalog) {
    const catalogKey = definition.catalog.key;
    if (!device.value.some(d => d.key === catalogKey)) {
      return Err(new Error(`Catalog parameter ${catalogKey} is not a device parameter`));
    }
  }

  return Ok(Object.freeze({
    model: definition.model,
    manufacturer: definition.manufacturer,
    deviceParameters: device.value,
    channels: Object.freeze(channels),
    sweepOrder: definition.sweepOrder ?? 'device-first',
    handshakeQuery: definition.handshakeQuery === undefined ? '*IDN?\n' : definition.handshakeQuery,
    catalog: definition.catalog && Object.freeze({ ...definition.catalog }),
  }));
}

/**
 * Look up a parameter instance. Channels may be named by node name
 * ("channel_1") or by alias ("1"); null addresses the device node.
 */
export function findParameter(
  schema: InstrumentSchema,
  key: string,
  channelName: string | null
): Result<ParameterInstance, InstrumentError> {
  if (channelName === null) {
    const descriptor = schema.deviceParameters.find(d => d.key === key);
    return descriptor
      ? Ok({ descriptor, channel: null })
      : Err(InstrumentErrors.unknownParameter(key, null));
  }

  const channel = schema.channels.find(c => c.name === channelName || c.alias === channelName);
  const descriptor = channel?.parameters.find(d => d.key === key);
  if (!channel || !descriptor) {
    return Err(InstrumentErrors.unknownParameter(key, channelName));
  }
  return Ok({ descriptor, channel });
}

/** Every parameter instance in sweep order */
export function listParameterInstances(schema: InstrumentSchema): ParameterInstance[] {
  const device = schema.deviceParameters.map(descriptor => ({ descriptor, channel: null }));
  const channels = schema.channels.flatMap(channel =>
    channel.parameters.map(descriptor => ({ descriptor, channel }))
  );
  return schema.sweepOrder === 'device-first' ? [...device, ...channels] : [...channels, ...device];
}

export function toParameterInfo(instance: ParameterInstance): ParameterInfo {
  const { descriptor, channel } = instance;
  const kind = descriptor.kind;
  const info: ParameterInfo = {
    key: descriptor.key,
    channel: channel?.name ?? null,
    displayName: descriptor.displayName,
    description: descriptor.description,
    unit: descriptor.unit,
    kind: kind.type,
    accessLevel: descriptor.accessLevel,
    readOnly: descriptor.readOnly,
    pollIntervalSeconds: descriptor.pollIntervalSeconds,
  };
  if (kind.type === 'enum') {
    // Offer human names where a table exists
    info.options = kind.options.map(token => descriptor.decodeMap?.[token] ?? token);
  }
  if (kind.type === 'number') {
    info.min = kind.min;
    info.max = kind.max;
    if (kind.keywords) info.keywords = [...kind.keywords];
  }
  return info;
}
