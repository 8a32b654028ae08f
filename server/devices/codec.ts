/**
 * SCPI Codec
 *
 * Converts between typed parameter values and wire-protocol text, driven by
 * the descriptor's kind, its translation maps and its validation policies.
 * Pure: no I/O, no state.
 */

import type { ParameterDescriptor, ValidationPolicy, CrossFieldRule } from './types.js';
import type { Result, ParameterValue, ParameterInput } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { InstrumentError, InstrumentErrors } from './errors.js';
import { ScpiParser } from './scpi-parser.js';

const CHANNEL_PLACEHOLDER = '{channel}';

// Relative tolerance for read-back comparison of numbers
const NUMBER_TOLERANCE = 1e-9;

/**
 * Live information a validation policy may need beyond the descriptor itself.
 * Both lookups are scoped to the node (device or channel) being written.
 */
export interface CodecContext {
  currentValue(key: string): ParameterValue | undefined;
  discoveredOptions: readonly string[];
}

const EMPTY_CONTEXT: CodecContext = {
  currentValue: () => undefined,
  discoveredOptions: [],
};

function describe(value: ParameterInput): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

function invalid(descriptor: ParameterDescriptor, value: ParameterInput, detail: string): InstrumentError {
  return InstrumentErrors.invalidOption(
    `Invalid value for ${descriptor.key}: ${describe(value)}. ${detail}`
  );
}

type OnOffPolicy = Extract<ValidationPolicy, { type: 'bool-normalize' }>;

function onOffPolicy(descriptor: ParameterDescriptor): OnOffPolicy | undefined {
  return descriptor.policies.find((p): p is OnOffPolicy => p.type === 'bool-normalize');
}

// ============ Canonicalization (per kind) ============

function normalizeOnOff(
  descriptor: ParameterDescriptor,
  value: ParameterInput,
  lenient: boolean
): Result<string, InstrumentError> {
  const token = typeof value === 'string' ? value.trim().toUpperCase() : value;

  if (token === 0 || token === '0' || token === 'OFF' || token === false) {
    return Ok('OFF');
  }
  if (lenient) {
    return Ok('ON');
  }
  if (token === 1 || token === '1' || token === 'ON' || token === true) {
    return Ok('ON');
  }
  return Err(invalid(descriptor, value, 'Expected ON/OFF or 1/0.'));
}

function canonicalEnum(
  descriptor: ParameterDescriptor,
  options: readonly string[],
  value: ParameterInput
): Result<string, InstrumentError> {
  if (typeof value !== 'string') {
    return Err(invalid(descriptor, value, 'Expected one of the listed options.'));
  }

  // Literal device token first
  if (options.includes(value)) {
    return Ok(descriptor.decodeMap?.[value] ?? value);
  }

  // Then the human-readable name
  const token = descriptor.encodeMap?.[value];
  if (token !== undefined) {
    return Ok(value);
  }

  const human = descriptor.encodeMap ? Object.keys(descriptor.encodeMap) : [];
  const valid = [...options, ...human.filter(h => !options.includes(h))];
  return Err(invalid(descriptor, value, `Valid options: ${valid.join(', ')}`));
}

function matchKeyword(keywords: readonly string[] | undefined, text: string): string | undefined {
  const upper = text.trim().toUpperCase();
  return keywords?.find(k => k.toUpperCase() === upper);
}

function canonicalNumber(
  descriptor: ParameterDescriptor,
  keywords: readonly string[] | undefined,
  value: ParameterInput
): Result<ParameterValue, InstrumentError> {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Ok(value) : Err(invalid(descriptor, value, 'Not a finite number.'));
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const keyword = matchKeyword(keywords, value);
    if (keyword !== undefined) return Ok(keyword);
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return Ok(parsed);
  }
  const expected = keywords?.length ? `Expected a number or ${keywords.join('/')}.` : 'Expected a number.';
  return Err(invalid(descriptor, value, expected));
}

function canonicalize(
  descriptor: ParameterDescriptor,
  value: ParameterInput
): Result<ParameterValue, InstrumentError> {
  const kind = descriptor.kind;
  switch (kind.type) {
    case 'enum': {
      const onOff = onOffPolicy(descriptor);
      if (onOff) return normalizeOnOff(descriptor, value, onOff.lenient);
      return canonicalEnum(descriptor, kind.options, value);
    }
    case 'number':
      return canonicalNumber(descriptor, kind.keywords, value);
    case 'string':
      if (typeof value === 'boolean') {
        return Err(invalid(descriptor, value, 'Expected text.'));
      }
      return Ok(String(value));
  }
}

// ============ Policies ============

function checkRange(
  descriptor: ParameterDescriptor,
  value: ParameterValue,
  min: number | undefined,
  max: number | undefined
): InstrumentError | null {
  if (typeof value !== 'number') return null;
  if (min !== undefined && value < min) {
    return invalid(descriptor, value, `Must be at least ${min}.`);
  }
  if (max !== undefined && value > max) {
    return invalid(descriptor, value, `Must be at most ${max}.`);
  }
  return null;
}

function checkCrossField(
  descriptor: ParameterDescriptor,
  value: ParameterValue,
  rule: CrossFieldRule,
  context: CodecContext
): InstrumentError | null {
  const other = context.currentValue(rule.otherKey);
  // Other side unknown (or zero, i.e. never configured): accept provisionally
  if (typeof other !== 'number' || other === 0 || typeof value !== 'number') {
    return null;
  }
  if (rule.relation === 'at-most' && value > other) {
    return invalid(descriptor, value, `Has to be smaller than ${rule.otherKey} ${other} (${rule.name}).`);
  }
  if (rule.relation === 'at-least' && value < other) {
    return invalid(descriptor, value, `Has to be larger than ${rule.otherKey} ${other} (${rule.name}).`);
  }
  return null;
}

function checkDiscovered(
  descriptor: ParameterDescriptor,
  value: ParameterValue,
  context: CodecContext
): InstrumentError | null {
  // Nothing discovered yet: accept provisionally
  if (context.discoveredOptions.length === 0) return null;
  if (context.discoveredOptions.includes(String(value))) return null;
  return invalid(descriptor, value, `Not in the instrument catalog: ${context.discoveredOptions.join(', ')}`);
}

function applyPolicy(
  descriptor: ParameterDescriptor,
  policy: ValidationPolicy,
  value: ParameterValue,
  context: CodecContext
): InstrumentError | null {
  switch (policy.type) {
    case 'enum':
    case 'bool-normalize':
      // Already enforced while canonicalizing
      return null;
    case 'numeric-range':
      return checkRange(descriptor, value, policy.min, policy.max);
    case 'cross-field':
      return checkCrossField(descriptor, value, policy.rule, context);
    case 'discovered-options':
      return checkDiscovered(descriptor, value, context);
  }
}

// ============ Wire formatting ============

function toDeviceToken(descriptor: ParameterDescriptor, value: ParameterValue): string {
  const kind = descriptor.kind;
  if (kind.type === 'enum') {
    const text = String(value);
    return descriptor.encodeMap?.[text] ?? text;
  }
  if (kind.type === 'string' && kind.quoted) {
    return `"${String(value)}"`;
  }
  return String(value);
}

function formatTemplate(template: string, fields: { alias: string; value?: string }): string {
  return template
    .split('{alias}').join(fields.alias)
    .split('{value}').join(fields.value ?? '');
}

export const ScpiCodec = {
  /**
   * Substitute the channel alias into the descriptor's address.
   * Device-scoped descriptors pass null and skip substitution.
   */
  resolveAlias(descriptor: ParameterDescriptor, channelAlias: string | null): string {
    if (channelAlias === null) return descriptor.aliasTemplate;
    return descriptor.aliasTemplate.split(CHANNEL_PLACEHOLDER).join(channelAlias);
  },

  /**
   * Run every validation policy and return the canonical value: the value
   * decode() yields for the token this value encodes to.
   */
  validate(
    descriptor: ParameterDescriptor,
    value: ParameterInput,
    context: CodecContext = EMPTY_CONTEXT
  ): Result<ParameterValue, InstrumentError> {
    const canonical = canonicalize(descriptor, value);
    if (!canonical.ok) return canonical;

    for (const policy of descriptor.policies) {
      const error = applyPolicy(descriptor, policy, canonical.value, context);
      if (error) return Err(error);
    }
    return canonical;
  },

  /** Device token (unquoted text for the {value} slot) for a canonical value */
  toDeviceToken,

  /** Format the SET line for an already validated canonical value */
  formatCommand(descriptor: ParameterDescriptor, channelAlias: string | null, value: ParameterValue): string {
    return formatTemplate(descriptor.commandFormatTemplate, {
      alias: this.resolveAlias(descriptor, channelAlias),
      value: toDeviceToken(descriptor, value),
    });
  },

  /**
   * Validate and build the SET wire string.
   */
  encode(
    descriptor: ParameterDescriptor,
    channelAlias: string | null,
    value: ParameterInput,
    context: CodecContext = EMPTY_CONTEXT
  ): Result<string, InstrumentError> {
    const validated = this.validate(descriptor, value, context);
    if (!validated.ok) return validated;
    return Ok(this.formatCommand(descriptor, channelAlias, validated.value));
  },

  /**
   * Build the GET wire string. An argument switches to the
   * query-with-argument form used by catalog listings.
   */
  encodeQuery(descriptor: ParameterDescriptor, channelAlias: string | null, argument?: string): string {
    const alias = this.resolveAlias(descriptor, channelAlias);
    if (argument === undefined) {
      return formatTemplate(descriptor.queryFormatTemplate, { alias });
    }
    return formatTemplate(descriptor.commandFormatTemplate, { alias, value: argument });
  },

  /**
   * Decode one response line into the descriptor's typed value.
   */
  decode(descriptor: ParameterDescriptor, response: string): Result<ParameterValue, InstrumentError> {
    const text = response.trim();
    const kind = descriptor.kind;

    switch (kind.type) {
      case 'number': {
        const keyword = matchKeyword(kind.keywords, text);
        if (keyword !== undefined) return Ok(keyword);
        if (kind.keywords?.includes('INF') && ScpiParser.isInfinity(text)) return Ok('INF');

        const parsed = ScpiParser.parseNumber(text);
        if (!parsed.ok) {
          return Err(InstrumentErrors.malformed(`${descriptor.key} return value ${parsed.error}`));
        }
        return Ok(parsed.value);
      }

      case 'string':
        return Ok(kind.quoted ? ScpiParser.unquote(text) : text);

      case 'enum': {
        if (onOffPolicy(descriptor)) {
          const onOff = ScpiParser.parseOnOff(text);
          if (!onOff.ok) {
            return Err(InstrumentErrors.malformed(`${descriptor.key} return value ${text} is not one of the valid options`));
          }
          return Ok(onOff.value ? 'ON' : 'OFF');
        }

        const upper = text.toUpperCase();
        const token = kind.options.find(o => o === text) ?? kind.options.find(o => o.toUpperCase() === upper);
        if (token === undefined) {
          return Err(InstrumentErrors.malformed(`${descriptor.key} return value ${text} is not one of the valid options`));
        }

        const human = descriptor.decodeMap?.[token];
        if (human === undefined) return Ok(token);
        // Maps must round-trip or the value is rejected
        if (descriptor.encodeMap?.[human] !== token) {
          return Err(InstrumentErrors.malformed(`${descriptor.key} token ${token} does not round-trip through ${human}`));
        }
        return Ok(human);
      }
    }
  },

  /**
   * Equality used by read-back verification, on canonical values.
   */
  valuesEqual(descriptor: ParameterDescriptor, a: ParameterValue, b: ParameterValue): boolean {
    if (descriptor.kind.type === 'number' && typeof a === 'number' && typeof b === 'number') {
      if (a === b) return true;
      return Math.abs(a - b) <= NUMBER_TOLERANCE * Math.max(Math.abs(a), Math.abs(b));
    }
    return a === b;
  },
};
