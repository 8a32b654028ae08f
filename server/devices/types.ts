// Re-export shared types
export * from '../../shared/types.js';

import type { Result, AccessLevel, ParameterValue } from '../../shared/types.js';
import type { InstrumentError } from './errors.js';

// Server-only types

/**
 * Line-oriented, strictly request/response transport.
 * One owner at a time; callers serialize access (see CommandLock).
 */
export interface Transport {
  open(): Promise<Result<void, InstrumentError>>;
  close(): Promise<Result<void, Error>>;
  /** Write raw text (already newline-terminated). Discards any unread input first. */
  write(data: string): Promise<Result<void, InstrumentError>>;
  /** Next response line with terminators trimmed, or TRANSPORT_TIMEOUT */
  readLine(timeoutMs: number): Promise<Result<string, InstrumentError>>;
  isOpen(): boolean;
}

// ============ Parameter Schema ============

export type ParameterKind =
  | { type: 'enum'; options: readonly string[] }
  | {
      type: 'number';
      min?: number;
      max?: number;
      /** Symbolic values accepted beside numbers, e.g. INF for a high-Z load */
      keywords?: readonly string[];
    }
  | { type: 'string'; quoted?: boolean };

/**
 * Named rule relating two parameters of the same node.
 * Two-phase: if the other parameter's value is unknown the value is accepted
 * provisionally, otherwise the relation is enforced.
 */
export interface CrossFieldRule {
  name: string;
  relation: 'at-most' | 'at-least';
  otherKey: string;
}

export type ValidationPolicy =
  | { type: 'enum'; options: readonly string[] }
  | { type: 'bool-normalize'; lenient: boolean }
  | { type: 'numeric-range'; min?: number; max?: number }
  | { type: 'cross-field'; rule: CrossFieldRule }
  | { type: 'discovered-options' };

export interface ParameterDescriptor {
  readonly key: string;
  readonly displayName: string;
  readonly description?: string;
  readonly unit?: string;
  readonly kind: ParameterKind;
  /** Wire address, may contain {channel} */
  readonly aliasTemplate: string;
  readonly commandFormatTemplate: string;
  readonly queryFormatTemplate: string;
  readonly readOnConnect: boolean;
  readonly writeOnConnect: boolean;
  readonly commandReadBack: boolean;
  /** Absent = not polled. 0 = as often as the global minimum allows. */
  readonly pollIntervalSeconds?: number;
  readonly accessLevel: AccessLevel;
  readonly readOnly: boolean;
  readonly defaultValue?: ParameterValue;
  /** human -> device token */
  readonly encodeMap?: Readonly<Record<string, string>>;
  /** device token -> human */
  readonly decodeMap?: Readonly<Record<string, string>>;
  readonly policies: readonly ValidationPolicy[];
  /** Replies matching this are not stored (e.g. '+0,"No error"') */
  readonly ignoreResponsePattern?: RegExp;
}

export interface ChannelNode {
  readonly name: string;
  readonly displayName: string;
  /** Substituted for {channel} in the alias templates of this node */
  readonly alias: string;
  readonly parameters: readonly ParameterDescriptor[];
}

export interface CatalogDeclaration {
  /** Device-scoped descriptor answering the query-with-argument listing */
  key: string;
  defaultPath: string;
  refreshOnConnect: boolean;
}

export interface InstrumentSchema {
  readonly model: string;
  readonly manufacturer: string;
  readonly deviceParameters: readonly ParameterDescriptor[];
  readonly channels: readonly ChannelNode[];
  readonly sweepOrder: 'device-first' | 'channels-first';
  /** Sent after open() to prove the instrument answers; null skips the probe */
  readonly handshakeQuery: string | null;
  readonly catalog?: Readonly<CatalogDeclaration>;
}

/** One addressable instance of a descriptor */
export interface ParameterInstance {
  descriptor: ParameterDescriptor;
  channel: ChannelNode | null;
}

// ============ Model Registry ============

export interface ModelRegistration {
  model: string;
  createSchema: () => Result<InstrumentSchema, Error>;
  match: {
    // IDN pattern matching (manufacturer and model from *IDN? response)
    manufacturer: string | RegExp;
    model: RegExp;
    // USB matching (to know which devices are ours)
    vendorId?: number;
    productId?: number;
  };
}

// ============ Transport Configuration ============

export type TransportConfig =
  | { type: 'tcp'; host: string; port?: number }
  | { type: 'serial'; path: string; baudRate?: number }
  | { type: 'usbtmc'; vendorId: number; productId: number }
  | { type: 'simulated'; latencyMs?: number; offline?: boolean };
