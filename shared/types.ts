// Shared types for the server and any client talking to it

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============ Instrument Types ============

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'faulted';

export type AccessLevel = 'normal' | 'expert';

/** Typed value of a parameter after decoding (enum/string -> string, number -> number) */
export type ParameterValue = string | number;

/** What callers may hand to setParameter; booleans are accepted by on/off parameters */
export type ParameterInput = string | number | boolean;

export interface InstrumentInfo {
  id: string;
  model: string;
  manufacturer: string;
  /** Raw *IDN? reply from the last successful handshake */
  identity?: string;
}

/** Serializable description of one parameter instance (device-scoped or per channel) */
export interface ParameterInfo {
  key: string;
  channel: string | null;
  displayName: string;
  description?: string;
  unit?: string;
  kind: 'enum' | 'number' | 'string';
  options?: string[];
  min?: number;
  max?: number;
  keywords?: string[];
  accessLevel: AccessLevel;
  readOnly: boolean;
  pollIntervalSeconds?: number;
}

/** Current known value of one parameter instance */
export interface ParameterSnapshot {
  key: string;
  channel: string | null;
  raw: string | null;
  value: ParameterValue | null;
  lastUpdated: number | null;
  pendingWrite: boolean;
}

export interface ReadBackReport {
  key: string;
  channel: string | null;
  requested: ParameterValue;
  actual: ParameterValue;
}

// Complete session state - the abstract representation of one instrument
export interface InstrumentSessionState {
  info: InstrumentInfo;
  connectionState: ConnectionState;
  status: string;
  parameters: ParameterInfo[];
  values: ParameterSnapshot[];
  discoveredOptions: string[];
  lastUpdated: number;
}

// Lightweight instrument info for listing (before subscription)
export interface InstrumentSummary {
  id: string;
  info: InstrumentInfo;
  connectionState: ConnectionState;
  status: string;
}

// ============ WebSocket Types ============

// Client -> Server messages
export type ClientMessage =
  | { type: 'getInstruments' }
  | { type: 'subscribe'; instrumentId: string }
  | { type: 'unsubscribe'; instrumentId: string }
  | { type: 'connect'; instrumentId: string }
  | { type: 'setParameter'; instrumentId: string; key: string; channel?: string; value: ParameterInput }
  | { type: 'getParameter'; instrumentId: string; key: string; channel?: string }
  | { type: 'refreshCatalog'; instrumentId: string; path?: string };

// Server -> Client messages
export type ServerMessage =
  | { type: 'instrumentList'; instruments: InstrumentSummary[] }
  | { type: 'subscribed'; instrumentId: string; state: InstrumentSessionState }
  | { type: 'unsubscribed'; instrumentId: string }
  | { type: 'connection'; instrumentId: string; state: ConnectionState; status: string }
  | { type: 'status'; instrumentId: string; status: string }
  | { type: 'parameter'; instrumentId: string; parameter: ParameterSnapshot }
  | { type: 'readBackMismatch'; instrumentId: string; report: ReadBackReport }
  | { type: 'parameterValue'; instrumentId: string; key: string; channel: string | null; value: ParameterValue }
  | { type: 'catalog'; instrumentId: string; options: string[] }
  | { type: 'error'; instrumentId?: string; code: string; message: string };

export interface ApiError {
  error: string;
  message: string;
}
