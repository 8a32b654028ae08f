/**
 * Instrument error taxonomy
 *
 * Transport-level codes escalate to the connection supervisor (reconnect).
 * Parameter-level codes stay local to one parameter and only reach the
 * status line.
 */

export type InstrumentErrorCode =
  // Transport level
  | 'TRANSPORT_TIMEOUT'
  | 'CONNECTION_REFUSED'
  | 'TRANSPORT_ERROR'
  // Parameter level
  | 'INVALID_OPTION'
  | 'MALFORMED_RESPONSE'
  | 'READ_BACK_MISMATCH'
  | 'UNKNOWN_PARAMETER'
  | 'READ_ONLY'
  | 'NOT_CONNECTED';

const TRANSPORT_CODES: ReadonlySet<InstrumentErrorCode> = new Set<InstrumentErrorCode>([
  'TRANSPORT_TIMEOUT',
  'CONNECTION_REFUSED',
  'TRANSPORT_ERROR',
]);

export class InstrumentError extends Error {
  readonly code: InstrumentErrorCode;

  constructor(code: InstrumentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstrumentError';
    this.code = code;
  }
}

export function isTransportError(err: InstrumentError): boolean {
  return TRANSPORT_CODES.has(err.code);
}

export const InstrumentErrors = {
  timeout(message: string): InstrumentError {
    return new InstrumentError('TRANSPORT_TIMEOUT', message);
  },

  refused(message: string, cause?: unknown): InstrumentError {
    return new InstrumentError('CONNECTION_REFUSED', message, { cause });
  },

  transport(message: string, cause?: unknown): InstrumentError {
    return new InstrumentError('TRANSPORT_ERROR', message, { cause });
  },

  invalidOption(message: string): InstrumentError {
    return new InstrumentError('INVALID_OPTION', message);
  },

  malformed(message: string): InstrumentError {
    return new InstrumentError('MALFORMED_RESPONSE', message);
  },

  readBackMismatch(message: string): InstrumentError {
    return new InstrumentError('READ_BACK_MISMATCH', message);
  },

  unknownParameter(key: string, channel: string | null): InstrumentError {
    const where = channel ? ` in ${channel}` : '';
    return new InstrumentError('UNKNOWN_PARAMETER', `Unknown parameter: ${key}${where}`);
  },

  readOnly(key: string): InstrumentError {
    return new InstrumentError('READ_ONLY', `Parameter ${key} is read-only`);
  },

  notConnected(): InstrumentError {
    return new InstrumentError('NOT_CONNECTED', 'Instrument is not connected');
  },
};

// Socket/serial error codes that mean the peer actively refused us
const REFUSED_CODES = ['ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOENT', 'EACCES'];

/**
 * Convert something thrown by a transport library into an InstrumentError.
 * Only used at library boundaries.
 */
export function toTransportError(e: unknown, context: string): InstrumentError {
  if (e instanceof InstrumentError) return e;
  const err = e instanceof Error ? e : new Error(String(e));
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  if (REFUSED_CODES.includes(code)) {
    return InstrumentErrors.refused(`${context}: ${err.message}`, err);
  }
  return InstrumentErrors.transport(`${context}: ${err.message}`, err);
}
