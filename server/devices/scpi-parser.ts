/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses. Works over any transport (TCP socket, USB-TMC, serial).
 */

import { Result, Ok, Err } from '../../shared/types.js';

/**
 * IEEE 488.2 instruments return 9.91E37 for "not a number".
 * Any value above this threshold is considered invalid.
 */
const SCPI_NAN_THRESHOLD = 9e36;

// SCPI reports INFinity as 9.9E37 (e.g. a high-Z output load)
const SCPI_INFINITY = 9.9e37;

/**
 * Some instruments return "****" for invalid readings.
 */
const INVALID_MARKER = '****';

// File extensions that identify waveform entries in a catalog listing
const CATALOG_EXTENSIONS = ['.arb', '.seq'];

export interface IdnInfo {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles:
   * - Standard numeric responses ("1.234", "-5.67E-3", "+1.0000000000000E+03")
   * - Invalid markers ("****")
   * - IEEE 488.2 not-a-number (9.91E37)
   * - Empty and non-numeric responses
   *
   * @param response - Raw SCPI response string
   * @returns Result with parsed number, or error string describing the issue
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    if (trimmed.includes(INVALID_MARKER)) {
      return Err('invalid reading (****)');
    }

    const value = Number(trimmed);

    if (Number.isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    if (Math.abs(value) > SCPI_NAN_THRESHOLD) {
      return Err('not a number (9.91E37)');
    }

    return Ok(value);
  },

  /**
   * Parse an on/off SCPI response.
   *
   * "1"/"ON" -> true, "0"/"OFF" -> false, case-insensitive.
   * Anything else is an error.
   */
  parseOnOff(response: string): Result<boolean, string> {
    const val = response.trim().toUpperCase();
    if (val === '1' || val === 'ON') return Ok(true);
    if (val === '0' || val === 'OFF') return Ok(false);
    return Err(`expected ON/OFF, got "${response.trim()}"`);
  },

  /**
   * Strip one pair of enclosing double quotes, if present.
   */
  unquote(response: string): string {
    const trimmed = response.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
      return trimmed.slice(1, -1);
    }
    return trimmed;
  },

  /**
   * Parse a *IDN? response: "<manufacturer>,<model>,<serial>,<firmware>"
   */
  parseIdn(response: string): Result<IdnInfo, string> {
    const parts = this.parseCsv(response);
    if (parts.length < 2 || parts[0] === '' || parts[1] === '') {
      return Err(`unrecognised identification: "${response.trim()}"`);
    }
    return Ok({
      manufacturer: parts[0],
      model: parts[1],
      serial: parts[2] ?? '',
      firmware: parts[3] ?? '',
    });
  },

  /**
   * Parse a waveform catalog listing (MMEMory:CATalog:DATA:ARBitrary?).
   *
   * Format: <used>,<free>,"<name>,<type>,<size>",...
   * Only the names of .arb and .seq entries are returned, in listing order.
   */
  parseCatalog(response: string): string[] {
    return response
      .split(',')
      .map(part => part.trim().replace(/^"+|"+$/g, ''))
      .filter(part => {
        const lower = part.toLowerCase();
        return CATALOG_EXTENSIONS.some(ext => lower.includes(ext));
      });
  },

  /** True for the SCPI representation of positive infinity */
  isInfinity(response: string): boolean {
    const trimmed = response.trim();
    return trimmed !== '' && Number(trimmed) === SCPI_INFINITY;
  },

  /**
   * Parse a comma-separated SCPI response into parts.
   *
   * @param response - Raw SCPI response string
   * @returns Array of trimmed parts
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};
