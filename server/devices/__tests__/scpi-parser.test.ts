import { describe, it, expect } from 'vitest';
import { ScpiParser } from '../scpi-parser.js';

describe('ScpiParser', () => {
  describe('parseNumber', () => {
    it('parses standard numeric responses', () => {
      expect(ScpiParser.parseNumber('1.234')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('-5.67')).toEqual({ ok: true, value: -5.67 });
      expect(ScpiParser.parseNumber('0')).toEqual({ ok: true, value: 0 });
    });

    it('parses the padded scientific notation function generators reply with', () => {
      expect(ScpiParser.parseNumber('+1.0000000000000E+03')).toEqual({ ok: true, value: 1000 });
      expect(ScpiParser.parseNumber('-5.67E-03')).toEqual({ ok: true, value: -5.67e-3 });
    });

    it('handles whitespace', () => {
      expect(ScpiParser.parseNumber('  1.234  ')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('\t42\n')).toEqual({ ok: true, value: 42 });
    });

    it('returns error for empty responses', () => {
      expect(ScpiParser.parseNumber('')).toEqual({ ok: false, error: 'empty response' });
    });

    it('returns error for the invalid marker', () => {
      expect(ScpiParser.parseNumber('****')).toEqual({ ok: false, error: 'invalid reading (****)' });
    });

    it('returns error for IEEE 488.2 not-a-number', () => {
      expect(ScpiParser.parseNumber('9.91E37')).toEqual({ ok: false, error: 'not a number (9.91E37)' });
    });

    it('returns error for non-numeric responses', () => {
      expect(ScpiParser.parseNumber('AUTO')).toEqual({ ok: false, error: 'non-numeric response: "AUTO"' });
    });
  });

  describe('parseOnOff', () => {
    it('accepts 1/0 and ON/OFF in any case', () => {
      expect(ScpiParser.parseOnOff('1')).toEqual({ ok: true, value: true });
      expect(ScpiParser.parseOnOff('on')).toEqual({ ok: true, value: true });
      expect(ScpiParser.parseOnOff('0\n')).toEqual({ ok: true, value: false });
      expect(ScpiParser.parseOnOff('OFF')).toEqual({ ok: true, value: false });
    });

    it('rejects anything else', () => {
      expect(ScpiParser.parseOnOff('2')).toEqual({ ok: false, error: 'expected ON/OFF, got "2"' });
    });
  });

  describe('unquote', () => {
    it('strips one pair of enclosing quotes', () => {
      expect(ScpiParser.unquote('"INT:\\BUILTIN\\SINC.arb"')).toBe('INT:\\BUILTIN\\SINC.arb');
      expect(ScpiParser.unquote('""')).toBe('');
    });

    it('leaves unquoted text alone', () => {
      expect(ScpiParser.unquote(' SIN ')).toBe('SIN');
      expect(ScpiParser.unquote('"')).toBe('"');
    });
  });

  describe('parseIdn', () => {
    it('splits the identification reply', () => {
      expect(ScpiParser.parseIdn('Keysight Technologies,33512B,MY00000001,5.03-3.15-2.00-58-00\n')).toEqual({
        ok: true,
        value: {
          manufacturer: 'Keysight Technologies',
          model: '33512B',
          serial: 'MY00000001',
          firmware: '5.03-3.15-2.00-58-00',
        },
      });
    });

    it('tolerates missing serial and firmware', () => {
      expect(ScpiParser.parseIdn('TEKTRONIX,AFG31252')).toEqual({
        ok: true,
        value: { manufacturer: 'TEKTRONIX', model: 'AFG31252', serial: '', firmware: '' },
      });
    });

    it('rejects replies without a model', () => {
      expect(ScpiParser.parseIdn('garbage')).toEqual({ ok: false, error: 'unrecognised identification: "garbage"' });
    });
  });

  describe('parseCatalog', () => {
    it('returns waveform names in listing order', () => {
      const listing = '+3000,+2000000,"SINC.arb,ARB,1000","HAVERSINE.arb,ARB,1000","EXP_RISE.arb,ARB,1000"';
      expect(ScpiParser.parseCatalog(listing)).toEqual(['SINC.arb', 'HAVERSINE.arb', 'EXP_RISE.arb']);
    });

    it('keeps sequence files and drops other entries', () => {
      const listing = '+0,+100,"A.seq,SEQ,10","notes.txt,TXT,5"';
      expect(ScpiParser.parseCatalog(listing)).toEqual(['A.seq']);
    });

    it('returns an empty list for an empty catalog', () => {
      expect(ScpiParser.parseCatalog('+0,+2000000')).toEqual([]);
    });
  });

  describe('isInfinity', () => {
    it('recognises the SCPI infinity value in any notation', () => {
      expect(ScpiParser.isInfinity('+9.900000000000000E+37')).toBe(true);
      expect(ScpiParser.isInfinity('9.9E37')).toBe(true);
    });

    it('does not treat not-a-number or ordinary values as infinity', () => {
      expect(ScpiParser.isInfinity('9.91E37')).toBe(false);
      expect(ScpiParser.isInfinity('+5.000000000000000E+01')).toBe(false);
      expect(ScpiParser.isInfinity('')).toBe(false);
    });
  });

  describe('parseCsv', () => {
    it('splits and trims', () => {
      expect(ScpiParser.parseCsv('a, b ,c')).toEqual(['a', 'b', 'c']);
    });
  });
});
