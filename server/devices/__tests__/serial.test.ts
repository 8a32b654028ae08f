import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';

// Create mock instances outside so we can access them
let mockPortInstance: any;
let mockParserInstance: EventEmitter;

// Mock SerialPort before importing
vi.mock('serialport', () => {
  return {
    SerialPort: vi.fn().mockImplementation(() => {
      const emitter = new EventEmitter();
      mockPortInstance = {
        open: vi.fn((cb: (err?: Error | null) => void) => cb(null)),
        close: vi.fn((cb: () => void) => cb()),
        write: vi.fn((data: string, cb: (err?: Error | null) => void) => cb(null)),
        pipe: vi.fn(() => mockParserInstance),
        removeAllListeners: vi.fn(),
        on: emitter.on.bind(emitter),
        emit: emitter.emit.bind(emitter),
      };
      return mockPortInstance;
    }),
  };
});

vi.mock('@serialport/parser-readline', () => ({
  ReadlineParser: vi.fn().mockImplementation(() => {
    mockParserInstance = new EventEmitter();
    return mockParserInstance;
  }),
}));

import { SerialPort } from 'serialport';
import { createSerialTransport } from '../transports/serial.js';

describe('Serial Transport', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockPortInstance = null;
    mockParserInstance = new EventEmitter();
  });

  describe('open()', () => {
    it('opens the port with the configured baud rate', async () => {
      const transport = createSerialTransport({ path: '/dev/test', baudRate: 115200 });
      expect(await transport.open()).toEqual({ ok: true, value: undefined });
      expect(SerialPort).toHaveBeenCalledWith({ path: '/dev/test', baudRate: 115200, autoOpen: false });
      expect(transport.isOpen()).toBe(true);
    });

    it('defaults to 9600 baud', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      expect(SerialPort).toHaveBeenCalledWith({ path: '/dev/test', baudRate: 9600, autoOpen: false });
    });

    it('is idempotent when already open', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      await transport.open();
      expect(mockPortInstance.open).toHaveBeenCalledTimes(1);
    });

    it('maps a missing port to CONNECTION_REFUSED', async () => {
      const transport = createSerialTransport({ path: '/dev/missing' });
      vi.mocked(SerialPort).mockImplementationOnce(() => {
        const emitter = new EventEmitter();
        mockPortInstance = {
          open: vi.fn((cb: (err?: Error | null) => void) =>
            cb(Object.assign(new Error('No such file or directory'), { code: 'ENOENT' }))),
          pipe: vi.fn(() => mockParserInstance),
          removeAllListeners: vi.fn(),
          on: emitter.on.bind(emitter),
        };
        return mockPortInstance;
      });

      const result = await transport.open();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('CONNECTION_REFUSED');
        expect(result.error.message).toBe('Failed to open /dev/missing: No such file or directory');
      }
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('close()', () => {
    it('closes the port and removes listeners', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      await transport.close();
      expect(mockPortInstance.close).toHaveBeenCalled();
      expect(mockPortInstance.removeAllListeners).toHaveBeenCalled();
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('write() and readLine()', () => {
    it('writes the raw line and reads the parser output', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      expect(await transport.write('SOURce1:FREQ?\n')).toEqual({ ok: true, value: undefined });
      expect(mockPortInstance.write).toHaveBeenCalledWith('SOURce1:FREQ?\n', expect.any(Function));

      const reading = transport.readLine(1000);
      mockParserInstance.emit('data', '+1.000000000000000E+03\r');
      expect(await reading).toEqual({ ok: true, value: '+1.000000000000000E+03' });
    });

    it('discards unread input before each write', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();

      mockParserInstance.emit('data', 'late reply');
      await transport.write('*IDN?\n');
      const reading = transport.readLine(1000);
      mockParserInstance.emit('data', 'TEKTRONIX,AFG31252,C000001,1.0');
      expect(await reading).toEqual({ ok: true, value: 'TEKTRONIX,AFG31252,C000001,1.0' });
    });

    it('times out when nothing arrives', async () => {
      vi.useFakeTimers();
      try {
        const transport = createSerialTransport({ path: '/dev/test' });
        await transport.open();
        const reading = transport.readLine(500);
        await vi.advanceTimersByTimeAsync(500);
        const result = await reading;
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe('TRANSPORT_TIMEOUT');
      } finally {
        vi.useRealTimers();
      }
    });

    it('refuses to write before open()', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      const result = await transport.write('*IDN?\n');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('/dev/test: port not opened');
    });
  });

  describe('disconnection detection', () => {
    it('marks the port disconnected on close and fails the pending read', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      const reading = transport.readLine(1000);

      mockPortInstance.emit('close');

      expect(transport.isOpen()).toBe(false);
      const result = await reading;
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TRANSPORT_ERROR');
        expect(result.error.message).toBe('/dev/test: port closed');
      }

      const write = await transport.write('*IDN?\n');
      expect(write.ok).toBe(false);
      if (!write.ok) expect(write.error.message).toBe('/dev/test: port closed');
    });

    it('marks the port disconnected on error', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      mockPortInstance.emit('error', new Error('USB cable unplugged'));
      expect(transport.isOpen()).toBe(false);
    });

    it('can be reopened after a disconnect', async () => {
      const transport = createSerialTransport({ path: '/dev/test' });
      await transport.open();
      mockPortInstance.emit('close');
      await transport.close();
      expect(await transport.open()).toEqual({ ok: true, value: undefined });
      expect(transport.isOpen()).toBe(true);
    });
  });
});
