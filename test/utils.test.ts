import { describe, expect, it } from 'vitest';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import {
  buildReadRequestPdu,
  functionCodeName,
  responseByteCount,
  unpackBits,
  unpackRegisters,
} from '../src/function-codes/read-functions.js';
import { TransactionCounter, buildMbapHeader, parseMbapHeader } from '../src/utils/tcp-utils.js';
import {
  bytesToUint16BE,
  concatUint8Arrays,
  isUint16,
  isUint8,
  sliceUint8Array,
  toHex,
  uint16ToBytesBE,
} from '../src/utils/utils.js';

describe('byte helpers', () => {
  it('concatenates arrays in order', () => {
    const result = concatUint8Arrays([Uint8Array.of(1, 2), new Uint8Array(0), Uint8Array.of(3)]);
    expect(Array.from(result)).toEqual([1, 2, 3]);
  });

  it('converts 16-bit values big-endian', () => {
    expect(Array.from(uint16ToBytesBE(0x1234))).toEqual([0x12, 0x34]);
    expect(bytesToUint16BE(Uint8Array.of(0x00, 0xab, 0xcd), 1)).toBe(0xabcd);
  });

  it('slices without copying', () => {
    const source = Uint8Array.of(1, 2, 3, 4);
    const view = sliceUint8Array(source, 1, 3);
    source[1] = 9;
    expect(Array.from(view)).toEqual([9, 3]);
  });

  it('formats hex with an optional separator', () => {
    expect(toHex(Uint8Array.of(0x00, 0x0f, 0xa0))).toBe('000fa0');
    expect(toHex(Uint8Array.of(0x12, 0x34), ' ')).toBe('12 34');
  });

  it('checks integer widths', () => {
    expect(isUint8(255)).toBe(true);
    expect(isUint8(256)).toBe(false);
    expect(isUint16(65535)).toBe(true);
    expect(isUint16(-1)).toBe(false);
    expect(isUint16(0.5)).toBe(false);
  });
});

describe('MBAP header', () => {
  it('sets the length field to the PDU length plus the unit id', () => {
    expect(Array.from(buildMbapHeader(0x0102, 0x11, 5))).toEqual([
      0x01, 0x02, 0x00, 0x00, 0x00, 0x06, 0x11,
    ]);
  });

  it('parses a header at a non-zero byte offset', () => {
    const backing = Uint8Array.of(0xee, 0x00, 0x07, 0x00, 0x00, 0x00, 0x05, 0x02, 0xff);
    expect(parseMbapHeader(backing.subarray(1))).toEqual({
      transactionId: 7,
      protocolId: 0,
      length: 5,
      unitId: 2,
    });
  });
});

describe('TransactionCounter', () => {
  it('starts at 1', () => {
    const counter = new TransactionCounter();
    expect(counter.next()).toBe(1);
    expect(counter.next()).toBe(2);
    expect(counter.current).toBe(2);
  });

  it('wraps from 65535 to 1, skipping 0', () => {
    const counter = new TransactionCounter(0xfffe);
    expect(counter.next()).toBe(0xffff);
    expect(counter.next()).toBe(1);
  });
});

describe('read function helpers', () => {
  it('builds the 5-byte read PDU', () => {
    expect(Array.from(buildReadRequestPdu(ModbusFunctionCode.READ_INPUT_REGISTERS, 0x0108, 0x0002))).toEqual([
      0x04, 0x01, 0x08, 0x00, 0x02,
    ]);
  });

  it('computes byte counts', () => {
    expect(responseByteCount(ModbusFunctionCode.READ_COILS, 1)).toBe(1);
    expect(responseByteCount(ModbusFunctionCode.READ_COILS, 17)).toBe(3);
    expect(responseByteCount(ModbusFunctionCode.READ_HOLDING_REGISTERS, 3)).toBe(6);
  });

  it('names function codes for logs', () => {
    expect(functionCodeName(3)).toBe('READ_HOLDING_REGISTERS');
    expect(functionCodeName(0x10)).toBe('UNKNOWN');
  });

  it('unpacks bits across bytes', () => {
    expect(unpackBits(Uint8Array.of(0x80, 0x01), 9)).toEqual([
      false, false, false, false, false, false, false, true, true,
    ]);
  });

  it('unpacks registers from a view with an offset', () => {
    const backing = Uint8Array.of(0xaa, 0x12, 0x34, 0x56, 0x78);
    expect(unpackRegisters(backing.subarray(1), 2)).toEqual([0x1234, 0x5678]);
  });
});
