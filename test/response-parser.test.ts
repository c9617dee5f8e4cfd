import fc from 'fast-check';
import { isErr, isOk, unwrapErr, unwrapOk } from 'option-t/plain_result';
import { describe, expect, it } from 'vitest';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import {
  ModbusExceptionError,
  ModbusMalformedResponseError,
  ModbusProtocolError,
  ModbusTransactionMismatchError,
  ModbusUnexpectedFunctionCodeError,
  ModbusUnsupportedFunctionError,
} from '../src/errors.js';
import { createRequestFrame } from '../src/request-frame.js';
import { decodeResponse, parseResponse, type ParseResult } from '../src/response-parser.js';
import type { ModbusResponseFault, ParsedResponse, RequestFrame } from '../src/types/modbus-types.js';
import { exceptionBytes, responseBytes } from './helpers/frames.js';

const coils = (registerQuantity: number) =>
  createRequestFrame({
    transactionId: 1,
    unitId: 1,
    functionCode: ModbusFunctionCode.READ_COILS,
    startingAddress: 0,
    registerQuantity,
  });

const holding = (registerQuantity: number) =>
  createRequestFrame({
    transactionId: 1,
    unitId: 1,
    functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
    startingAddress: 0,
    registerQuantity,
  });

function ok(result: ParseResult): ParsedResponse {
  expect(isOk(result)).toBe(true);
  return unwrapOk(result);
}

function fault(result: ParseResult): ModbusResponseFault {
  expect(isErr(result)).toBe(true);
  return unwrapErr(result);
}

describe('parseResponse: success', () => {
  it('decodes coils least significant bit first', () => {
    const parsed = ok(parseResponse(coils(8), responseBytes(1, 1, 0x01, [0b10110010])));

    expect(parsed.registers).toEqual({
      type: 'bits',
      functionCode: ModbusFunctionCode.READ_COILS,
      values: [false, true, false, false, true, true, false, true],
    });
    expect(parsed.byteCount).toBe(1);
    expect(parsed.length).toBe(4);
    expect(Array.from(parsed.payload)).toEqual([0b10110010]);
  });

  it('ignores padding bits in the last byte', () => {
    const parsed = ok(parseResponse(coils(10), responseBytes(1, 1, 0x01, [0x01, 0xfe])));

    expect(parsed.registers.values).toEqual([
      true, false, false, false, false, false, false, false, false, true,
    ]);
  });

  it('decodes discrete inputs like coils', () => {
    const frame = createRequestFrame({
      functionCode: ModbusFunctionCode.READ_DISCRETE_INPUTS,
      startingAddress: 0xc4,
      registerQuantity: 3,
    });
    const parsed = ok(parseResponse(frame, responseBytes(1, 1, 0x02, [0b101])));

    expect(parsed.registers).toEqual({
      type: 'bits',
      functionCode: ModbusFunctionCode.READ_DISCRETE_INPUTS,
      values: [true, false, true],
    });
  });

  it('decodes holding registers as big-endian words', () => {
    const parsed = ok(parseResponse(holding(2), responseBytes(1, 1, 0x03, [0x00, 0x0a, 0x01, 0x2c])));

    expect(parsed.registers).toEqual({
      type: 'words',
      functionCode: ModbusFunctionCode.READ_HOLDING_REGISTERS,
      values: [10, 300],
    });
  });

  it('decodes input registers', () => {
    const frame = createRequestFrame({
      transactionId: 0xabcd,
      functionCode: ModbusFunctionCode.READ_INPUT_REGISTERS,
      startingAddress: 8,
      registerQuantity: 1,
    });
    const parsed = ok(parseResponse(frame, responseBytes(0xabcd, 1, 0x04, [0xff, 0xfe])));

    expect(parsed.transactionId).toBe(0xabcd);
    expect(parsed.registers.values).toEqual([0xfffe]);
  });

  it('reports the echoed unit id without enforcing it', () => {
    const parsed = ok(parseResponse(holding(1), responseBytes(1, 7, 0x03, [0x00, 0x01])));
    expect(parsed.unitId).toBe(7);
  });

  it('returns one value per requested item', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 2000 }).chain(quantity =>
          fc.tuple(
            fc.constant(quantity),
            fc.uint8Array({ minLength: Math.ceil(quantity / 8), maxLength: Math.ceil(quantity / 8) })
          )
        ),
        ([quantity, data]) => {
          const parsed = ok(parseResponse(coils(quantity), responseBytes(1, 1, 0x01, Array.from(data))));
          expect(parsed.registers.values.length).toBe(quantity);
        }
      )
    );
  });
});

describe('parseResponse: exceptions', () => {
  it('maps exception code 2 to IllegalDataAddress', () => {
    const err = fault(parseResponse(holding(2), exceptionBytes(1, 1, 0x03, 0x02)));

    expect(err).toBeInstanceOf(ModbusExceptionError);
    if (err instanceof ModbusExceptionError) {
      expect(err.kind).toBe('IllegalDataAddress');
      expect(err.exceptionCode).toBe(2);
      expect(err.functionCode).toBe(3);
    }
  });

  it('keeps unknown exception codes as UnknownException', () => {
    const err = fault(parseResponse(coils(1), exceptionBytes(1, 1, 0x01, 0x0c)));

    expect(err).toBeInstanceOf(ModbusExceptionError);
    if (err instanceof ModbusExceptionError) {
      expect(err.kind).toBe('UnknownException');
      expect(err.message).toBe(
        'Modbus exception: function 0x1, code 0xc (Unknown exception code 0x0c)'
      );
    }
  });

  it('only treats the request function code with the high bit as an exception', () => {
    const err = fault(parseResponse(holding(1), exceptionBytes(1, 1, 0x04, 0x02)));

    expect(err).toBeInstanceOf(ModbusUnexpectedFunctionCodeError);
    expect(err.message).toBe('Unexpected function code: sent 0x3, received 0x84');
  });
});

describe('parseResponse: protocol faults', () => {
  it('reports a transaction id mismatch explicitly', () => {
    const err = fault(parseResponse(holding(1), responseBytes(2, 1, 0x03, [0x00, 0x01])));

    expect(err).toBeInstanceOf(ModbusTransactionMismatchError);
    expect(err.message).toBe('Transaction ID mismatch: received 2, expected 1');
  });

  it('checks the transaction id before the exception flag', () => {
    const err = fault(parseResponse(holding(1), exceptionBytes(9, 1, 0x03, 0x02)));
    expect(err).toBeInstanceOf(ModbusTransactionMismatchError);
  });

  it('rejects a response shorter than 9 bytes', () => {
    const err = fault(parseResponse(holding(1), new Uint8Array(8)));

    expect(err).toBeInstanceOf(ModbusMalformedResponseError);
    expect(err.message).toBe('Malformed Modbus response: expected at least 9 bytes, got 8');
  });

  it('rejects a non-zero protocol id', () => {
    const bytes = responseBytes(1, 1, 0x03, [0x00, 0x01]);
    bytes[3] = 0x01;

    expect(fault(parseResponse(holding(1), bytes)).message).toBe(
      'Malformed Modbus response: invalid protocol ID 1'
    );
  });

  it('rejects an echo of another read function', () => {
    const err = fault(parseResponse(holding(1), responseBytes(1, 1, 0x04, [0x00, 0x01])));

    expect(err).toBeInstanceOf(ModbusUnexpectedFunctionCodeError);
    if (err instanceof ModbusUnexpectedFunctionCodeError) {
      expect(err.sent).toBe(3);
      expect(err.received).toBe(4);
    }
  });

  it('rejects a byte count that does not fit the requested quantity', () => {
    const err = fault(parseResponse(holding(2), responseBytes(1, 1, 0x03, [0x00, 0x01])));

    expect(err).toBeInstanceOf(ModbusMalformedResponseError);
    expect(err.message).toBe(
      'Malformed Modbus response: byte count 2 does not match 4 expected for quantity 2'
    );
  });

  it('rejects an MBAP length that disagrees with the byte count', () => {
    const bytes = responseBytes(1, 1, 0x03, [0x00, 0x0a, 0x01, 0x2c]);
    bytes[5] = 8;

    expect(fault(parseResponse(holding(2), bytes)).message).toBe(
      'Malformed Modbus response: MBAP length 8 does not match byte count 4'
    );
  });

  it('rejects a truncated payload', () => {
    const bytes = responseBytes(1, 1, 0x03, [0x00, 0x0a, 0x01, 0x2c]).slice(0, 12);

    expect(fault(parseResponse(holding(2), bytes)).message).toBe(
      'Malformed Modbus response: expected 13 bytes, got 12'
    );
  });

  it('groups every mismatch under ModbusProtocolError', () => {
    const err = fault(parseResponse(holding(1), new Uint8Array(3)));
    expect(err).toBeInstanceOf(ModbusProtocolError);
  });
});

describe('parseResponse: invalid frames', () => {
  it('rejects a frame outside the read function codes before looking at the bytes', () => {
    const writeMultipleRegisters: number = 0x10;
    const frame: RequestFrame = { ...holding(1), functionCode: writeMultipleRegisters };

    expect(() => parseResponse(frame, responseBytes(1, 1, 0x10, [0x00, 0x01]))).toThrow(
      ModbusUnsupportedFunctionError
    );
  });
});

describe('decodeResponse', () => {
  it('returns the registers of a successful response', () => {
    expect(decodeResponse(holding(2), responseBytes(1, 1, 0x03, [0x00, 0x0a, 0x01, 0x2c])).values).toEqual([
      10, 300,
    ]);
  });

  it('throws the fault', () => {
    expect(() => decodeResponse(holding(2), exceptionBytes(1, 1, 0x03, 0x02))).toThrow(
      ModbusExceptionError
    );
  });
});
