// src/response-parser.ts

import { createErr, createOk, isErr, type Result, unwrapErr, unwrapOk } from 'option-t/plain_result';
import {
  EXCEPTION_FLAG,
  MIN_RESPONSE_LENGTH,
  PROTOCOL_ID,
  RESPONSE_HEADER_LENGTH,
} from './constants/constants.js';
import {
  ModbusExceptionError,
  ModbusMalformedResponseError,
  ModbusTransactionMismatchError,
  ModbusUnexpectedFunctionCodeError,
} from './errors.js';
import {
  isBitFunctionCode,
  isWordFunctionCode,
  responseByteCount,
  unpackBits,
  unpackRegisters,
} from './function-codes/read-functions.js';
import type {
  DecodedRegisters,
  ModbusResponseFault,
  ParsedResponse,
  RequestFrame,
} from './types/modbus-types.js';
import { validateRequestFrame } from './request-frame.js';
import { parseMbapHeader } from './utils/tcp-utils.js';
import { sliceUint8Array } from './utils/utils.js';

export type ParseResult = Result<ParsedResponse, ModbusResponseFault>;

function decodeRegisters(frame: RequestFrame, data: Uint8Array): DecodedRegisters {
  const { functionCode, registerQuantity } = frame;
  if (isBitFunctionCode(functionCode)) {
    return { type: 'bits', functionCode, values: unpackBits(data, registerQuantity) };
  }
  if (isWordFunctionCode(functionCode)) {
    return { type: 'words', functionCode, values: unpackRegisters(data, registerQuantity) };
  }
  throw new ModbusUnexpectedFunctionCodeError(frame.functionCode, functionCode);
}

/**
 * Validates a raw response against the request that produced it and decodes
 * the registers.
 *
 * Never throws for a bad response: a server exception or a response that does
 * not match the request comes back as the error side of the result. An invalid
 * frame throws the same construction errors as `buildRequest`.
 * A response carrying another transaction id is reported as
 * `ModbusTransactionMismatchError`, not dropped.
 */
export function parseResponse(frame: RequestFrame, response: Uint8Array): ParseResult {
  validateRequestFrame(frame);

  if (response.length < MIN_RESPONSE_LENGTH) {
    return createErr(
      new ModbusMalformedResponseError(
        `expected at least ${MIN_RESPONSE_LENGTH} bytes, got ${response.length}`
      )
    );
  }

  const header = parseMbapHeader(response);

  if (header.transactionId !== frame.transactionId) {
    return createErr(new ModbusTransactionMismatchError(header.transactionId, frame.transactionId));
  }

  if (header.protocolId !== PROTOCOL_ID) {
    return createErr(new ModbusMalformedResponseError(`invalid protocol ID ${header.protocolId}`));
  }

  const functionCode = response[RESPONSE_HEADER_LENGTH - 1];

  if (functionCode === (frame.functionCode | EXCEPTION_FLAG)) {
    return createErr(new ModbusExceptionError(frame.functionCode, response[RESPONSE_HEADER_LENGTH]));
  }

  if (functionCode !== frame.functionCode) {
    return createErr(new ModbusUnexpectedFunctionCodeError(frame.functionCode, functionCode));
  }

  const byteCount = response[RESPONSE_HEADER_LENGTH];
  const expectedByteCount = responseByteCount(frame.functionCode, frame.registerQuantity);

  if (byteCount !== expectedByteCount) {
    return createErr(
      new ModbusMalformedResponseError(
        `byte count ${byteCount} does not match ${expectedByteCount} expected for quantity ${frame.registerQuantity}`
      )
    );
  }

  // Length covers unit id + function code + byte count + data
  if (header.length !== byteCount + 3) {
    return createErr(
      new ModbusMalformedResponseError(
        `MBAP length ${header.length} does not match byte count ${byteCount}`
      )
    );
  }

  const dataStart = RESPONSE_HEADER_LENGTH + 1;
  if (response.length < dataStart + byteCount) {
    return createErr(
      new ModbusMalformedResponseError(
        `expected ${dataStart + byteCount} bytes, got ${response.length}`
      )
    );
  }

  const payload = sliceUint8Array(response, dataStart, dataStart + byteCount);

  return createOk({
    ...header,
    functionCode: frame.functionCode,
    byteCount,
    payload,
    registers: decodeRegisters(frame, payload),
  });
}

/**
 * Throwing form of {@link parseResponse}: returns the decoded registers or
 * throws the fault.
 */
export function decodeResponse(frame: RequestFrame, response: Uint8Array): DecodedRegisters {
  const result = parseResponse(frame, response);
  if (isErr(result)) {
    throw unwrapErr(result);
  }
  return unwrapOk(result).registers;
}
