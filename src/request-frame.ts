// src/request-frame.ts

import {
  DEFAULT_TRANSACTION_ID,
  DEFAULT_UNIT_ID,
  ModbusFunctionCode,
  PROTOCOL_ID,
  RESPONSE_HEADER_LENGTH,
} from './constants/constants.js';
import {
  ModbusInvalidAddressError,
  ModbusInvalidQuantityError,
  ModbusInvalidTransactionIdError,
  ModbusInvalidUnitIdError,
  ModbusOutOfRangeError,
  ModbusUnsupportedFunctionError,
} from './errors.js';
import {
  buildReadRequestPdu,
  getReadFunction,
  isReadFunctionCode,
  responseByteCount,
} from './function-codes/read-functions.js';
import type { RequestFrame, RequestFrameParams } from './types/modbus-types.js';
import { buildMbapHeader } from './utils/tcp-utils.js';
import { concatUint8Arrays, isUint16, isUint8 } from './utils/utils.js';

function checkFunctionCode(functionCode: number): ModbusFunctionCode {
  if (!isReadFunctionCode(functionCode)) {
    throw new ModbusUnsupportedFunctionError(functionCode);
  }
  return functionCode;
}

function checkQuantity(functionCode: ModbusFunctionCode, quantity: number): void {
  const { minQuantity, maxQuantity } = getReadFunction(functionCode);
  if (!Number.isInteger(quantity) || quantity < minQuantity || quantity > maxQuantity) {
    throw new ModbusInvalidQuantityError(quantity, minQuantity, maxQuantity);
  }
}

/**
 * Collects request fields in any order. Each setter checks its own field;
 * `build()` checks the fields against each other, so the quantity is always
 * validated against the final function code.
 *
 * @example
 * const frame = new RequestFrameBuilder()
 *   .transactionId(123)
 *   .unitId(1)
 *   .functionCode(ModbusFunctionCode.READ_COILS)
 *   .startingAddress(0)
 *   .registerQuantity(8)
 *   .build();
 */
export class RequestFrameBuilder {
  private _transactionId: number = DEFAULT_TRANSACTION_ID;
  private _unitId: number = DEFAULT_UNIT_ID;
  private _functionCode: ModbusFunctionCode | undefined;
  private _startingAddress: number = 0;
  private _registerQuantity: number | undefined;

  transactionId(value: number): this {
    if (!isUint16(value)) throw new ModbusInvalidTransactionIdError(value);
    this._transactionId = value;
    return this;
  }

  unitId(value: number): this {
    if (!isUint8(value)) throw new ModbusInvalidUnitIdError(value);
    this._unitId = value;
    return this;
  }

  functionCode(value: number): this {
    this._functionCode = checkFunctionCode(value);
    return this;
  }

  startingAddress(value: number): this {
    if (!isUint16(value)) throw new ModbusInvalidAddressError(value);
    this._startingAddress = value;
    return this;
  }

  registerQuantity(value: number): this {
    if (!isUint16(value)) throw new ModbusInvalidQuantityError(value, 0, 0xffff);
    this._registerQuantity = value;
    return this;
  }

  build(): RequestFrame {
    if (this._functionCode === undefined) {
      throw new ModbusOutOfRangeError(
        'Function code must be set before the register quantity can be validated'
      );
    }
    if (this._registerQuantity === undefined) {
      const { minQuantity, maxQuantity } = getReadFunction(this._functionCode);
      throw new ModbusOutOfRangeError(
        `Register quantity is required (${minQuantity}-${maxQuantity} for function 0x${this._functionCode.toString(16).padStart(2, '0')})`
      );
    }
    checkQuantity(this._functionCode, this._registerQuantity);

    return Object.freeze({
      transactionId: this._transactionId,
      protocolId: PROTOCOL_ID,
      unitId: this._unitId,
      functionCode: this._functionCode,
      startingAddress: this._startingAddress,
      registerQuantity: this._registerQuantity,
    });
  }
}

/**
 * Validates a complete parameter set and returns an immutable request frame.
 */
export function createRequestFrame(params: RequestFrameParams): RequestFrame {
  const builder = new RequestFrameBuilder()
    .functionCode(params.functionCode)
    .startingAddress(params.startingAddress)
    .registerQuantity(params.registerQuantity);
  if (params.transactionId !== undefined) builder.transactionId(params.transactionId);
  if (params.unitId !== undefined) builder.unitId(params.unitId);
  return builder.build();
}

/**
 * Re-checks every field of a frame. Frames are plain objects, so one that did
 * not come from the builder gets the same checks before any byte is emitted.
 */
export function validateRequestFrame(frame: RequestFrame): void {
  const functionCode = checkFunctionCode(frame.functionCode);
  if (!isUint16(frame.transactionId)) throw new ModbusInvalidTransactionIdError(frame.transactionId);
  if (!isUint8(frame.unitId)) throw new ModbusInvalidUnitIdError(frame.unitId);
  if (!isUint16(frame.startingAddress)) throw new ModbusInvalidAddressError(frame.startingAddress);
  checkQuantity(functionCode, frame.registerQuantity);
}

/**
 * Serializes a frame into the Modbus TCP ADU:
 * MBAP header (7 bytes) + function code + starting address + quantity.
 */
export function buildRequest(frame: RequestFrame): Uint8Array {
  validateRequestFrame(frame);
  const pdu = buildReadRequestPdu(frame.functionCode, frame.startingAddress, frame.registerQuantity);
  const header = buildMbapHeader(frame.transactionId, frame.unitId, pdu.length);
  return concatUint8Arrays([header, pdu]);
}

/**
 * Size of a successful response to `frame`: MBAP header + function code
 * + byte count + data bytes.
 */
export function expectedResponseLength(frame: RequestFrame): number {
  validateRequestFrame(frame);
  return RESPONSE_HEADER_LENGTH + 1 + responseByteCount(frame.functionCode, frame.registerQuantity);
}
