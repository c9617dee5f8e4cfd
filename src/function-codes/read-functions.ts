// src/function-codes/read-functions.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { BitFunctionCode, WordFunctionCode } from '../types/modbus-types.js';
import { bytesToUint16BE, concatUint8Arrays, uint16ToBytesBE } from '../utils/utils.js';

/**
 * Request limits and response layout for one read function code
 */
export interface ReadFunctionDescriptor {
  code: ModbusFunctionCode;
  name: string;
  dataType: 'bits' | 'words';
  minQuantity: number;
  maxQuantity: number;
}

const READ_FUNCTIONS: Readonly<Record<ModbusFunctionCode, ReadFunctionDescriptor>> = {
  [ModbusFunctionCode.READ_COILS]: {
    code: ModbusFunctionCode.READ_COILS,
    name: 'READ_COILS',
    dataType: 'bits',
    minQuantity: 1,
    maxQuantity: 2000,
  },
  [ModbusFunctionCode.READ_DISCRETE_INPUTS]: {
    code: ModbusFunctionCode.READ_DISCRETE_INPUTS,
    name: 'READ_DISCRETE_INPUTS',
    dataType: 'bits',
    minQuantity: 1,
    maxQuantity: 2000,
  },
  [ModbusFunctionCode.READ_HOLDING_REGISTERS]: {
    code: ModbusFunctionCode.READ_HOLDING_REGISTERS,
    name: 'READ_HOLDING_REGISTERS',
    dataType: 'words',
    minQuantity: 1,
    maxQuantity: 125,
  },
  [ModbusFunctionCode.READ_INPUT_REGISTERS]: {
    code: ModbusFunctionCode.READ_INPUT_REGISTERS,
    name: 'READ_INPUT_REGISTERS',
    dataType: 'words',
    minQuantity: 1,
    maxQuantity: 125,
  },
};

export function isReadFunctionCode(code: number): code is ModbusFunctionCode {
  return (
    code === ModbusFunctionCode.READ_COILS ||
    code === ModbusFunctionCode.READ_DISCRETE_INPUTS ||
    code === ModbusFunctionCode.READ_HOLDING_REGISTERS ||
    code === ModbusFunctionCode.READ_INPUT_REGISTERS
  );
}

export function isBitFunctionCode(code: ModbusFunctionCode): code is BitFunctionCode {
  return READ_FUNCTIONS[code].dataType === 'bits';
}

export function isWordFunctionCode(code: ModbusFunctionCode): code is WordFunctionCode {
  return READ_FUNCTIONS[code].dataType === 'words';
}

export function getReadFunction(code: ModbusFunctionCode): ReadFunctionDescriptor {
  return READ_FUNCTIONS[code];
}

/** Name of a function code for logs, `UNKNOWN` outside the read set */
export function functionCodeName(code: number): string {
  return isReadFunctionCode(code) ? READ_FUNCTIONS[code].name : 'UNKNOWN';
}

/**
 * Builds a read request PDU: function code + starting address + quantity (big-endian)
 */
export function buildReadRequestPdu(
  functionCode: ModbusFunctionCode,
  startAddress: number,
  quantity: number
): Uint8Array {
  return concatUint8Arrays([
    Uint8Array.of(functionCode),
    uint16ToBytesBE(startAddress),
    uint16ToBytesBE(quantity),
  ]);
}

/**
 * Number of data bytes a response carries for `quantity` items (the byte count field)
 */
export function responseByteCount(functionCode: ModbusFunctionCode, quantity: number): number {
  return isBitFunctionCode(functionCode) ? Math.ceil(quantity / 8) : quantity * 2;
}

/**
 * Unpacks `quantity` bits, least significant bit first within each byte,
 * bytes in ascending order. Padding bits in the last byte are ignored.
 */
export function unpackBits(data: Uint8Array, quantity: number): boolean[] {
  const result: boolean[] = new Array<boolean>(quantity);
  for (let i = 0; i < quantity; i++) {
    result[i] = ((data[i >> 3] >> (i & 7)) & 1) === 1;
  }
  return result;
}

/**
 * Reads `quantity` consecutive big-endian 16-bit registers.
 */
export function unpackRegisters(data: Uint8Array, quantity: number): number[] {
  const registers: number[] = new Array<number>(quantity);
  for (let i = 0; i < quantity; i++) {
    registers[i] = bytesToUint16BE(data, i * 2);
  }
  return registers;
}
