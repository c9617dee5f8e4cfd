// src/utils/tcp-utils.ts

import { MBAP_HEADER_LENGTH, PROTOCOL_ID } from '../constants/constants.js';
import type { MbapHeader } from '../types/modbus-types.js';

/**
 * Transaction ID generator (1-65535, wraps around and skips 0)
 */
export class TransactionCounter {
  private _currentId: number;

  constructor(start: number = 0) {
    this._currentId = start;
  }

  next(): number {
    this._currentId = (this._currentId % 0xffff) + 1;
    return this._currentId;
  }

  get current(): number {
    return this._currentId;
  }
}

/**
 * Builds the 7-byte MBAP header
 * @param transactionId - Transaction ID (2 bytes)
 * @param unitId - Unit ID (1 byte)
 * @param pduLength - PDU length (function code + data); Length field = PDU + Unit ID
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(MBAP_HEADER_LENGTH);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false);
  view.setUint16(2, PROTOCOL_ID, false);
  view.setUint16(4, pduLength + 1, false);
  view.setUint8(6, unitId);

  return header;
}

/**
 * Reads the MBAP header. The caller guarantees at least 7 bytes.
 */
export function parseMbapHeader(data: Uint8Array): MbapHeader {
  const view = new DataView(data.buffer, data.byteOffset, MBAP_HEADER_LENGTH);
  return {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
    unitId: view.getUint8(6),
  };
}
