// src/exception-codes.ts

import { ModbusExceptionCode } from './constants/constants.js';

export type ModbusExceptionKind =
  | 'IllegalFunction'
  | 'IllegalDataAddress'
  | 'IllegalDataValue'
  | 'ServerDeviceFailure'
  | 'Acknowledge'
  | 'ServerDeviceBusy'
  | 'NegativeAcknowledge'
  | 'MemoryParityError'
  | 'GatewayPathUnavailable'
  | 'GatewayTargetDeviceFailedToRespond'
  | 'UnknownException';

const EXCEPTION_KINDS = new Map<number, ModbusExceptionKind>([
  [ModbusExceptionCode.ILLEGAL_FUNCTION, 'IllegalFunction'],
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS, 'IllegalDataAddress'],
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE, 'IllegalDataValue'],
  [ModbusExceptionCode.SERVER_DEVICE_FAILURE, 'ServerDeviceFailure'],
  [ModbusExceptionCode.ACKNOWLEDGE, 'Acknowledge'],
  [ModbusExceptionCode.SERVER_DEVICE_BUSY, 'ServerDeviceBusy'],
  [ModbusExceptionCode.NEGATIVE_ACKNOWLEDGE, 'NegativeAcknowledge'],
  [ModbusExceptionCode.MEMORY_PARITY_ERROR, 'MemoryParityError'],
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE, 'GatewayPathUnavailable'],
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED, 'GatewayTargetDeviceFailedToRespond'],
]);

export const MODBUS_EXCEPTION_MESSAGES: Readonly<Record<ModbusExceptionKind, string>> = {
  IllegalFunction:
    'Illegal Function: the function code received in the query is not an allowable action for the server',
  IllegalDataAddress:
    'Illegal Data Address: the data address received in the query is not an allowable address for the server',
  IllegalDataValue:
    'Illegal Data Value: a value contained in the query data field is not an allowable value for the server',
  ServerDeviceFailure:
    'Server Device Failure: an unrecoverable error occurred while the server was attempting to perform the requested action',
  Acknowledge:
    'Acknowledge: the server has accepted the request and is processing it, but a long duration of time will be required',
  ServerDeviceBusy:
    'Server Device Busy: the server is engaged in processing a long-duration program command',
  NegativeAcknowledge:
    'Negative Acknowledge: the server cannot perform the program function received in the query',
  MemoryParityError:
    'Memory Parity Error: the server attempted to read extended memory or a record file, but detected a parity error',
  GatewayPathUnavailable:
    'Gateway Path Unavailable: the gateway was unable to allocate an internal communication path',
  GatewayTargetDeviceFailedToRespond:
    'Gateway Target Device Failed to Respond: no response was obtained from the target device',
  UnknownException: 'Unknown exception code',
};

/**
 * Maps a raw exception byte to its kind. Codes outside the table map to `UnknownException`.
 */
export function exceptionKindFromCode(code: number): ModbusExceptionKind {
  return EXCEPTION_KINDS.get(code) ?? 'UnknownException';
}

export function describeException(code: number): string {
  const kind = exceptionKindFromCode(code);
  if (kind === 'UnknownException') {
    return `${MODBUS_EXCEPTION_MESSAGES.UnknownException} 0x${code.toString(16).padStart(2, '0')}`;
  }
  return MODBUS_EXCEPTION_MESSAGES[kind];
}
