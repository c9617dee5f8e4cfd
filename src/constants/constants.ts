// src/constants/constants.ts

/**
 * Modbus function codes handled by this client (read-only subset)
 */
export enum ModbusFunctionCode {
  READ_COILS = 0x01,
  READ_DISCRETE_INPUTS = 0x02,
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
}

/**
 * Modbus exception codes reported by a server in an exception response
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 0x01,
  ILLEGAL_DATA_ADDRESS = 0x02,
  ILLEGAL_DATA_VALUE = 0x03,
  SERVER_DEVICE_FAILURE = 0x04,
  ACKNOWLEDGE = 0x05,
  SERVER_DEVICE_BUSY = 0x06,
  NEGATIVE_ACKNOWLEDGE = 0x07,
  MEMORY_PARITY_ERROR = 0x08,
  GATEWAY_PATH_UNAVAILABLE = 0x0a,
  GATEWAY_TARGET_DEVICE_FAILED = 0x0b,
}

/** Set on the echoed function code of an exception response */
export const EXCEPTION_FLAG = 0x80;

export const PROTOCOL_ID = 0;

/** Transaction ID + Protocol ID + Length + Unit ID */
export const MBAP_HEADER_LENGTH = 7;

/** MBAP header + function code */
export const RESPONSE_HEADER_LENGTH = 8;

/** Smallest response worth parsing: header + exception code (or byte count) */
export const MIN_RESPONSE_LENGTH = 9;

export const DEFAULT_TCP_PORT = 502;
export const DEFAULT_TIMEOUT = 1000;
export const DEFAULT_UNIT_ID = 1;
export const DEFAULT_TRANSACTION_ID = 1;
