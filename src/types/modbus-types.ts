// src/types/modbus-types.ts

import type { ModbusFunctionCode } from '../constants/constants.js';
import type { ModbusExceptionError, ModbusProtocolError } from '../errors.js';

// !=============================================================================
// ! Request frame
// !=============================================================================

/** Function codes whose responses carry bit-packed values */
export type BitFunctionCode =
  | ModbusFunctionCode.READ_COILS
  | ModbusFunctionCode.READ_DISCRETE_INPUTS;

/** Function codes whose responses carry 16-bit registers */
export type WordFunctionCode =
  | ModbusFunctionCode.READ_HOLDING_REGISTERS
  | ModbusFunctionCode.READ_INPUT_REGISTERS;

/** Parameters supplied by the caller for one read request */
export interface RequestFrameParams {
  transactionId?: number;
  unitId?: number;
  functionCode: number;
  startingAddress: number;
  registerQuantity: number;
}

/** Validated, immutable read request */
export interface RequestFrame {
  readonly transactionId: number;
  readonly protocolId: 0;
  readonly unitId: number;
  readonly functionCode: ModbusFunctionCode;
  readonly startingAddress: number;
  readonly registerQuantity: number;
}

// !=============================================================================
// ! Response
// !=============================================================================

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  length: number;
  unitId: number;
}

export type ReadCoilsResponse = boolean[];
export type ReadDiscreteInputsResponse = boolean[];
export type ReadHoldingRegistersResponse = number[];
export type ReadInputRegistersResponse = number[];

/** Register values decoded from a successful response */
export type DecodedRegisters =
  | { type: 'bits'; functionCode: BitFunctionCode; values: boolean[] }
  | { type: 'words'; functionCode: WordFunctionCode; values: number[] };

/** A successful response, decoded against its request */
export interface ParsedResponse extends MbapHeader {
  functionCode: ModbusFunctionCode;
  byteCount: number;
  payload: Uint8Array;
  registers: DecodedRegisters;
}

/** Either a server-reported exception or a response that does not fit the request */
export type ModbusResponseFault = ModbusExceptionError | ModbusProtocolError;

// !=============================================================================
// ! Transport
// !=============================================================================

/** Byte stream consumed by the protocol layer */
export interface Transport {
  readonly isOpen: boolean;
  /** Default for `read` when no timeout is passed */
  readonly readTimeout?: number;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /** Resolves with exactly `length` bytes or rejects */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  readTimeout?: number;
  writeTimeout?: number;
  maxBufferSize?: number;
  logger?: LoggerInstance;
}

// !=============================================================================
// ! Client
// !=============================================================================

export interface ModbusClientOptions {
  unitId?: number;
  /** Response timeout per request; the transport's read timeout when unset */
  timeout?: number;
  logger?: LoggerInstance;
}

/** Per-call overrides for the client read helpers */
export interface ReadOptions {
  transactionId?: number;
  unitId?: number;
  timeout?: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  address?: number;
  quantity?: number;
  transactionId?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}
