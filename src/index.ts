// src/index.ts

export { ModbusTcpClient } from './client.js';
export { ModbusProtocol } from './modbus-protocol.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export {
  RequestFrameBuilder,
  buildRequest,
  createRequestFrame,
  expectedResponseLength,
  validateRequestFrame,
} from './request-frame.js';
export { decodeResponse, parseResponse, type ParseResult } from './response-parser.js';
export {
  MODBUS_EXCEPTION_MESSAGES,
  describeException,
  exceptionKindFromCode,
  type ModbusExceptionKind,
} from './exception-codes.js';
export {
  functionCodeName,
  getReadFunction,
  isReadFunctionCode,
  type ReadFunctionDescriptor,
} from './function-codes/read-functions.js';
export { ModbusExceptionCode, ModbusFunctionCode, DEFAULT_TCP_PORT } from './constants/constants.js';
export * from './errors.js';
export { Logger, rootLogger } from './logger.js';
export { loadConfig, type ModbusConnectionConfig } from './config.js';
export type * from './types/modbus-types.js';
