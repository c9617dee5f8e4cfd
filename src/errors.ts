// src/errors.ts

import {
  describeException,
  exceptionKindFromCode,
  type ModbusExceptionKind,
} from './exception-codes.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

// --- Errors for Request Construction ---

/**
 * Base class for errors raised while building a request frame
 */
export class ModbusConstructionError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusConstructionError';
  }
}

/**
 * Error class for a function code outside the supported read set
 */
export class ModbusUnsupportedFunctionError extends ModbusConstructionError {
  functionCode: number;

  constructor(functionCode: number) {
    super(
      `Unsupported function code: ${String(functionCode)}. Supported codes are 0x01-0x04 (read functions).`
    );
    this.name = 'ModbusUnsupportedFunctionError';
    this.functionCode = functionCode;
  }
}

/**
 * Error class for a request field outside its allowed range
 */
export class ModbusOutOfRangeError extends ModbusConstructionError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusOutOfRangeError';
  }
}

/**
 * Error class for invalid starting address
 */
export class ModbusInvalidAddressError extends ModbusOutOfRangeError {
  constructor(address: number) {
    super(`Invalid starting address: ${String(address)}. Address must be between 0-65535.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

/**
 * Error class for invalid quantity (coil/register count)
 */
export class ModbusInvalidQuantityError extends ModbusOutOfRangeError {
  constructor(quantity: number, min: number, max: number) {
    super(`Invalid quantity: ${String(quantity)}. Must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

/**
 * Error class for invalid unit id
 */
export class ModbusInvalidUnitIdError extends ModbusOutOfRangeError {
  constructor(unitId: number) {
    super(`Invalid unit ID: ${String(unitId)}. Unit ID must be between 0-255.`);
    this.name = 'ModbusInvalidUnitIdError';
  }
}

/**
 * Error class for invalid transaction id
 */
export class ModbusInvalidTransactionIdError extends ModbusOutOfRangeError {
  constructor(transactionId: number) {
    super(
      `Invalid transaction ID: ${String(transactionId)}. Transaction ID must be between 0-65535.`
    );
    this.name = 'ModbusInvalidTransactionIdError';
  }
}

// --- Errors for Response Decoding ---

/**
 * Base class for responses that cannot be matched to the request or decoded
 */
export class ModbusProtocolError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ModbusProtocolError';
  }
}

/**
 * Error class for a response carrying another request's transaction id
 */
export class ModbusTransactionMismatchError extends ModbusProtocolError {
  received: number;
  expected: number;

  constructor(received: number, expected: number) {
    super(`Transaction ID mismatch: received ${received}, expected ${expected}`);
    this.name = 'ModbusTransactionMismatchError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for unexpected function code in response
 */
export class ModbusUnexpectedFunctionCodeError extends ModbusProtocolError {
  sent: number;
  received: number;

  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
    this.sent = sent;
    this.received = received;
  }
}

/**
 * Error class for a response whose lengths disagree with the request or with each other
 */
export class ModbusMalformedResponseError extends ModbusProtocolError {
  constructor(message: string) {
    super(`Malformed Modbus response: ${message}`);
    this.name = 'ModbusMalformedResponseError';
  }
}

// --- Server Exception Responses ---

/**
 * Error class for Modbus exception (function code | 0x80)
 */
export class ModbusExceptionError extends ModbusError {
  functionCode: number;
  exceptionCode: number;
  kind: ModbusExceptionKind;

  constructor(functionCode: number, exceptionCode: number) {
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${describeException(exceptionCode)})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
    this.kind = exceptionKindFromCode(exceptionCode);
  }
}

// --- Errors for Connection and Transport ---

/**
 * Base class for socket level failures
 */
export class ModbusTransportError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusTransportError';
  }
}

/**
 * Error class for Modbus timeout
 */
export class ModbusTimeoutError extends ModbusTransportError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

/**
 * Error class for connection refused
 */
export class ModbusConnectionRefusedError extends ModbusTransportError {
  constructor(host: string, port: number) {
    super(`Connection refused to ${host}:${port}`);
    this.name = 'ModbusConnectionRefusedError';
  }
}

/**
 * Error class for connection timeout
 */
export class ModbusConnectionTimeoutError extends ModbusTransportError {
  constructor(host: string, port: number, timeout: number) {
    super(`Connection timeout to ${host}:${port} after ${timeout}ms`);
    this.name = 'ModbusConnectionTimeoutError';
  }
}

/**
 * Error class for not connected
 */
export class ModbusNotConnectedError extends ModbusTransportError {
  constructor() {
    super('Not connected to Modbus device');
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Error class for a stream that ended before the expected bytes arrived
 */
export class ModbusInsufficientDataError extends ModbusTransportError {
  constructor(received: number, required: number) {
    super(`Insufficient data: received ${received} bytes, required ${required}`);
    this.name = 'ModbusInsufficientDataError';
  }
}

/**
 * Error class for buffer overflow
 */
export class ModbusBufferOverflowError extends ModbusTransportError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes exceeds maximum of ${max} bytes`);
    this.name = 'ModbusBufferOverflowError';
  }
}

// --- Errors for Configuration ---

/**
 * Error class for invalid client or transport configuration
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ModbusConfigError';
  }
}
