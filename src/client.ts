// src/client.ts

import { Mutex } from 'async-mutex';
import { isErr, unwrapErr, unwrapOk } from 'option-t/plain_result';
import { DEFAULT_UNIT_ID, ModbusFunctionCode } from './constants/constants.js';
import { ModbusExceptionError, ModbusInvalidUnitIdError, ModbusUnexpectedFunctionCodeError } from './errors.js';
import { rootLogger } from './logger.js';
import { ModbusProtocol } from './modbus-protocol.js';
import { createRequestFrame } from './request-frame.js';
import type { ParseResult } from './response-parser.js';
import type {
  DecodedRegisters,
  LoggerInstance,
  ModbusClientOptions,
  ReadCoilsResponse,
  ReadDiscreteInputsResponse,
  ReadHoldingRegistersResponse,
  ReadInputRegistersResponse,
  ReadOptions,
  RequestFrameParams,
  Transport,
} from './types/modbus-types.js';
import { TransactionCounter } from './utils/tcp-utils.js';
import { isUint8 } from './utils/utils.js';

/**
 * Modbus TCP client for the read function codes.
 *
 * The client does not own the connection: connect and disconnect the
 * transport yourself. Calls are serialized, one exchange at a time.
 */
export class ModbusTcpClient {
  private protocol: ModbusProtocol;
  private unitId: number;
  private defaultTimeout: number | undefined;
  private logger: LoggerInstance;
  private transactions: TransactionCounter = new TransactionCounter();
  private _mutex: Mutex = new Mutex();

  constructor(transport: Transport, options: ModbusClientOptions = {}) {
    const unitId = options.unitId ?? DEFAULT_UNIT_ID;
    if (!isUint8(unitId)) {
      throw new ModbusInvalidUnitIdError(unitId);
    }
    this.unitId = unitId;
    this.defaultTimeout = options.timeout;
    this.logger = options.logger ?? rootLogger.createLogger('ModbusTcpClient');
    this.protocol = new ModbusProtocol(transport, this.logger);
  }

  public get transport(): Transport {
    return this.protocol.transport;
  }

  /**
   * Sends one read request and returns the tagged outcome: decoded registers,
   * or the server exception / protocol fault. Construction and transport
   * errors are thrown.
   */
  public async execute(
    params: Omit<RequestFrameParams, 'transactionId' | 'unitId'> & ReadOptions
  ): Promise<ParseResult> {
    const release = await this._mutex.acquire();
    try {
      const frame = createRequestFrame({
        functionCode: params.functionCode,
        startingAddress: params.startingAddress,
        registerQuantity: params.registerQuantity,
        unitId: params.unitId ?? this.unitId,
        transactionId: params.transactionId ?? this.transactions.next(),
      });
      const context = {
        transactionId: frame.transactionId,
        unitId: frame.unitId,
        funcCode: frame.functionCode,
        address: frame.startingAddress,
        quantity: frame.registerQuantity,
      };

      this.logger.debug('Sending request', context);
      const result = await this.protocol.exchange(frame, params.timeout ?? this.defaultTimeout);

      if (isErr(result)) {
        const fault = unwrapErr(result);
        const exceptionCode = fault instanceof ModbusExceptionError ? fault.exceptionCode : undefined;
        this.logger.warn(fault.message, { ...context, exceptionCode });
      }
      return result;
    } finally {
      release();
    }
  }

  private async _read(
    functionCode: ModbusFunctionCode,
    startAddress: number,
    quantity: number,
    options: ReadOptions
  ): Promise<DecodedRegisters> {
    const result = await this.execute({
      ...options,
      functionCode,
      startingAddress: startAddress,
      registerQuantity: quantity,
    });
    if (isErr(result)) {
      throw unwrapErr(result);
    }
    return unwrapOk(result).registers;
  }

  private async _readBits(
    functionCode: ModbusFunctionCode,
    startAddress: number,
    quantity: number,
    options: ReadOptions
  ): Promise<boolean[]> {
    const registers = await this._read(functionCode, startAddress, quantity, options);
    if (registers.type !== 'bits') {
      throw new ModbusUnexpectedFunctionCodeError(functionCode, registers.functionCode);
    }
    return registers.values;
  }

  private async _readWords(
    functionCode: ModbusFunctionCode,
    startAddress: number,
    quantity: number,
    options: ReadOptions
  ): Promise<number[]> {
    const registers = await this._read(functionCode, startAddress, quantity, options);
    if (registers.type !== 'words') {
      throw new ModbusUnexpectedFunctionCodeError(functionCode, registers.functionCode);
    }
    return registers.values;
  }

  public async readCoils(
    startAddress: number,
    quantity: number,
    options: ReadOptions = {}
  ): Promise<ReadCoilsResponse> {
    return this._readBits(ModbusFunctionCode.READ_COILS, startAddress, quantity, options);
  }

  public async readDiscreteInputs(
    startAddress: number,
    quantity: number,
    options: ReadOptions = {}
  ): Promise<ReadDiscreteInputsResponse> {
    return this._readBits(ModbusFunctionCode.READ_DISCRETE_INPUTS, startAddress, quantity, options);
  }

  public async readHoldingRegisters(
    startAddress: number,
    quantity: number,
    options: ReadOptions = {}
  ): Promise<ReadHoldingRegistersResponse> {
    return this._readWords(ModbusFunctionCode.READ_HOLDING_REGISTERS, startAddress, quantity, options);
  }

  public async readInputRegisters(
    startAddress: number,
    quantity: number,
    options: ReadOptions = {}
  ): Promise<ReadInputRegistersResponse> {
    return this._readWords(ModbusFunctionCode.READ_INPUT_REGISTERS, startAddress, quantity, options);
  }
}
