// src/modbus-protocol.ts

import { MIN_RESPONSE_LENGTH, RESPONSE_HEADER_LENGTH } from './constants/constants.js';
import { rootLogger } from './logger.js';
import { buildRequest, expectedResponseLength } from './request-frame.js';
import { parseResponse, type ParseResult } from './response-parser.js';
import type { LoggerInstance, RequestFrame, Transport } from './types/modbus-types.js';
import { concatUint8Arrays } from './utils/utils.js';

/**
 * Runs one request/response exchange over a transport.
 *
 * Reads the 9 bytes every response starts with (a whole exception response),
 * then, when the function code echoes the request's, the rest of the length
 * predicted by the request. Transport errors reject unchanged; nothing is retried.
 */
export class ModbusProtocol {
  private _logger: LoggerInstance;

  constructor(
    private _transport: Transport,
    logger?: LoggerInstance
  ) {
    this._logger = logger ?? rootLogger.createLogger('ModbusProtocol');
  }

  public async exchange(frame: RequestFrame, timeout?: number): Promise<ParseResult> {
    const startTime = Date.now();
    const request = buildRequest(frame);
    const expectedLength = expectedResponseLength(frame);

    if (this._transport.flush) {
      await this._transport.flush();
    }

    await this._transport.write(request);

    const budget = timeout ?? this._transport.readTimeout;
    const head = await this._transport.read(MIN_RESPONSE_LENGTH, budget);
    let response = head;

    if (head[RESPONSE_HEADER_LENGTH - 1] === frame.functionCode) {
      const remaining = expectedLength - MIN_RESPONSE_LENGTH;
      if (remaining > 0) {
        const tail = await this._transport.read(
          remaining,
          budget === undefined ? undefined : Math.max(1, budget - (Date.now() - startTime))
        );
        response = concatUint8Arrays([head, tail]);
      }
    }

    this._logger.debug('Response received', {
      transactionId: frame.transactionId,
      unitId: frame.unitId,
      funcCode: frame.functionCode,
      responseTime: Date.now() - startTime,
    });

    return parseResponse(frame, response);
  }

  public get transport(): Transport {
    return this._transport;
  }
}
