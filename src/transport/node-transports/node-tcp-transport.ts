// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { DEFAULT_TIMEOUT } from '../../constants/constants.js';
import {
  ModbusBufferOverflowError,
  ModbusConnectionRefusedError,
  ModbusConnectionTimeoutError,
  ModbusInsufficientDataError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from '../../errors.js';
import { rootLogger } from '../../logger.js';
import type {
  LoggerInstance,
  NodeTcpTransportOptions,
  Transport,
} from '../../types/modbus-types.js';
import { allocUint8Array, concatUint8Arrays, toHex } from '../../utils/utils.js';

interface PendingRead {
  length: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Modbus TCP byte stream over a Node.js socket.
 *
 * `read(length)` resolves only with exactly `length` bytes: a socket that
 * closes first rejects with `ModbusInsufficientDataError`, a silent one with
 * `ModbusTimeoutError`. The transport never reconnects.
 */
export class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  public readonly host: string;
  public readonly port: number;
  private options: Required<Omit<NodeTcpTransportOptions, 'logger'>>;
  private logger: LoggerInstance;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private pendingRead: PendingRead | null = null;
  private _isDisconnecting: boolean = false;
  private _connecting: Promise<void> | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      connectTimeout: options.connectTimeout ?? DEFAULT_TIMEOUT,
      readTimeout: options.readTimeout ?? DEFAULT_TIMEOUT,
      writeTimeout: options.writeTimeout ?? DEFAULT_TIMEOUT,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
    this.logger = options.logger ?? rootLogger.createLogger('NodeTcpTransport');
  }

  /**
   * Opens the socket. Calls made while a connect is in flight share its outcome.
   */
  public async connect(): Promise<void> {
    if (this.isOpen) return;
    if (!this._connecting) {
      this._connecting = this._openSocket().finally(() => {
        this._connecting = null;
      });
    }
    return this._connecting;
  }

  private _openSocket(): Promise<void> {
    const { host, port } = this;
    const timeout = this.options.connectTimeout;
    this.logger.debug(`Connecting to ${host}:${port}...`);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const socket = new net.Socket();
      this.socket = socket;

      const fail = (err: Error): void => {
        settled = true;
        clearTimeout(timer);
        this.socket = null;
        socket.destroy();
        this.logger.error(`Connection to ${host}:${port} failed: ${err.message}`);
        reject(err);
      };

      const timer = setTimeout(() => {
        if (!settled) fail(new ModbusConnectionTimeoutError(host, port, timeout));
      }, timeout);

      socket.on('data', (data: Buffer) => this._onData(data));
      socket.on('close', () => this._onClose(socket));
      socket.on('error', (err: NodeJS.ErrnoException) => {
        if (!settled) {
          fail(err.code === 'ECONNREFUSED' ? new ModbusConnectionRefusedError(host, port) : err);
          return;
        }
        this._onError(err);
      });

      socket.connect({ host, port }, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.isOpen = true;
        socket.setNoDelay(true);
        this.logger.info(`Connected to ${host}:${port}`);
        resolve();
      });
    });
  }

  private _onData(data: Uint8Array): void {
    this.logger.trace(`<<< ${toHex(data, ' ')}`);
    const size = this.readBuffer.length + data.length;
    if (size > this.options.maxBufferSize) {
      this.readBuffer = allocUint8Array(0);
      this._rejectPending(new ModbusBufferOverflowError(size, this.options.maxBufferSize));
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, data]);
    this._drain();
  }

  private _onError(err: Error): void {
    this.logger.error(`Socket error: ${err.message}`);
    this._rejectPending(err);
  }

  private _onClose(socket: net.Socket): void {
    if (this.socket !== socket) return;
    const wasOpen = this.isOpen;
    this.isOpen = false;
    this.socket = null;
    if (wasOpen && !this._isDisconnecting) {
      this.logger.warn(`Connection closed for ${this.host}:${this.port}`);
    }
    if (this.pendingRead) {
      this._rejectPending(
        new ModbusInsufficientDataError(this.readBuffer.length, this.pendingRead.length)
      );
    }
  }

  private _take(length: number): Uint8Array {
    const data = this.readBuffer.slice(0, length);
    this.readBuffer = this.readBuffer.slice(length);
    return data;
  }

  private _drain(): void {
    const pending = this.pendingRead;
    if (pending && this.readBuffer.length >= pending.length) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.resolve(this._take(pending.length));
    }
  }

  private _rejectPending(err: Error): void {
    const pending = this.pendingRead;
    if (!pending) return;
    this.pendingRead = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }

  public async write(buffer: Uint8Array): Promise<void> {
    return this._operationMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.socket;
          if (!this.isOpen || !socket) {
            reject(new ModbusNotConnectedError());
            return;
          }
          const timer = setTimeout(() => {
            reject(new ModbusTimeoutError(`Write timeout after ${this.options.writeTimeout}ms`));
          }, this.options.writeTimeout);

          this.logger.trace(`>>> ${toHex(buffer, ' ')}`);
          socket.write(buffer, err => {
            clearTimeout(timer);
            if (err) reject(err);
            else resolve();
          });
        })
    );
  }

  public get readTimeout(): number {
    return this.options.readTimeout;
  }

  public async read(
    length: number,
    timeout: number = this.options.readTimeout
  ): Promise<Uint8Array> {
    return this._operationMutex.runExclusive(
      () =>
        new Promise<Uint8Array>((resolve, reject) => {
          if (this.readBuffer.length >= length) {
            resolve(this._take(length));
            return;
          }
          if (!this.isOpen) {
            reject(new ModbusNotConnectedError());
            return;
          }
          const timer = setTimeout(() => {
            const received = this.readBuffer.length;
            this.pendingRead = null;
            reject(
              new ModbusTimeoutError(
                `Read timeout after ${timeout}ms: received ${received} of ${length} bytes`
              )
            );
          }, timeout);
          this.pendingRead = { length, resolve, reject, timer };
        })
    );
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this._isDisconnecting = true;
    try {
      await new Promise<void>(resolve => {
        socket.once('close', () => resolve());
        socket.destroy();
      });
    } finally {
      this._isDisconnecting = false;
    }
    this.logger.debug(`Disconnected from ${this.host}:${this.port}`);
  }

  public async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
  }
}
