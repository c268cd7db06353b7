// src/client.ts

import { Mutex } from 'async-mutex';
import {
  MODBUS_TCP_PORT,
  ModbusConnectionMode,
  ModbusResponseCode,
} from './constants/constants.js';
import { ModbusConfigError, ModbusInvalidAddressError } from './errors.js';
import { TcpFramer } from './framers/tcp-framer.js';
import { modbusLogger } from './logger.js';
import { describeResponseCode } from './request/modbus-request.js';
import type { ModbusRequest } from './request/modbus-request.js';
import {
  readCoilsRequest,
  readDiscreteInputsRequest,
  readHoldingRegistersRequest,
  readInputRegistersRequest,
  writeMultipleCoilsRequest,
  writeMultipleRegistersRequest,
  writeSingleCoilRequest,
  writeSingleRegisterRequest,
} from './request/requests.js';
import { TcpResponse } from './tcp-response.js';
import { discover } from './transport/discovery.js';
import NodeTcpTransport from './transport/node-transports/node-tcp-transport.js';
import type {
  DiscoverOptions,
  LogLevel,
  ModbusRequestOptions,
  ModbusResult,
  ModbusTcpClientOptions,
  ReadBitsResponse,
  ReadRegistersResponse,
  Transport,
  WriteMultipleResponse,
  WriteSingleCoilResponse,
  WriteSingleRegisterResponse,
} from './types/modbus-types.js';
import { TransactionCounter } from './utils/tcp-utils.js';

const logger = modbusLogger.createLogger('ModbusTcpClient');

const DEFAULT_CONNECTION_TIMEOUT = 3000;
const DEFAULT_RESPONSE_TIMEOUT = 3000;
const DEFAULT_UNIT_ID = 0;

function validateTimeout(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ModbusConfigError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
}

/**
 * Modbus TCP client. One exchange (connect, send, wait for reply or timeout)
 * runs at a time; concurrent send() calls queue on a mutex in arrival order.
 */
class ModbusTcpClient {
  public readonly serverAddress: string;
  public readonly serverPort: number;
  public readonly connectionMode: ModbusConnectionMode;
  public readonly connectionTimeout: number;
  public readonly responseTimeout: number;
  public readonly delayAfterConnect?: number;
  public readonly unitId: number;

  private readonly _transport: Transport;
  private readonly _framer: TcpFramer = new TcpFramer();
  private readonly _transactions: TransactionCounter = new TransactionCounter();
  private readonly _mutex: Mutex = new Mutex();
  private _currentResponse: TcpResponse | null = null;

  constructor(serverAddress: string, options: ModbusTcpClientOptions = {}) {
    if (!serverAddress) {
      throw new ModbusConfigError('Server address is required');
    }
    const serverPort = options.serverPort ?? MODBUS_TCP_PORT;
    if (!Number.isInteger(serverPort) || serverPort < 1 || serverPort > 65535) {
      throw new ModbusConfigError(`Invalid server port: ${serverPort}`);
    }
    const unitId = options.unitId ?? DEFAULT_UNIT_ID;
    if (!Number.isInteger(unitId) || unitId < 0 || unitId > 255) {
      throw new ModbusInvalidAddressError(unitId);
    }
    const connectionTimeout = options.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT;
    validateTimeout('connectionTimeout', connectionTimeout);
    const responseTimeout = options.responseTimeout ?? DEFAULT_RESPONSE_TIMEOUT;
    validateTimeout('responseTimeout', responseTimeout);
    const delayAfterConnect = options.delayAfterConnect;
    if (
      delayAfterConnect !== undefined &&
      (!Number.isFinite(delayAfterConnect) || delayAfterConnect < 0)
    ) {
      throw new ModbusConfigError(`Invalid delayAfterConnect: ${delayAfterConnect}`);
    }

    this.serverAddress = serverAddress;
    this.serverPort = serverPort;
    this.connectionMode =
      options.connectionMode ?? ModbusConnectionMode.AUTO_CONNECT_AND_KEEP_CONNECTED;
    this.connectionTimeout = connectionTimeout;
    this.responseTimeout = responseTimeout;
    this.delayAfterConnect = delayAfterConnect;
    this.unitId = unitId;

    if (options.logLevel) {
      this.enableLogger(options.logLevel);
    }

    this._transport = new NodeTcpTransport(serverAddress, serverPort, {
      connectionTimeout,
      delayAfterConnect,
    });
    this._transport.setDataHandler(chunk => this._onData(chunk));
    this._transport.setConnectionLostHandler(reason => this._onConnectionLost(reason));
  }

  /**
   * Scans `a.b.c.x` upwards from `startAddress` for a listening Modbus TCP server.
   */
  static discover(startAddress: string, options?: DiscoverOptions): Promise<string | null> {
    return discover(startAddress, options);
  }

  get isConnected(): boolean {
    return this._transport.isOpen;
  }

  /**
   * Enables the library logger
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    modbusLogger.setLevel(level);
  }

  /**
   * Disables the library logger (sets the highest level - error)
   */
  disableLogger(): void {
    modbusLogger.setLevel('error');
  }

  getResponseTimeout(request: ModbusRequest<unknown>): number {
    return request.responseTimeout ?? this.responseTimeout;
  }

  getUnitId(request: ModbusRequest<unknown>): number {
    return request.unitId ?? this.unitId;
  }

  /**
   * Opens the connection if needed. Resolves to the connection state, never rejects.
   */
  public connect(): Promise<boolean> {
    return this._transport.connect();
  }

  /**
   * Closes the connection. A pending exchange is resolved as REQUEST_RX_FAILED.
   */
  public async disconnect(): Promise<void> {
    await this._transport.disconnect();
    this._currentResponse?.abort('disconnected by client');
  }

  /**
   * Sends the request and waits for its outcome. Never rejects: every failure
   * is reported as a response code, the decoded reply is on `request.value`.
   *
   * In AUTO_CONNECT_AND_DISCONNECT mode the connection is closed after the
   * exchange unless another send() is already queued behind it; then the
   * connection stays open for that exchange and the last send() of the queue
   * closes it. `isConnected` is false after a send() that nothing followed.
   */
  public async send(request: ModbusRequest<unknown>): Promise<ModbusResponseCode> {
    const release = await this._mutex.acquire();
    let code: ModbusResponseCode;
    try {
      code = await this._exchange(request);
    } finally {
      release();
    }

    // Следующий обмен из очереди уже держит блокировку и закроет соединение сам
    if (
      this.connectionMode === ModbusConnectionMode.AUTO_CONNECT_AND_DISCONNECT &&
      !this._mutex.isLocked()
    ) {
      await this.disconnect();
    }
    return code;
  }

  private async _exchange(request: ModbusRequest<unknown>): Promise<ModbusResponseCode> {
    if (this.connectionMode !== ModbusConnectionMode.DO_NOT_CONNECT) {
      await this.connect();
    }
    if (!this.isConnected) {
      logger.warn(`Not connected to ${this.serverAddress}:${this.serverPort}`, {
        funcCode: request.functionCode,
      });
      request.reset();
      request.setResponseCode(ModbusResponseCode.CONNECTION_FAILED);
      return ModbusResponseCode.CONNECTION_FAILED;
    }

    const transactionId = this._transactions.next();
    const unitId = this.getUnitId(request);
    const response = new TcpResponse(request, {
      transactionId,
      timeout: this.getResponseTimeout(request),
      framer: this._framer,
    });
    this._currentResponse = response;

    // Запрос мог использоваться ранее
    request.reset();

    const adu = this._framer.buildAdu(unitId, request.protocolDataUnit, { transactionId });
    logger.debug(`Sending ${adu.length} bytes`, {
      unitId,
      funcCode: request.functionCode,
      transactionId,
    });

    try {
      await this._transport.write(adu);
    } catch (err: unknown) {
      logger.error('Failed to send request', err, { transactionId });
      response.fail(ModbusResponseCode.REQUEST_TX_FAILED);
    }

    try {
      return await request.responseCode;
    } finally {
      if (this._currentResponse === response) {
        this._currentResponse = null;
      }
    }
  }

  private _onData(chunk: Uint8Array): void {
    const response = this._currentResponse;
    if (!response) {
      logger.debug(`Ignoring ${chunk.length} bytes, no request pending`);
      return;
    }
    response.addResponseData(chunk);
  }

  private _onConnectionLost(reason: string): void {
    this._currentResponse?.abort(reason);
  }

  private async _execute<T>(request: ModbusRequest<T>): Promise<ModbusResult<T>> {
    const code = await this.send(request);
    const data = request.value;
    if (code === ModbusResponseCode.REQUEST_SUCCEED && data !== undefined) {
      return { success: true, code, data };
    }
    return { success: false, code, message: describeResponseCode(code) };
  }

  // Bit operations

  async readCoils(
    startAddress: number,
    quantity: number,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<ReadBitsResponse>> {
    return this._execute(readCoilsRequest(startAddress, quantity, options));
  }

  async readDiscreteInputs(
    startAddress: number,
    quantity: number,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<ReadBitsResponse>> {
    return this._execute(readDiscreteInputsRequest(startAddress, quantity, options));
  }

  async writeSingleCoil(
    address: number,
    value: boolean,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<WriteSingleCoilResponse>> {
    return this._execute(writeSingleCoilRequest(address, value, options));
  }

  async writeMultipleCoils(
    startAddress: number,
    values: boolean[],
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<WriteMultipleResponse>> {
    return this._execute(writeMultipleCoilsRequest(startAddress, values, options));
  }

  // Registers

  async readHoldingRegisters(
    startAddress: number,
    quantity: number,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<ReadRegistersResponse>> {
    return this._execute(readHoldingRegistersRequest(startAddress, quantity, options));
  }

  async readInputRegisters(
    startAddress: number,
    quantity: number,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<ReadRegistersResponse>> {
    return this._execute(readInputRegistersRequest(startAddress, quantity, options));
  }

  async writeSingleRegister(
    address: number,
    value: number,
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<WriteSingleRegisterResponse>> {
    return this._execute(writeSingleRegisterRequest(address, value, options));
  }

  async writeMultipleRegisters(
    startAddress: number,
    values: number[],
    options?: ModbusRequestOptions
  ): Promise<ModbusResult<WriteMultipleResponse>> {
    return this._execute(writeMultipleRegistersRequest(startAddress, values, options));
  }
}

export default ModbusTcpClient;
