// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { modbusLogger } from '../../logger.js';
import { ModbusConnectionError, ModbusNotConnectedError, ModbusTimeoutError } from '../../errors.js';
import { sleep, toHex } from '../../utils/utils.js';
import type {
  ConnectionLostHandler,
  DataHandler,
  LoggerInstance,
  NodeTcpTransportOptions,
  Transport,
} from '../../types/modbus-types.js';

const DEFAULT_CONNECTION_TIMEOUT = 3000;

/**
 * Одно TCP соединение с Modbus сервером. Переподключения нет:
 * следующее соединение открывает клиент при следующей отправке.
 */
class NodeTcpTransport implements Transport {
  public readonly host: string;
  public readonly port: number;

  private readonly connectionTimeout: number;
  private readonly delayAfterConnect?: number;
  private readonly logger: LoggerInstance;
  private socket: net.Socket | null = null;
  private _connecting: Promise<boolean> | null = null;

  private _dataHandler: DataHandler | null = null;
  private _connectionLostHandler: ConnectionLostHandler | null = null;

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.connectionTimeout = options.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT;
    this.delayAfterConnect = options.delayAfterConnect;
    this.logger = modbusLogger.createLogger(options.loggerName ?? 'NodeTcpTransport');
  }

  /** Есть ли живой сокет */
  public get isOpen(): boolean {
    return this.socket !== null;
  }

  public setDataHandler(handler: DataHandler | null): void {
    this._dataHandler = handler;
  }

  public setConnectionLostHandler(handler: ConnectionLostHandler | null): void {
    this._connectionLostHandler = handler;
  }

  /**
   * Opens the connection unless one is already open. Never rejects:
   * failures are logged and reported as `false`.
   */
  public connect(): Promise<boolean> {
    if (this.socket) return Promise.resolve(true);
    if (!this._connecting) {
      this._connecting = this._connect().finally(() => {
        this._connecting = null;
      });
    }
    return this._connecting;
  }

  private async _connect(): Promise<boolean> {
    this.logger.info(`Connecting to ${this.host}:${this.port}...`);
    try {
      await this._openSocket();
    } catch (err: unknown) {
      this.logger.error(`Failed to connect to ${this.host}:${this.port}`, err);
      return false;
    }

    // Даём устройству время после подключения
    if (this.delayAfterConnect) {
      await sleep(this.delayAfterConnect);
    }
    this.logger.info(
      `TCP socket ${this.isOpen ? '' : 'not '}connected to ${this.host}:${this.port}`
    );
    return this.isOpen;
  }

  private _openSocket(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: this.host, port: this.port });

      const cleanup = () => {
        clearTimeout(timer);
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
        socket.removeListener('close', onClose);
      };
      const onConnect = () => {
        cleanup();
        this._bindSocket(socket);
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(new ModbusConnectionError(err.message));
      };
      const onClose = () => {
        cleanup();
        reject(new ModbusConnectionError('Socket closed before the connection was established'));
      };
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(
          new ModbusTimeoutError(`TCP connection timeout after ${this.connectionTimeout} ms`)
        );
      }, this.connectionTimeout);

      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.once('close', onClose);
    });
  }

  private _bindSocket(socket: net.Socket): void {
    this.socket = socket;
    socket.setNoDelay(true); // Отключаем задержки пакетов

    // Колбэки старого сокета игнорируем: он уже мог быть заменён новым
    socket.on('data', (data: Buffer) => {
      if (this.socket !== socket) return;
      const chunk = new Uint8Array(data);
      this.logger.trace(`>>> RAW DATA RECEIVED (${chunk.length} bytes): ${toHex(chunk)}`);
      if (this._dataHandler) {
        this._dataHandler(chunk);
      } else {
        this.logger.debug(`No data handler, dropping ${chunk.length} bytes`);
      }
    });

    socket.on('error', (err: Error) => {
      if (this.socket !== socket) return;
      this.logger.error('Unexpected error from TCP socket', err);
      this._handleConnectionLoss(`socket error: ${err.message}`);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.logger.warn(`Connection closed for ${this.host}:${this.port}`);
      this._handleConnectionLoss('connection closed by peer');
    });
  }

  private _handleConnectionLoss(reason: string): void {
    this._dropSocket();
    this._connectionLostHandler?.(reason);
  }

  private _dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
  }

  public write(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.reject(new ModbusNotConnectedError());
    this.logger.trace(`<<< RAW DATA SEND: ${toHex(buffer)}`);
    return new Promise((resolve, reject) => {
      socket.write(buffer, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Closes the connection if there is one. Safe to call at any time.
   */
  public async disconnect(): Promise<void> {
    if (!this.socket) return;
    this.logger.info(`Disconnecting TCP socket ${this.host}:${this.port}...`);
    this._dropSocket();
  }
}

export default NodeTcpTransport;
