// src/types/modbus-types.ts

import type { ModbusConnectionMode, ModbusResponseCode } from '../constants/constants.js';

// !=============================================================================
// ! Типы ответов функций Modbus
// !=============================================================================

/** Ответ на чтение coils / discrete inputs */
export type ReadBitsResponse = boolean[];

/** Ответ на чтение holding / input регистров */
export type ReadRegistersResponse = number[];

export interface WriteSingleCoilResponse {
  address: number;
  value: boolean;
}

export interface WriteSingleRegisterResponse {
  address: number;
  value: number;
}

export interface WriteMultipleResponse {
  startAddress: number;
  quantity: number;
}

/**
 * Result of a typed client call. `data` is only present on success.
 */
export type ModbusResult<T> =
  | { readonly success: true; readonly code: ModbusResponseCode; readonly data: T }
  | { readonly success: false; readonly code: ModbusResponseCode; readonly message: string };

// !=============================================================================
// ! Интерфейсы для транспорта
// !=============================================================================

/** Обработчик входящих байтов */
export type DataHandler = (chunk: Uint8Array) => void;

/** Обработчик потери соединения (ошибка сокета или закрытие со стороны сервера) */
export type ConnectionLostHandler = (reason: string) => void;

/** Опции TCP транспорта */
export interface NodeTcpTransportOptions {
  /** Таймаут установки соединения в мс (по умолчанию 3000) */
  connectionTimeout?: number;
  /** Пауза после подключения перед первой отправкой, мс */
  delayAfterConnect?: number;
  /** Имя категории логгера */
  loggerName?: string;
}

/** Duplex byte connection owned by the client */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  setDataHandler(handler: DataHandler | null): void;
  setConnectionLostHandler(handler: ConnectionLostHandler | null): void;
}

// !=============================================================================
// ! Интерфейсы для опций клиента
// !=============================================================================

/** Опции для конфигурации Modbus TCP клиента */
export interface ModbusTcpClientOptions {
  serverPort?: number;
  connectionMode?: ModbusConnectionMode;
  /** Таймаут подключения, мс */
  connectionTimeout?: number;
  /** Таймаут ожидания ответа по умолчанию, мс */
  responseTimeout?: number;
  delayAfterConnect?: number;
  /** Unit ID по умолчанию для запросов без собственного */
  unitId?: number;
  logLevel?: LogLevel;
}

/** Per-request overrides of the client defaults */
export interface ModbusRequestOptions {
  unitId?: number;
  responseTimeout?: number;
}

export interface DiscoverOptions {
  serverPort?: number;
  /** Таймаут одной попытки подключения, мс */
  connectionTimeout?: number;
}

// !=============================================================================
// ! Типы для логгера
// !=============================================================================

/** Уровни логирования */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  unitId?: number;
  funcCode?: number;
  transactionId?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'unitId' | 'funcCode' | 'transactionId';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Интерфейс для экземпляра логгера */
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
