// src/tcp-response.ts

import { ModbusResponseCode } from './constants/constants.js';
import type { FrameHeader, ModbusFramer } from './framers/modbus-framer.js';
import { TcpFramer } from './framers/tcp-framer.js';
import { modbusLogger } from './logger.js';
import type { ModbusRequest } from './request/modbus-request.js';
import { concatUint8Arrays, sliceUint8Array, toHex } from './utils/utils.js';

const logger = modbusLogger.createLogger('TcpResponse');

export enum TcpResponseState {
  AWAITING_HEADER = 'awaitingHeader',
  AWAITING_BODY = 'awaitingBody',
  RESOLVED = 'resolved',
}

export interface TcpResponseOptions {
  transactionId: number;
  /** Таймаут ожидания ответа, мс */
  timeout: number;
  framer?: ModbusFramer;
}

/**
 * Pending exchange: collects reply bytes for one transaction until a whole
 * frame is buffered, then hands the PDU to the request. Settles exactly once,
 * by the reply, a header mismatch, the timeout or an abort, whichever is first.
 */
export class TcpResponse {
  public readonly request: ModbusRequest<unknown>;
  public readonly transactionId: number;

  private readonly framer: ModbusFramer;
  private _state: TcpResponseState = TcpResponseState.AWAITING_HEADER;
  // Куски склеиваются только для разбора заголовка и один раз для всего кадра
  private _chunks: Uint8Array[] = [];
  private _bufferedLength: number = 0;
  private _header: FrameHeader | null = null;
  private _timer: NodeJS.Timeout | null;
  private readonly _startedAt: number = Date.now();

  constructor(request: ModbusRequest<unknown>, options: TcpResponseOptions) {
    this.request = request;
    this.transactionId = options.transactionId;
    this.framer = options.framer ?? new TcpFramer();
    this._timer = setTimeout(() => {
      this._timer = null;
      logger.warn(`No response within ${options.timeout} ms`, {
        transactionId: this.transactionId,
      });
      this._settle(ModbusResponseCode.REQUEST_TIMEOUT);
    }, options.timeout);
  }

  get state(): TcpResponseState {
    return this._state;
  }

  get isResolved(): boolean {
    return this._state === TcpResponseState.RESOLVED;
  }

  /** Количество уже принятых байт */
  get bufferedLength(): number {
    return this._bufferedLength;
  }

  addResponseData(chunk: Uint8Array): void {
    if (this._state === TcpResponseState.RESOLVED) {
      logger.debug(`Ignoring ${chunk.length} bytes after exchange was resolved`, {
        transactionId: this.transactionId,
      });
      return;
    }

    this._chunks.push(chunk);
    this._bufferedLength += chunk.length;

    if (this._state === TcpResponseState.AWAITING_HEADER) {
      const buffered = this._joinChunks();
      try {
        this._header = this.framer.parseHeader(buffered, {
          transactionId: this.transactionId,
        });
      } catch (err: unknown) {
        logger.warn('Invalid response header', err, {
          transactionId: this.transactionId,
          received: toHex(buffered),
        });
        this._settle(ModbusResponseCode.REQUEST_RX_FAILED);
        return;
      }
      if (this._header === null) return;
      this._state = TcpResponseState.AWAITING_BODY;
    }

    if (this._header !== null && this._bufferedLength >= this._header.frameLength) {
      this._complete(this._header.frameLength);
    }
  }

  /**
   * Ends the exchange because the connection went away.
   */
  abort(reason: string): boolean {
    if (this.isResolved) return false;
    logger.warn(`Exchange aborted: ${reason}`, { transactionId: this.transactionId });
    return this._settle(ModbusResponseCode.REQUEST_RX_FAILED);
  }

  /**
   * Ends the exchange with the given code (e.g. the request could not be written).
   */
  fail(code: ModbusResponseCode): boolean {
    return this._settle(code);
  }

  private _complete(frameLength: number): void {
    this._state = TcpResponseState.RESOLVED;
    this._clearTimer();

    const frame = this._joinChunks();
    if (frame.length > frameLength) {
      logger.debug(`Dropping ${frame.length - frameLength} bytes past the frame end`, {
        transactionId: this.transactionId,
      });
    }
    const pdu = sliceUint8Array(frame, this.framer.headerSize, frameLength);
    logger.debug(`Response received: ${toHex(pdu)}`, {
      transactionId: this.transactionId,
      responseTime: Date.now() - this._startedAt,
    });
    this.request.setFromPduResponse(pdu);
  }

  private _joinChunks(): Uint8Array {
    if (this._chunks.length > 1) {
      this._chunks = [concatUint8Arrays(this._chunks)];
    }
    return this._chunks[0];
  }

  private _settle(code: ModbusResponseCode): boolean {
    if (this._state === TcpResponseState.RESOLVED) return false;
    this._state = TcpResponseState.RESOLVED;
    this._clearTimer();
    return this.request.setResponseCode(code);
  }

  private _clearTimer(): void {
    if (this._timer) {
      clearTimeout(this._timer);
      this._timer = null;
    }
  }
}
