// src/request/modbus-request.ts

import {
  EXCEPTION_FLAG,
  MAX_PDU_SIZE,
  MODBUS_RESPONSE_MESSAGES,
  ModbusResponseCode,
} from '../constants/constants.js';
import { ModbusConfigError, ModbusInvalidAddressError } from '../errors.js';
import { modbusLogger } from '../logger.js';
import type { ModbusRequestOptions } from '../types/modbus-types.js';
import { toHex } from '../utils/utils.js';

const logger = modbusLogger.createLogger('ModbusRequest');

/**
 * Maps the exception code of a device reply onto a response code.
 */
export function exceptionToResponseCode(exceptionCode: number): ModbusResponseCode {
  if (exceptionCode > 0 && exceptionCode < EXCEPTION_FLAG && exceptionCode in ModbusResponseCode) {
    return exceptionCode;
  }
  return ModbusResponseCode.UNDEFINED_ERROR_CODE;
}

export function describeResponseCode(code: ModbusResponseCode): string {
  return MODBUS_RESPONSE_MESSAGES[code] ?? `Unknown response code 0x${code.toString(16)}`;
}

interface PendingResult {
  promise: Promise<ModbusResponseCode>;
  resolve: (code: ModbusResponseCode) => void;
  settled: boolean;
}

function createPendingResult(): PendingResult {
  let resolve: (code: ModbusResponseCode) => void = () => undefined;
  const promise = new Promise<ModbusResponseCode>(r => {
    resolve = r;
  });
  return { promise, resolve, settled: false };
}

/**
 * A protocol request: the PDU to send plus a result slot that is filled once
 * per exchange. The slot accepts only its first writer until reset() re-arms it.
 */
export abstract class ModbusRequest<T> {
  public readonly protocolDataUnit: Uint8Array;
  public readonly unitId?: number;
  public readonly responseTimeout?: number;

  private _result: PendingResult = createPendingResult();
  private _value: T | undefined = undefined;

  constructor(protocolDataUnit: Uint8Array, options: ModbusRequestOptions = {}) {
    if (protocolDataUnit.length === 0 || protocolDataUnit.length > MAX_PDU_SIZE) {
      throw new RangeError(
        `Protocol data unit must be 1-${MAX_PDU_SIZE} bytes, got ${protocolDataUnit.length}`
      );
    }
    const { unitId, responseTimeout } = options;
    if (unitId !== undefined && (!Number.isInteger(unitId) || unitId < 0 || unitId > 255)) {
      throw new ModbusInvalidAddressError(unitId);
    }
    if (responseTimeout !== undefined && (!Number.isFinite(responseTimeout) || responseTimeout <= 0)) {
      throw new ModbusConfigError(`Invalid responseTimeout: ${responseTimeout}`);
    }
    this.protocolDataUnit = protocolDataUnit;
    this.unitId = unitId;
    this.responseTimeout = responseTimeout;
  }

  get functionCode(): number {
    return this.protocolDataUnit[0];
  }

  /** Resolves with the outcome of the current exchange */
  get responseCode(): Promise<ModbusResponseCode> {
    return this._result.promise;
  }

  /** Decoded reply of the last successful exchange */
  get value(): T | undefined {
    return this._value;
  }

  get isSettled(): boolean {
    return this._result.settled;
  }

  /**
   * Clears the result of a previous exchange so the request can be sent again.
   */
  reset(): void {
    this._value = undefined;
    if (this._result.settled) {
      this._result = createPendingResult();
    }
  }

  /**
   * Settles the current exchange. Returns false if it was already settled.
   */
  setResponseCode(code: ModbusResponseCode): boolean {
    if (this._result.settled) return false;
    this._result.settled = true;
    this._result.resolve(code);
    return true;
  }

  /**
   * Decodes the reply PDU (function code first, no framing) into the result.
   */
  setFromPduResponse(pdu: Uint8Array): void {
    if (this._result.settled) return;
    if (pdu.length === 0) {
      logger.warn('Empty response PDU', { funcCode: this.functionCode });
      this.setResponseCode(ModbusResponseCode.REQUEST_RX_FAILED);
      return;
    }

    const responseFunctionCode = pdu[0];
    if (responseFunctionCode === (this.functionCode | EXCEPTION_FLAG)) {
      const exceptionCode = pdu.length > 1 ? pdu[1] : 0;
      const code = exceptionToResponseCode(exceptionCode);
      logger.warn(`Device exception 0x${exceptionCode.toString(16)}: ${describeResponseCode(code)}`, {
        funcCode: this.functionCode,
      });
      this.setResponseCode(code);
      return;
    }
    if (responseFunctionCode !== this.functionCode) {
      logger.warn(
        `Unexpected function code: sent 0x${this.functionCode.toString(16)}, received 0x${responseFunctionCode.toString(16)}`
      );
      this.setResponseCode(ModbusResponseCode.REQUEST_RX_WRONG_FUNCTION_CODE);
      return;
    }

    try {
      this._value = this.decodeResponse(pdu);
    } catch (err: unknown) {
      logger.warn('Failed to decode response', err, {
        funcCode: this.functionCode,
        pdu: toHex(pdu),
      });
      this.setResponseCode(ModbusResponseCode.REQUEST_RX_FAILED);
      return;
    }
    this.setResponseCode(ModbusResponseCode.REQUEST_SUCCEED);
  }

  protected abstract decodeResponse(pdu: Uint8Array): T;
}

/**
 * Request built from a ready PDU and a parser for the reply PDU.
 */
export class ModbusPduRequest<T> extends ModbusRequest<T> {
  private readonly parser: (pdu: Uint8Array) => T;

  constructor(
    protocolDataUnit: Uint8Array,
    parser: (pdu: Uint8Array) => T,
    options: ModbusRequestOptions = {}
  ) {
    super(protocolDataUnit, options);
    this.parser = parser;
  }

  protected decodeResponse(pdu: Uint8Array): T {
    return this.parser(pdu);
  }
}
