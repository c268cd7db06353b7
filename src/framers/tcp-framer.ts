// src/framers/tcp-framer.ts

import type { FrameHeader, FramerContext, ModbusFramer } from './modbus-framer.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { buildMbapHeader, parseMbapHeader } from '../utils/tcp-utils.js';
import { MBAP_HEADER_SIZE, MBAP_PREFIX_SIZE } from '../constants/constants.js';
import {
  ModbusInvalidFrameLengthError,
  ModbusInvalidProtocolIdError,
  ModbusInvalidTransactionIdError,
} from '../errors.js';

export interface TcpFrameHeader extends FrameHeader {
  protocolId: number;
  /** Поле Length из MBAP: Unit ID + PDU */
  length: number;
}

export class TcpFramer implements ModbusFramer {
  public readonly headerSize = MBAP_HEADER_SIZE;

  public buildAdu(unitId: number, pdu: Uint8Array, context: FramerContext): Uint8Array {
    // MBAP Header: TID, Protocol ID = 0, Length = PDU + UnitID, UnitID
    const mbap = buildMbapHeader(context.transactionId, unitId, pdu.length);
    return concatUint8Arrays([mbap, pdu]);
  }

  public parseHeader(data: Uint8Array, context: FramerContext): TcpFrameHeader | null {
    if (data.length < MBAP_PREFIX_SIZE) return null;

    const header = parseMbapHeader(data);

    // Валидация Transaction ID
    if (header.transactionId !== context.transactionId) {
      throw new ModbusInvalidTransactionIdError(header.transactionId, context.transactionId);
    }

    // Валидация протокола
    if (header.protocolId !== 0) {
      throw new ModbusInvalidProtocolIdError(header.protocolId);
    }

    if (header.length < 1) {
      throw new ModbusInvalidFrameLengthError(header.length, 1);
    }

    return {
      transactionId: header.transactionId,
      protocolId: header.protocolId,
      length: header.length,
      frameLength: MBAP_PREFIX_SIZE + header.length,
    };
  }
}
