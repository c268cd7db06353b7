// src/utils/tcp-utils.ts

import { MAX_TRANSACTION_ID, MBAP_HEADER_SIZE, MBAP_PREFIX_SIZE } from '../constants/constants.js';

/**
 * Утилита для управления Transaction ID (0-65535).
 * Первый выданный ID равен 0, после 65535 снова 0.
 */
export class TransactionCounter {
  private _nextId: number = 0;

  next(): number {
    const id = this._nextId;
    this._nextId = (this._nextId + 1) % (MAX_TRANSACTION_ID + 1);
    return id;
  }

  /** ID, который будет выдан следующим */
  get peek(): number {
    return this._nextId;
  }
}

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  /** Unit ID + PDU */
  length: number;
  /** Только если разобраны все 7 байт */
  unitId?: number;
}

/**
 * Формирует MBAP заголовок (7 байт)
 * @param transactionId - ID транзакции (2 байта)
 * @param unitId - ID устройства (1 байт)
 * @param pduLength - Длина PDU
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(MBAP_HEADER_SIZE);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false); // Transaction ID (BE)
  view.setUint16(2, 0, false); // Protocol ID: всегда 0 для Modbus (BE)
  view.setUint16(4, pduLength + 1, false); // Length: PDU + 1 байт UnitID (BE)
  view.setUint8(6, unitId); // Unit ID

  return header;
}

/**
 * Разбирает MBAP заголовок. Достаточно первых 6 байт, Unit ID читается если он уже есть.
 */
export function parseMbapHeader(data: Uint8Array): MbapHeader {
  if (data.length < MBAP_PREFIX_SIZE) throw new Error('MBAP header too short');

  const view = new DataView(data.buffer, data.byteOffset, Math.min(data.length, MBAP_HEADER_SIZE));
  const header: MbapHeader = {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
  };
  if (data.length >= MBAP_HEADER_SIZE) {
    header.unitId = view.getUint8(6);
  }
  return header;
}
