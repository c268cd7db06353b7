// src/function-codes/write-single-coil.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteSingleCoilResponse } from '../types/modbus-types.js';
import { buildAddressWordPdu, expectPdu, validateAddress } from './common.js';

const COIL_ON = 0xff00;
const COIL_OFF = 0x0000;
const PDU_SIZE = 5;

/**
 * Строит PDU-запрос для записи одной катушки (Write Single Coil)
 * @param address - адрес катушки
 * @param value - значение катушки
 * @throws RangeError Если адрес вне допустимого диапазона
 */
export function buildWriteSingleCoilRequest(address: number, value: boolean): Uint8Array {
  validateAddress(address);
  return buildAddressWordPdu(
    ModbusFunctionCode.WRITE_SINGLE_COIL,
    address,
    value ? COIL_ON : COIL_OFF
  );
}

/**
 * Разбирает PDU-ответ на запись одной катушки (эхо запроса)
 */
export function parseWriteSingleCoilResponse(pdu: Uint8Array): WriteSingleCoilResponse {
  const view = expectPdu(pdu, ModbusFunctionCode.WRITE_SINGLE_COIL, PDU_SIZE);

  const address = view.getUint16(1, false);
  const valueRaw = view.getUint16(3, false);

  switch (valueRaw) {
    case COIL_ON:
      return { address, value: true };
    case COIL_OFF:
      return { address, value: false };
    default:
      throw new Error(
        `Invalid coil value: expected 0x${COIL_ON.toString(16)} or 0x${COIL_OFF.toString(16)}, got 0x${valueRaw.toString(16)}`
      );
  }
}
