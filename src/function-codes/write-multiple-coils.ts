// src/function-codes/write-multiple-coils.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteMultipleResponse } from '../types/modbus-types.js';
import { expectPdu, validateAddress, validateQuantity, validateRange } from './common.js';

const MIN_COILS = 1;
const MAX_COILS = 0x7b0;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;

/**
 * Строит PDU-запрос для записи нескольких катушек (FC 0x0F)
 * @param startAddress - начальный адрес
 * @param values - значения катушек (1-1968)
 */
export function buildWriteMultipleCoilsRequest(
  startAddress: number,
  values: boolean[]
): Uint8Array {
  validateAddress(startAddress);
  const quantity = values.length;
  validateQuantity(quantity, MIN_COILS, MAX_COILS);
  validateRange(startAddress, quantity);

  const byteCount = Math.ceil(quantity / 8);
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, ModbusFunctionCode.WRITE_MULTIPLE_COILS);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  view.setUint8(5, byteCount);

  // Упаковка битов: младший бит первого байта = первая катушка
  values.forEach((value, i) => {
    if (value) {
      pdu[REQUEST_HEADER_SIZE + (i >> 3)] |= 1 << (i & 7);
    }
  });

  return pdu;
}

export function parseWriteMultipleCoilsResponse(pdu: Uint8Array): WriteMultipleResponse {
  const view = expectPdu(pdu, ModbusFunctionCode.WRITE_MULTIPLE_COILS, RESPONSE_SIZE);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
