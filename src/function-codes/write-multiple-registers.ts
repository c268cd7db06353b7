// src/function-codes/write-multiple-registers.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteMultipleResponse } from '../types/modbus-types.js';
import { expectPdu, validateAddress, validateQuantity, validateRange } from './common.js';

const MIN_REGISTERS = 1;
const MAX_REGISTERS = 0x7b;
const MAX_VALUE = 0xffff;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;
const UINT16_SIZE = 2;

/**
 * Строит PDU-запрос для записи множества регистров (Write Multiple Registers)
 * @param startAddress - начальный адрес
 * @param values - массив значений регистров (1-123 значений 0..65535)
 * @throws RangeError Если количество регистров или их значения вне допустимого диапазона
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: number[]
): Uint8Array {
  validateAddress(startAddress);
  const quantity = values.length;
  validateQuantity(quantity, MIN_REGISTERS, MAX_REGISTERS);
  validateRange(startAddress, quantity);

  const byteCount = quantity * UINT16_SIZE;
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(pdu.buffer);

  // Заполняем заголовок PDU
  view.setUint8(0, ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  view.setUint8(5, byteCount);

  values.forEach((value, i) => {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
      throw new RangeError(`Value must be 0-${MAX_VALUE}, got ${value}`);
    }
    view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, value, false);
  });

  return pdu;
}

export function parseWriteMultipleRegistersResponse(pdu: Uint8Array): WriteMultipleResponse {
  const view = expectPdu(pdu, ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, RESPONSE_SIZE);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
