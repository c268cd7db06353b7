// src/function-codes/read-registers.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadRegistersResponse } from '../types/modbus-types.js';
import {
  buildAddressWordPdu,
  expectPdu,
  validateAddress,
  validateQuantity,
  validateRange,
} from './common.js';

const MIN_QUANTITY = 1;
const MAX_QUANTITY = 125;
const RESPONSE_HEADER_SIZE = 2; // FC (1) + ByteCount (1)
const UINT16_SIZE = 2;

export type ReadRegistersFunctionCode =
  | ModbusFunctionCode.READ_HOLDING_REGISTERS
  | ModbusFunctionCode.READ_INPUT_REGISTERS;

function buildReadRegistersRequest(
  functionCode: ReadRegistersFunctionCode,
  startAddress: number,
  quantity: number
): Uint8Array {
  validateAddress(startAddress);
  validateQuantity(quantity, MIN_QUANTITY, MAX_QUANTITY);
  validateRange(startAddress, quantity);
  return buildAddressWordPdu(functionCode, startAddress, quantity);
}

/**
 * Строит PDU-запрос для чтения holding-регистров (FC 0x03)
 * @param startAddress - начальный адрес (0x0000–0xFFFF)
 * @param quantity - количество регистров (1–125)
 */
export function buildReadHoldingRegistersRequest(
  startAddress: number,
  quantity: number
): Uint8Array {
  return buildReadRegistersRequest(
    ModbusFunctionCode.READ_HOLDING_REGISTERS,
    startAddress,
    quantity
  );
}

/**
 * Строит PDU-запрос для чтения input-регистров (FC 0x04)
 */
export function buildReadInputRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRegistersRequest(ModbusFunctionCode.READ_INPUT_REGISTERS, startAddress, quantity);
}

/**
 * Разбирает PDU-ответ с регистрами
 * @returns number[] - массив значений регистров (unsigned 16 bit)
 */
export function parseReadRegistersResponse(
  pdu: Uint8Array,
  functionCode: ReadRegistersFunctionCode,
  quantity: number
): ReadRegistersResponse {
  const byteCount = quantity * UINT16_SIZE;
  if (pdu.length >= RESPONSE_HEADER_SIZE && pdu[1] !== byteCount) {
    throw new Error(`Invalid byte count: expected ${byteCount}, got ${pdu[1]}`);
  }
  const view = expectPdu(pdu, functionCode, RESPONSE_HEADER_SIZE + byteCount);

  const registers: ReadRegistersResponse = new Array<number>(quantity);
  for (let i = 0; i < quantity; i++) {
    registers[i] = view.getUint16(RESPONSE_HEADER_SIZE + i * UINT16_SIZE, false);
  }
  return registers;
}
