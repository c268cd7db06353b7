// src/function-codes/read-bits.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadBitsResponse } from '../types/modbus-types.js';
import {
  buildAddressWordPdu,
  expectPdu,
  validateAddress,
  validateQuantity,
  validateRange,
} from './common.js';

const MIN_QUANTITY = 1;
const MAX_QUANTITY = 2000;
const RESPONSE_HEADER_SIZE = 2; // FC (1) + ByteCount (1)

export type ReadBitsFunctionCode =
  | ModbusFunctionCode.READ_COILS
  | ModbusFunctionCode.READ_DISCRETE_INPUTS;

function buildReadBitsRequest(
  functionCode: ReadBitsFunctionCode,
  startAddress: number,
  quantity: number
): Uint8Array {
  validateAddress(startAddress);
  validateQuantity(quantity, MIN_QUANTITY, MAX_QUANTITY);
  validateRange(startAddress, quantity);
  return buildAddressWordPdu(functionCode, startAddress, quantity);
}

/**
 * Строит PDU-запрос для чтения дискретных выходов (coils, FC 0x01)
 * @param startAddress - начальный адрес
 * @param quantity - количество битов (1-2000)
 */
export function buildReadCoilsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadBitsRequest(ModbusFunctionCode.READ_COILS, startAddress, quantity);
}

/**
 * Строит PDU-запрос для чтения дискретных входов (FC 0x02)
 */
export function buildReadDiscreteInputsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadBitsRequest(ModbusFunctionCode.READ_DISCRETE_INPUTS, startAddress, quantity);
}

/**
 * Разбирает PDU-ответ с битами. Биты упакованы младшим битом вперёд,
 * `quantity` берётся из запроса, т.к. в ответе есть только число байт.
 * @returns boolean[] длиной quantity
 */
export function parseReadBitsResponse(
  pdu: Uint8Array,
  functionCode: ReadBitsFunctionCode,
  quantity: number
): ReadBitsResponse {
  const byteCount = Math.ceil(quantity / 8);
  if (pdu.length >= RESPONSE_HEADER_SIZE && pdu[1] !== byteCount) {
    throw new Error(`Invalid byte count: expected ${byteCount}, got ${pdu[1]}`);
  }
  expectPdu(pdu, functionCode, RESPONSE_HEADER_SIZE + byteCount);

  const result: ReadBitsResponse = new Array<boolean>(quantity);
  for (let i = 0; i < quantity; i++) {
    const byte = pdu[RESPONSE_HEADER_SIZE + (i >> 3)];
    result[i] = (byte & (1 << (i & 7))) !== 0;
  }
  return result;
}
