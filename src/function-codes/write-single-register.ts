// src/function-codes/write-single-register.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteSingleRegisterResponse } from '../types/modbus-types.js';
import { buildAddressWordPdu, expectPdu, validateAddress } from './common.js';

const PDU_SIZE = 5;
const MAX_VALUE = 0xffff;

/**
 * Строит PDU-запрос для записи одного регистра (FC 0x06)
 * @param address - адрес регистра
 * @param value - значение 0..65535
 */
export function buildWriteSingleRegisterRequest(address: number, value: number): Uint8Array {
  validateAddress(address);
  if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
    throw new RangeError(`Value must be 0-${MAX_VALUE}, got ${value}`);
  }
  return buildAddressWordPdu(ModbusFunctionCode.WRITE_SINGLE_REGISTER, address, value);
}

export function parseWriteSingleRegisterResponse(pdu: Uint8Array): WriteSingleRegisterResponse {
  const view = expectPdu(pdu, ModbusFunctionCode.WRITE_SINGLE_REGISTER, PDU_SIZE);
  return {
    address: view.getUint16(1, false),
    value: view.getUint16(3, false),
  };
}
