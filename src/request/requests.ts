// src/request/requests.ts
// Фабрики запросов для стандартных функций Modbus

import { ModbusFunctionCode } from '../constants/constants.js';
import {
  buildReadCoilsRequest,
  buildReadDiscreteInputsRequest,
  parseReadBitsResponse,
} from '../function-codes/read-bits.js';
import {
  buildReadHoldingRegistersRequest,
  buildReadInputRegistersRequest,
  parseReadRegistersResponse,
} from '../function-codes/read-registers.js';
import {
  buildWriteSingleCoilRequest,
  parseWriteSingleCoilResponse,
} from '../function-codes/write-single-coil.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from '../function-codes/write-single-register.js';
import {
  buildWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsResponse,
} from '../function-codes/write-multiple-coils.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from '../function-codes/write-multiple-registers.js';
import type {
  ModbusRequestOptions,
  ReadBitsResponse,
  ReadRegistersResponse,
  WriteMultipleResponse,
  WriteSingleCoilResponse,
  WriteSingleRegisterResponse,
} from '../types/modbus-types.js';
import { ModbusPduRequest } from './modbus-request.js';

export function readCoilsRequest(
  startAddress: number,
  quantity: number,
  options?: ModbusRequestOptions
): ModbusPduRequest<ReadBitsResponse> {
  return new ModbusPduRequest(
    buildReadCoilsRequest(startAddress, quantity),
    pdu => parseReadBitsResponse(pdu, ModbusFunctionCode.READ_COILS, quantity),
    options
  );
}

export function readDiscreteInputsRequest(
  startAddress: number,
  quantity: number,
  options?: ModbusRequestOptions
): ModbusPduRequest<ReadBitsResponse> {
  return new ModbusPduRequest(
    buildReadDiscreteInputsRequest(startAddress, quantity),
    pdu => parseReadBitsResponse(pdu, ModbusFunctionCode.READ_DISCRETE_INPUTS, quantity),
    options
  );
}

export function readHoldingRegistersRequest(
  startAddress: number,
  quantity: number,
  options?: ModbusRequestOptions
): ModbusPduRequest<ReadRegistersResponse> {
  return new ModbusPduRequest(
    buildReadHoldingRegistersRequest(startAddress, quantity),
    pdu => parseReadRegistersResponse(pdu, ModbusFunctionCode.READ_HOLDING_REGISTERS, quantity),
    options
  );
}

export function readInputRegistersRequest(
  startAddress: number,
  quantity: number,
  options?: ModbusRequestOptions
): ModbusPduRequest<ReadRegistersResponse> {
  return new ModbusPduRequest(
    buildReadInputRegistersRequest(startAddress, quantity),
    pdu => parseReadRegistersResponse(pdu, ModbusFunctionCode.READ_INPUT_REGISTERS, quantity),
    options
  );
}

export function writeSingleCoilRequest(
  address: number,
  value: boolean,
  options?: ModbusRequestOptions
): ModbusPduRequest<WriteSingleCoilResponse> {
  return new ModbusPduRequest(
    buildWriteSingleCoilRequest(address, value),
    parseWriteSingleCoilResponse,
    options
  );
}

export function writeSingleRegisterRequest(
  address: number,
  value: number,
  options?: ModbusRequestOptions
): ModbusPduRequest<WriteSingleRegisterResponse> {
  return new ModbusPduRequest(
    buildWriteSingleRegisterRequest(address, value),
    parseWriteSingleRegisterResponse,
    options
  );
}

export function writeMultipleCoilsRequest(
  startAddress: number,
  values: boolean[],
  options?: ModbusRequestOptions
): ModbusPduRequest<WriteMultipleResponse> {
  return new ModbusPduRequest(
    buildWriteMultipleCoilsRequest(startAddress, values),
    parseWriteMultipleCoilsResponse,
    options
  );
}

export function writeMultipleRegistersRequest(
  startAddress: number,
  values: number[],
  options?: ModbusRequestOptions
): ModbusPduRequest<WriteMultipleResponse> {
  return new ModbusPduRequest(
    buildWriteMultipleRegistersRequest(startAddress, values),
    parseWriteMultipleRegistersResponse,
    options
  );
}
