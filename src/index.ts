// src/index.ts

export { default as ModbusTcpClient } from './client.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { discover } from './transport/discovery.js';
export { TcpResponse, TcpResponseState } from './tcp-response.js';
export type { TcpResponseOptions } from './tcp-response.js';
export { TcpFramer } from './framers/tcp-framer.js';
export type { TcpFrameHeader } from './framers/tcp-framer.js';
export type { FrameHeader, FramerContext, ModbusFramer } from './framers/modbus-framer.js';
export { TransactionCounter, buildMbapHeader, parseMbapHeader } from './utils/tcp-utils.js';
export type { MbapHeader } from './utils/tcp-utils.js';

export {
  ModbusRequest,
  ModbusPduRequest,
  describeResponseCode,
  exceptionToResponseCode,
} from './request/modbus-request.js';
export * from './request/requests.js';

export * from './function-codes/read-bits.js';
export * from './function-codes/read-registers.js';
export * from './function-codes/write-single-coil.js';
export * from './function-codes/write-single-register.js';
export * from './function-codes/write-multiple-coils.js';
export * from './function-codes/write-multiple-registers.js';

export * from './constants/constants.js';
export * from './errors.js';
export { default as Logger, modbusLogger } from './logger.js';
export type * from './types/modbus-types.js';
