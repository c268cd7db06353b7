// src/constants/constants.ts

/** Стандартный порт Modbus TCP */
export const MODBUS_TCP_PORT = 502;

/** MBAP: transaction id (2) + protocol id (2) + length (2) */
export const MBAP_PREFIX_SIZE = 6;

/** Полный MBAP заголовок вместе с Unit ID */
export const MBAP_HEADER_SIZE = 7;

export const MAX_TRANSACTION_ID = 0xffff;

/** Максимальный размер PDU по спецификации Modbus */
export const MAX_PDU_SIZE = 253;

/**
 * Modbus Function Codes
 */
export enum ModbusFunctionCode {
  READ_COILS = 0x01,
  READ_DISCRETE_INPUTS = 0x02,
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
  WRITE_SINGLE_COIL = 0x05,
  WRITE_SINGLE_REGISTER = 0x06,
  WRITE_MULTIPLE_COILS = 0x0f,
  WRITE_MULTIPLE_REGISTERS = 0x10,
}

/** Bit set in the function code of an exception reply */
export const EXCEPTION_FLAG = 0x80;

/**
 * Outcome of one exchange. Values below 0x80 are Modbus exception codes
 * reported by the device, values from 0xF0 are produced by the client.
 */
export enum ModbusResponseCode {
  REQUEST_SUCCEED = 0x00,
  ILLEGAL_FUNCTION = 0x01,
  ILLEGAL_DATA_ADDRESS = 0x02,
  ILLEGAL_DATA_VALUE = 0x03,
  DEVICE_FAILURE = 0x04,
  ACKNOWLEDGE = 0x05,
  DEVICE_BUSY = 0x06,
  NEGATIVE_ACKNOWLEDGMENT = 0x07,
  MEMORY_PARITY_ERROR = 0x08,
  GATEWAY_PATH_UNAVAILABLE = 0x0a,
  GATEWAY_TARGET_DEVICE_FAILED = 0x0b,
  CONNECTION_FAILED = 0xf0,
  REQUEST_TIMEOUT = 0xf1,
  REQUEST_TX_FAILED = 0xf2,
  REQUEST_RX_FAILED = 0xf3,
  REQUEST_RX_WRONG_UNIT_ID = 0xf4,
  REQUEST_RX_WRONG_FUNCTION_CODE = 0xf5,
  REQUEST_RX_WRONG_CHECKSUM = 0xf6,
  UNDEFINED_ERROR_CODE = 0xff,
}

export const MODBUS_RESPONSE_MESSAGES: Record<ModbusResponseCode, string> = {
  [ModbusResponseCode.REQUEST_SUCCEED]: 'Request succeeded',
  [ModbusResponseCode.ILLEGAL_FUNCTION]: 'Illegal Function',
  [ModbusResponseCode.ILLEGAL_DATA_ADDRESS]: 'Illegal Data Address',
  [ModbusResponseCode.ILLEGAL_DATA_VALUE]: 'Illegal Data Value',
  [ModbusResponseCode.DEVICE_FAILURE]: 'Slave Device Failure',
  [ModbusResponseCode.ACKNOWLEDGE]: 'Acknowledge',
  [ModbusResponseCode.DEVICE_BUSY]: 'Slave Device Busy',
  [ModbusResponseCode.NEGATIVE_ACKNOWLEDGMENT]: 'Negative Acknowledgment',
  [ModbusResponseCode.MEMORY_PARITY_ERROR]: 'Memory Parity Error',
  [ModbusResponseCode.GATEWAY_PATH_UNAVAILABLE]: 'Gateway Path Unavailable',
  [ModbusResponseCode.GATEWAY_TARGET_DEVICE_FAILED]: 'Gateway Target Device Failed to Respond',
  [ModbusResponseCode.CONNECTION_FAILED]: 'Connection failed',
  [ModbusResponseCode.REQUEST_TIMEOUT]: 'Request timed out',
  [ModbusResponseCode.REQUEST_TX_FAILED]: 'Failed to send request',
  [ModbusResponseCode.REQUEST_RX_FAILED]: 'Invalid or mismatched response',
  [ModbusResponseCode.REQUEST_RX_WRONG_UNIT_ID]: 'Response from wrong unit id',
  [ModbusResponseCode.REQUEST_RX_WRONG_FUNCTION_CODE]: 'Response with wrong function code',
  [ModbusResponseCode.REQUEST_RX_WRONG_CHECKSUM]: 'Response checksum mismatch',
  [ModbusResponseCode.UNDEFINED_ERROR_CODE]: 'Undefined error code',
};

/**
 * When the client opens and closes its connection
 */
export enum ModbusConnectionMode {
  /** send() never connects; the caller manages connect()/disconnect() */
  DO_NOT_CONNECT = 'doNotConnect',
  AUTO_CONNECT_AND_KEEP_CONNECTED = 'autoConnectAndKeepConnected',
  AUTO_CONNECT_AND_DISCONNECT = 'autoConnectAndDisconnect',
}
