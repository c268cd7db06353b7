// src/errors.ts

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

/**
 * Error class for Modbus timeout
 */
export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

/**
 * Error class for a failed TCP connection attempt
 */
export class ModbusConnectionError extends ModbusError {
  constructor(message: string = 'Failed to connect to Modbus device') {
    super(message);
    this.name = 'ModbusConnectionError';
  }
}

/**
 * Error class for not connected
 */
export class ModbusNotConnectedError extends ModbusError {
  constructor() {
    super('Not connected to Modbus device');
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Error class for configuration errors
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string = 'Modbus configuration error') {
    super(message);
    this.name = 'ModbusConfigError';
  }
}

/**
 * Error class for invalid Modbus unit address
 */
export class ModbusInvalidAddressError extends ModbusError {
  constructor(address: number) {
    super(`Invalid Modbus unit id: ${address}. Unit id must be between 0-255 for TCP.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

// --- Errors for Response Framing ---

/**
 * Error class for Modbus response errors
 */
export class ModbusResponseError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ModbusResponseError';
  }
}

/**
 * Error class for invalid Modbus transaction ID
 */
export class ModbusInvalidTransactionIdError extends ModbusResponseError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number) {
    super(`Invalid transaction ID: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidTransactionIdError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for a nonzero MBAP protocol identifier
 */
export class ModbusInvalidProtocolIdError extends ModbusResponseError {
  readonly protocolId: number;

  constructor(protocolId: number) {
    super(`Invalid protocol ID: ${protocolId}, expected 0`);
    this.name = 'ModbusInvalidProtocolIdError';
    this.protocolId = protocolId;
  }
}

/**
 * Error class for a declared MBAP length that cannot hold a frame
 */
export class ModbusInvalidFrameLengthError extends ModbusResponseError {
  constructor(received: number, minimum: number) {
    super(`Invalid frame length: received ${received}, expected at least ${minimum}`);
    this.name = 'ModbusInvalidFrameLengthError';
  }
}
