import { describe, expect, it } from 'vitest';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import {
  buildReadCoilsRequest,
  buildReadDiscreteInputsRequest,
  parseReadBitsResponse,
} from '../src/function-codes/read-bits.js';
import {
  buildReadHoldingRegistersRequest,
  buildReadInputRegistersRequest,
  parseReadRegistersResponse,
} from '../src/function-codes/read-registers.js';
import {
  buildWriteSingleCoilRequest,
  parseWriteSingleCoilResponse,
} from '../src/function-codes/write-single-coil.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from '../src/function-codes/write-single-register.js';
import {
  buildWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsResponse,
} from '../src/function-codes/write-multiple-coils.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from '../src/function-codes/write-multiple-registers.js';

const bytes = (pdu: Uint8Array): number[] => Array.from(pdu);

describe('read bits (FC 0x01, 0x02)', () => {
  it('builds address and quantity big-endian', () => {
    expect(bytes(buildReadCoilsRequest(0x0013, 19))).toEqual([0x01, 0x00, 0x13, 0x00, 0x13]);
    expect(bytes(buildReadDiscreteInputsRequest(0x00c4, 22))).toEqual([0x02, 0x00, 0xc4, 0x00, 0x16]);
  });

  it('rejects a quantity outside 1-2000', () => {
    expect(() => buildReadCoilsRequest(0, 0)).toThrow('Quantity must be integer 1-2000, got 0');
    expect(() => buildReadCoilsRequest(0, 2001)).toThrow(RangeError);
  });

  it('rejects a range past 0xFFFF', () => {
    expect(() => buildReadCoilsRequest(0xfff0, 17)).toThrow(RangeError);
  });

  it('unpacks bits least significant first', () => {
    const pdu = new Uint8Array([0x01, 0x02, 0xcd, 0x01]);

    expect(parseReadBitsResponse(pdu, ModbusFunctionCode.READ_COILS, 10)).toEqual([
      true, false, true, true, false, false, true, true,
      true, false,
    ]);
  });

  it('rejects a byte count that does not match the quantity', () => {
    const pdu = new Uint8Array([0x02, 0x01, 0xff]);

    expect(() => parseReadBitsResponse(pdu, ModbusFunctionCode.READ_DISCRETE_INPUTS, 9)).toThrow(
      'Invalid byte count: expected 2, got 1'
    );
  });
});

describe('read registers (FC 0x03, 0x04)', () => {
  it('builds the request', () => {
    expect(bytes(buildReadHoldingRegistersRequest(0x006b, 3))).toEqual([0x03, 0x00, 0x6b, 0x00, 0x03]);
    expect(bytes(buildReadInputRegistersRequest(8, 1))).toEqual([0x04, 0x00, 0x08, 0x00, 0x01]);
  });

  it('rejects more than 125 registers', () => {
    expect(() => buildReadHoldingRegistersRequest(0, 126)).toThrow(
      'Quantity must be integer 1-125, got 126'
    );
  });

  it('decodes unsigned 16 bit values', () => {
    const pdu = new Uint8Array([0x03, 0x04, 0x02, 0x2b, 0xff, 0xff]);

    expect(parseReadRegistersResponse(pdu, ModbusFunctionCode.READ_HOLDING_REGISTERS, 2)).toEqual([
      0x022b, 0xffff,
    ]);
  });

  it('rejects a reply of the wrong length', () => {
    const pdu = new Uint8Array([0x04, 0x02, 0x00]);

    expect(() => parseReadRegistersResponse(pdu, ModbusFunctionCode.READ_INPUT_REGISTERS, 1)).toThrow(
      'Invalid PDU length: expected 4, got 3'
    );
  });
});

describe('write single coil (FC 0x05)', () => {
  it('encodes on as 0xFF00 and off as 0x0000', () => {
    expect(bytes(buildWriteSingleCoilRequest(0x00ac, true))).toEqual([0x05, 0x00, 0xac, 0xff, 0x00]);
    expect(bytes(buildWriteSingleCoilRequest(1, false))).toEqual([0x05, 0x00, 0x01, 0x00, 0x00]);
  });

  it('parses the echo', () => {
    expect(parseWriteSingleCoilResponse(new Uint8Array([0x05, 0x00, 0xac, 0xff, 0x00]))).toEqual({
      address: 0xac,
      value: true,
    });
  });

  it('rejects any other coil value', () => {
    expect(() => parseWriteSingleCoilResponse(new Uint8Array([0x05, 0x00, 0x01, 0x12, 0x34]))).toThrow(
      'Invalid coil value: expected 0xff00 or 0x0, got 0x1234'
    );
  });
});

describe('write single register (FC 0x06)', () => {
  it('builds and parses', () => {
    const pdu = buildWriteSingleRegisterRequest(0x0001, 0x0003);

    expect(bytes(pdu)).toEqual([0x06, 0x00, 0x01, 0x00, 0x03]);
    expect(parseWriteSingleRegisterResponse(pdu)).toEqual({ address: 1, value: 3 });
  });

  it('rejects a value above 0xFFFF', () => {
    expect(() => buildWriteSingleRegisterRequest(0, 0x10000)).toThrow('Value must be 0-65535, got 65536');
  });
});

describe('write multiple coils (FC 0x0F)', () => {
  it('packs coils into bytes', () => {
    const values = [true, false, true, true, false, false, true, true, true, false];

    expect(bytes(buildWriteMultipleCoilsRequest(0x0013, values))).toEqual([
      0x0f, 0x00, 0x13, 0x00, 0x0a, 0x02, 0xcd, 0x01,
    ]);
  });

  it('rejects an empty list', () => {
    expect(() => buildWriteMultipleCoilsRequest(0, [])).toThrow(RangeError);
  });

  it('parses start address and quantity', () => {
    expect(parseWriteMultipleCoilsResponse(new Uint8Array([0x0f, 0x00, 0x13, 0x00, 0x0a]))).toEqual({
      startAddress: 0x13,
      quantity: 10,
    });
  });
});

describe('write multiple registers (FC 0x10)', () => {
  it('builds the request with a byte count', () => {
    expect(bytes(buildWriteMultipleRegistersRequest(0x0001, [0x000a, 0x0102]))).toEqual([
      0x10, 0x00, 0x01, 0x00, 0x02, 0x04, 0x00, 0x0a, 0x01, 0x02,
    ]);
  });

  it('rejects more than 123 registers', () => {
    expect(() => buildWriteMultipleRegistersRequest(0, new Array<number>(124).fill(0))).toThrow(
      'Quantity must be integer 1-123, got 124'
    );
  });

  it('parses start address and quantity', () => {
    expect(parseWriteMultipleRegistersResponse(new Uint8Array([0x10, 0x00, 0x01, 0x00, 0x02]))).toEqual({
      startAddress: 1,
      quantity: 2,
    });
  });

  it('rejects a reply for another function', () => {
    expect(() => parseWriteMultipleRegistersResponse(new Uint8Array([0x0f, 0x00, 0x01, 0x00, 0x02]))).toThrow(
      'Invalid function code: expected 0x10, got 0xf'
    );
  });
});
