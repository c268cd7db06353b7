// src/function-codes/common.ts

const MIN_ADDRESS = 0;
const MAX_ADDRESS = 0xffff;

/**
 * Валидация адреса регистра / катушки
 */
export function validateAddress(address: number): void {
  if (!Number.isInteger(address) || address < MIN_ADDRESS || address > MAX_ADDRESS) {
    throw new RangeError(`Address must be ${MIN_ADDRESS}-${MAX_ADDRESS}, got ${address}`);
  }
}

export function validateQuantity(quantity: number, min: number, max: number): void {
  if (!Number.isInteger(quantity) || quantity < min || quantity > max) {
    throw new RangeError(`Quantity must be integer ${min}-${max}, got ${quantity}`);
  }
}

/** Адрес + количество не должны выходить за 0xFFFF */
export function validateRange(startAddress: number, quantity: number): void {
  if (startAddress + quantity - 1 > MAX_ADDRESS) {
    throw new RangeError(
      `Address range ${startAddress}+${quantity} exceeds 0x${MAX_ADDRESS.toString(16)}`
    );
  }
}

/**
 * Проверяет код функции и точную длину ответа
 */
export function expectPdu(pdu: Uint8Array, functionCode: number, length: number): DataView {
  if (pdu[0] !== functionCode) {
    throw new Error(
      `Invalid function code: expected 0x${functionCode.toString(16)}, got 0x${pdu[0]?.toString(16)}`
    );
  }
  if (pdu.length !== length) {
    throw new Error(`Invalid PDU length: expected ${length}, got ${pdu.length}`);
  }
  // Используем оригинальный буфер без копирования
  return new DataView(pdu.buffer, pdu.byteOffset, pdu.length);
}

/**
 * Builds `fc | address(BE) | word(BE)`, the layout shared by reads and single writes.
 */
export function buildAddressWordPdu(functionCode: number, address: number, word: number): Uint8Array {
  const buffer = new ArrayBuffer(5);
  const view = new DataView(buffer);
  view.setUint8(0, functionCode);
  view.setUint16(1, address, false); // Big-endian
  view.setUint16(3, word, false); // Big-endian
  return new Uint8Array(buffer);
}
