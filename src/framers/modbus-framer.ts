// src/framers/modbus-framer.ts

/**
 * Контекст для разбора ответа (например, чтобы проверить соответствие Transaction ID в TCP)
 */
export interface FramerContext {
  transactionId: number;
}

/**
 * Заголовок ответа, достаточный чтобы узнать полную длину кадра
 */
export interface FrameHeader {
  transactionId: number;
  /** Полная длина кадра в байтах, включая заголовок */
  frameLength: number;
}

/**
 * Общий интерфейс для формирования и разбора пакетов (ADU)
 */
export interface ModbusFramer {
  /** Размер заголовка, который отрезается перед передачей PDU запросу */
  readonly headerSize: number;

  /**
   * Обертывает PDU в заголовок (ADU)
   */
  buildAdu(unitId: number, pdu: Uint8Array, context: FramerContext): Uint8Array;

  /**
   * Проверяет заголовок ответа. Возвращает null, пока байтов недостаточно.
   * Бросает ModbusResponseError, если заголовок не подходит к запросу.
   */
  parseHeader(data: Uint8Array, context: FramerContext): FrameHeader | null;
}
