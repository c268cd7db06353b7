// src/transport/discovery.ts

import { MODBUS_TCP_PORT } from '../constants/constants.js';
import { ModbusConfigError } from '../errors.js';
import { modbusLogger } from '../logger.js';
import type { DiscoverOptions } from '../types/modbus-types.js';
import NodeTcpTransport from './node-transports/node-tcp-transport.js';

const logger = modbusLogger.createLogger('Discovery');
// Отказы при переборе адресов ожидаемы, их ошибки не выводим
const PROBE_LOGGER = 'DiscoveryProbe';
modbusLogger.pauseCategory(PROBE_LOGGER);

const DEFAULT_PROBE_TIMEOUT = 10;
const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function parseIpv4(address: string): number[] {
  const match = IPV4_PATTERN.exec(address.trim());
  const octets = match ? match.slice(1).map(Number) : [];
  if (octets.length !== 4 || octets.some(octet => octet > 255)) {
    throw new ModbusConfigError(`Invalid IPv4 address: ${address}`);
  }
  return octets;
}

/**
 * Ищет Modbus TCP сервер, перебирая последний октет адреса от `startAddress` до .255.
 * Пробы идут строго по очереди, первый принявший соединение адрес возвращается.
 * @returns адрес найденного сервера или null
 */
export async function discover(
  startAddress: string,
  options: DiscoverOptions = {}
): Promise<string | null> {
  const [a, b, c, start] = parseIpv4(startAddress);
  const port = options.serverPort ?? MODBUS_TCP_PORT;
  const connectionTimeout = options.connectionTimeout ?? DEFAULT_PROBE_TIMEOUT;

  for (let d = start; d <= 255; d++) {
    const address = `${a}.${b}.${c}.${d}`;
    const probe = new NodeTcpTransport(address, port, {
      connectionTimeout,
      loggerName: PROBE_LOGGER,
    });
    if (await probe.connect()) {
      await probe.disconnect();
      logger.info(`Modbus TCP server found at ${address}:${port}`);
      return address;
    }
  }

  logger.info(`No Modbus TCP server found from ${startAddress} on port ${port}`);
  return null;
}
