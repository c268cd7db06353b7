// test/helpers/mock-net.ts
// In-process stand-in for the 'net' module: sockets are EventEmitters whose
// connect outcome is chosen per host and whose writes go to a responder.

import { EventEmitter } from 'events';

export type ConnectBehavior = 'accept' | 'refuse' | 'hang';

export type Responder = (socket: MockSocket, data: Uint8Array) => void;

export interface NetState {
  defaultBehavior: ConnectBehavior;
  behaviors: Map<string, ConnectBehavior>;
  responder: Responder | null;
  writeError: Error | null;
  sockets: MockSocket[];
}

export const netState: NetState = {
  defaultBehavior: 'accept',
  behaviors: new Map(),
  responder: null,
  writeError: null,
  sockets: [],
};

export function resetNetState(): void {
  netState.defaultBehavior = 'accept';
  netState.behaviors.clear();
  netState.responder = null;
  netState.writeError = null;
  netState.sockets = [];
}

export class MockSocket extends EventEmitter {
  public readonly host: string;
  public readonly port: number;
  public readonly written: Uint8Array[] = [];
  public destroyed = false;
  public noDelay = false;

  constructor(host: string, port: number) {
    super();
    this.host = host;
    this.port = port;
  }

  setNoDelay(noDelay: boolean = true): this {
    this.noDelay = noDelay;
    return this;
  }

  write(data: Uint8Array, callback?: (err?: Error | null) => void): boolean {
    const chunk = new Uint8Array(data);
    const err = netState.writeError;
    if (!err) this.written.push(chunk);
    queueMicrotask(() => {
      callback?.(err);
      if (!err) netState.responder?.(this, chunk);
    });
    return err === null;
  }

  /** Delivers bytes as if they came from the server */
  reply(bytes: number[] | Uint8Array): void {
    this.emit('data', Buffer.from(bytes));
  }

  /** Server side closes the connection */
  peerClose(): void {
    this.destroyed = true;
    this.emit('close', false);
  }

  fail(message: string): void {
    this.emit('error', new Error(message));
  }

  destroy(): this {
    if (this.destroyed) return this;
    this.destroyed = true;
    queueMicrotask(() => this.emit('close', false));
    return this;
  }
}

export function connectMock(options: { host: string; port: number }): MockSocket {
  const { host, port } = options;
  const socket = new MockSocket(host, port);
  netState.sockets.push(socket);

  const behavior = netState.behaviors.get(host) ?? netState.defaultBehavior;
  if (behavior === 'accept') {
    queueMicrotask(() => socket.emit('connect'));
  } else if (behavior === 'refuse') {
    queueMicrotask(() => socket.emit('error', new Error(`connect ECONNREFUSED ${host}:${port}`)));
  }
  return socket;
}

export function createNetModule(): Record<string, unknown> {
  const api = { connect: connectMock, createConnection: connectMock };
  return { ...api, default: api };
}

/** Lets queued microtasks and socket events run */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Builds a reply frame: MBAP header echoing `transactionId`, then `pdu`.
 */
export function mbapFrame(transactionId: number, unitId: number, pdu: number[]): number[] {
  const length = pdu.length + 1;
  return [
    (transactionId >> 8) & 0xff,
    transactionId & 0xff,
    0,
    0,
    (length >> 8) & 0xff,
    length & 0xff,
    unitId,
    ...pdu,
  ];
}
