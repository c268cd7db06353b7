import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ModbusResponseCode } from '../src/constants/constants.js';
import { ModbusPduRequest } from '../src/request/modbus-request.js';
import { readHoldingRegistersRequest } from '../src/request/requests.js';
import { TcpResponse, TcpResponseState } from '../src/tcp-response.js';
import { mbapFrame } from './helpers/mock-net.js';

// Reply to "read 2 holding registers": values 10 and 11
const REPLY_PDU = [0x03, 0x04, 0x00, 0x0a, 0x00, 0x0b];

describe('TcpResponse', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function pending(transactionId = 5, timeout = 1000) {
    const request = readHoldingRegistersRequest(0, 2);
    const response = new TcpResponse(request, { transactionId, timeout });
    return { request, response };
  }

  it('resolves when the whole frame arrives in one chunk', async () => {
    const { request, response } = pending();

    response.addResponseData(new Uint8Array(mbapFrame(5, 1, REPLY_PDU)));

    expect(response.state).toBe(TcpResponseState.RESOLVED);
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
    expect(request.value).toEqual([10, 11]);
  });

  it('assembles a frame delivered one byte at a time', async () => {
    const { request, response } = pending();
    const frame = mbapFrame(5, 1, REPLY_PDU);

    frame.forEach((byte, i) => {
      if (i === 5) expect(response.state).toBe(TcpResponseState.AWAITING_HEADER);
      if (i === 6) expect(response.state).toBe(TcpResponseState.AWAITING_BODY);
      expect(request.isSettled).toBe(false);
      response.addResponseData(new Uint8Array([byte]));
    });

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
    expect(request.value).toEqual([10, 11]);
  });

  it('assembles a frame delivered in 3 byte chunks', async () => {
    const { request, response } = pending();
    const frame = mbapFrame(5, 1, REPLY_PDU);

    for (let i = 0; i < frame.length; i += 3) {
      response.addResponseData(new Uint8Array(frame.slice(i, i + 3)));
    }

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
    expect(request.value).toEqual([10, 11]);
  });

  it('assembles a frame of the largest declared length fed one byte at a time', async () => {
    const request = new ModbusPduRequest(
      new Uint8Array([0x03, 0x00, 0x00, 0x00, 0x01]),
      pdu => pdu.length
    );
    const response = new TcpResponse(request, { transactionId: 5, timeout: 1000 });
    // Length 0xFFFF: unit id plus a 65534 byte PDU, 65541 bytes on the wire
    const frame = new Uint8Array(6 + 0xffff);
    frame.set([0x00, 0x05, 0x00, 0x00, 0xff, 0xff, 0x01, 0x03]);

    for (let i = 0; i < frame.length - 1; i++) {
      response.addResponseData(frame.subarray(i, i + 1));
    }
    expect(response.state).toBe(TcpResponseState.AWAITING_BODY);
    expect(response.bufferedLength).toBe(65540);

    response.addResponseData(frame.subarray(frame.length - 1));

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
    expect(request.value).toBe(65534);
  });

  it('drops bytes past the declared frame end', async () => {
    const { request, response } = pending();

    response.addResponseData(new Uint8Array([...mbapFrame(5, 1, REPLY_PDU), 0xff, 0xff]));

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
    expect(request.value).toEqual([10, 11]);
  });

  it('fails on a transaction id mismatch without decoding the reply', async () => {
    const parser = vi.fn((pdu: Uint8Array) => pdu.length);
    const request = new ModbusPduRequest(new Uint8Array([0x03, 0x00, 0x00, 0x00, 0x02]), parser);
    const response = new TcpResponse(request, { transactionId: 5, timeout: 1000 });

    response.addResponseData(new Uint8Array(mbapFrame(6, 1, REPLY_PDU)));

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_RX_FAILED);
    expect(parser).not.toHaveBeenCalled();
  });

  it('fails on a nonzero protocol id', async () => {
    const { request, response } = pending();
    const frame = mbapFrame(5, 1, REPLY_PDU);
    frame[3] = 0x01;

    response.addResponseData(new Uint8Array(frame));

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_RX_FAILED);
  });

  it('reports a device exception code', async () => {
    const { request, response } = pending();

    response.addResponseData(new Uint8Array(mbapFrame(5, 1, [0x83, 0x02])));

    expect(await request.responseCode).toBe(ModbusResponseCode.ILLEGAL_DATA_ADDRESS);
    expect(request.value).toBeUndefined();
  });

  it('times out when no complete frame arrives', async () => {
    const { request, response } = pending(5, 100);
    response.addResponseData(new Uint8Array([0x00, 0x05, 0x00]));

    vi.advanceTimersByTime(99);
    expect(request.isSettled).toBe(false);

    vi.advanceTimersByTime(1);
    expect(response.isResolved).toBe(true);
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_TIMEOUT);
  });

  it('ignores bytes that arrive after the timeout', async () => {
    const { request, response } = pending(5, 100);
    vi.advanceTimersByTime(100);

    response.addResponseData(new Uint8Array(mbapFrame(5, 1, REPLY_PDU)));

    expect(response.bufferedLength).toBe(0);
    expect(request.value).toBeUndefined();
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_TIMEOUT);
  });

  it('cancels the timer once the reply is decoded', async () => {
    const { request, response } = pending(5, 100);

    response.addResponseData(new Uint8Array(mbapFrame(5, 1, REPLY_PDU)));
    vi.advanceTimersByTime(500);

    expect(vi.getTimerCount()).toBe(0);
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_SUCCEED);
  });

  it('resolves an aborted exchange as a receive failure, once', async () => {
    const { request, response } = pending();

    expect(response.abort('connection closed by peer')).toBe(true);
    expect(response.abort('connection closed by peer')).toBe(false);
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_RX_FAILED);
  });

  it('settles with the code given to fail()', async () => {
    const { request, response } = pending();

    expect(response.fail(ModbusResponseCode.REQUEST_TX_FAILED)).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_TX_FAILED);
  });

  it('treats a frame with no PDU as a receive failure', async () => {
    const { request, response } = pending();

    response.addResponseData(new Uint8Array(mbapFrame(5, 1, [])));

    expect(await request.responseCode).toBe(ModbusResponseCode.REQUEST_RX_FAILED);
  });
});
