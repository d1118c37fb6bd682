import { describe, it, expect } from '@jest/globals';
import { Socket } from 'node:net';
import { LinkError } from '@trackside/domain';
import { TcpByteSource, TcpLinkConnector } from '../tcp/tcp-link.js';

// The socket is never connected; events are emitted by hand.
function fixture(): { socket: Socket; source: TcpByteSource } {
  const socket = new Socket();
  return { socket, source: new TcpByteSource(socket, 'tcp://test:5005') };
}

const signal = (): AbortSignal => new AbortController().signal;

describe('TcpByteSource', () => {
  it('returns queued bytes, splitting chunks larger than the buffer', async () => {
    const { socket, source } = fixture();
    socket.emit('data', Buffer.from([1, 2, 3, 4, 5]));

    const buffer = new Uint8Array(3);
    expect(await source.read(buffer, signal())).toBe(3);
    expect([...buffer]).toEqual([1, 2, 3]);
    expect(await source.read(buffer, signal())).toBe(2);
    expect([...buffer.subarray(0, 2)]).toEqual([4, 5]);
    await source.close();
  });

  it('waits for data that arrives later', async () => {
    const { socket, source } = fixture();
    const buffer = new Uint8Array(8);
    const pending = source.read(buffer, signal());
    socket.emit('data', Buffer.from([9, 8]));
    expect(await pending).toBe(2);
    await source.close();
  });

  it('reports end of stream as zero bytes', async () => {
    const { socket, source } = fixture();
    const pending = source.read(new Uint8Array(8), signal());
    socket.emit('end');
    expect(await pending).toBe(0);
  });

  it('turns a socket error into a dropped LinkError', async () => {
    const { socket, source } = fixture();
    const pending = source.read(new Uint8Array(8), signal());
    socket.emit('error', new Error('ECONNRESET'));
    await expect(pending).rejects.toMatchObject({
      kind: 'dropped',
      message: 'dropped: tcp://test:5005: ECONNRESET',
    });
  });

  it('rejects with the abort reason', async () => {
    const { source } = fixture();
    const controller = new AbortController();
    const reason = new LinkError('timeout', 'no data');
    const pending = source.read(new Uint8Array(8), controller.signal);
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });
});

describe('TcpLinkConnector', () => {
  it('describes its endpoint', () => {
    expect(new TcpLinkConnector({ host: '10.0.0.2', port: 5005 }).description).toBe('tcp://10.0.0.2:5005');
  });

  it('does not dial when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      new TcpLinkConnector({ host: '10.0.0.2', port: 5005 }).open(controller.signal),
    ).rejects.toBeInstanceOf(LinkError);
  });
});
