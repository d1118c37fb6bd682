import { Socket } from 'node:net';
import { LinkError } from '@trackside/domain';
import type { ByteSource, LinkConnector } from '@trackside/domain';

const HIGH_WATER_BYTES = 64 * 1024;

export interface TcpLinkOptions {
  host: string;
  port: number;
  connectTimeoutMs?: number;
}

function abortError(signal: AbortSignal, what: string): LinkError {
  return signal.reason instanceof LinkError
    ? signal.reason
    : new LinkError('dropped', `${what} aborted`, { cause: signal.reason });
}

/**
 * Byte stream over a TCP socket, typically a serial/XBee-to-TCP bridge next
 * to the radio receiver. Incoming chunks are queued until `read` asks for them;
 * the socket is paused while the queue is above the high-water mark.
 */
export class TcpByteSource implements ByteSource {
  private readonly chunks: Buffer[] = [];
  private queuedBytes = 0;
  private ended = false;
  private failure: LinkError | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly socket: Socket,
    readonly description: string,
  ) {
    socket.on('data', (data: Buffer) => {
      this.chunks.push(data);
      this.queuedBytes += data.length;
      if (this.queuedBytes > HIGH_WATER_BYTES) socket.pause();
      this.notify();
    });
    socket.on('end', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('close', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('error', (err) => {
      this.failure = new LinkError('dropped', `${description}: ${err.message}`, { cause: err });
      this.notify();
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  async read(buffer: Uint8Array, signal: AbortSignal): Promise<number> {
    for (;;) {
      if (signal.aborted) throw abortError(signal, 'read');

      const head = this.chunks[0];
      if (head) {
        const n = Math.min(buffer.length, head.length);
        buffer.set(head.subarray(0, n), 0);
        if (n === head.length) this.chunks.shift();
        else this.chunks[0] = head.subarray(n);
        this.queuedBytes -= n;
        if (this.queuedBytes <= HIGH_WATER_BYTES && this.socket.isPaused()) this.socket.resume();
        return n;
      }
      if (this.failure) throw this.failure;
      if (this.ended) return 0;

      await new Promise<void>((resolve) => {
        const onAbort = (): void => {
          this.wake = null;
          resolve();
        };
        signal.addEventListener('abort', onAbort, { once: true });
        this.wake = () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        };
      });
    }
  }

  async close(): Promise<void> {
    this.ended = true;
    this.socket.destroy();
    this.notify();
  }
}

export class TcpLinkConnector implements LinkConnector {
  readonly description: string;

  constructor(private readonly options: TcpLinkOptions) {
    this.description = `tcp://${options.host}:${options.port}`;
  }

  open(signal: AbortSignal): Promise<ByteSource> {
    const { host, port, connectTimeoutMs = 5_000 } = this.options;

    return new Promise<ByteSource>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError(signal, 'connect'));
        return;
      }

      const socket = new Socket();
      const cleanup = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        socket.removeListener('error', onError);
      };
      const onAbort = (): void => {
        cleanup();
        socket.destroy();
        reject(abortError(signal, 'connect'));
      };
      const onError = (err: Error): void => {
        cleanup();
        socket.destroy();
        reject(new LinkError('refused', `${this.description}: ${err.message}`, { cause: err }));
      };
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new LinkError('timeout', `${this.description}: connect timed out after ${connectTimeoutMs} ms`));
      }, connectTimeoutMs);

      signal.addEventListener('abort', onAbort, { once: true });
      socket.once('error', onError);
      socket.connect(port, host, () => {
        cleanup();
        socket.setNoDelay(true);
        resolve(new TcpByteSource(socket, this.description));
      });
    });
  }
}
