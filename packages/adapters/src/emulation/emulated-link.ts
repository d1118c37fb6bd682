import { setTimeout as sleep } from 'node:timers/promises';
import { EncodeError, LinkError } from '@trackside/domain';
import type { ByteSource, LinkConnector } from '@trackside/domain';
import type { Emulator } from '@trackside/codec';

export interface EmulatedLinkOptions {
  /** Wall-clock delay between emulator ticks. */
  intervalMs: number;
}

/**
 * Emulator tick loop presented as a byte stream: each tick's frame is handed
 * out through `read`, so emulated telemetry goes through the same framer and
 * decoder as the radio link.
 */
export class EmulatedByteSource implements ByteSource {
  readonly description = 'emulator';
  private pending: Uint8Array = new Uint8Array(0);
  private closed = false;

  constructor(
    private readonly emulator: Emulator,
    private readonly options: EmulatedLinkOptions,
  ) {}

  async read(buffer: Uint8Array, signal: AbortSignal): Promise<number> {
    while (this.pending.length === 0) {
      if (this.closed) return 0;
      try {
        await sleep(this.options.intervalMs, undefined, { signal });
      } catch (err) {
        throw signal.reason instanceof LinkError
          ? signal.reason
          : new LinkError('dropped', 'emulator read aborted', { cause: err });
      }
      if (this.closed) return 0;

      try {
        this.pending = this.emulator.tick();
      } catch (err) {
        if (!(err instanceof EncodeError)) throw err;
        console.warn(`[emulator] tick ${this.emulator.ticks - 1} skipped: ${err.message}`);
      }
    }

    const n = Math.min(buffer.length, this.pending.length);
    buffer.set(this.pending.subarray(0, n), 0);
    this.pending = this.pending.subarray(n);
    return n;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending = new Uint8Array(0);
  }
}

export class EmulatedLinkConnector implements LinkConnector {
  readonly description = 'emulator';

  constructor(
    private readonly emulator: Emulator,
    private readonly options: EmulatedLinkOptions,
  ) {}

  async open(signal: AbortSignal): Promise<ByteSource> {
    if (signal.aborted) throw new LinkError('dropped', 'emulator open aborted', { cause: signal.reason });
    return new EmulatedByteSource(this.emulator, this.options);
  }
}
