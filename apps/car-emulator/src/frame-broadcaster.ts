import { EncodeError } from '@trackside/domain';
import type { Frame } from '@trackside/domain';
import type { Emulator } from '@trackside/codec';

/** The part of a net.Socket the broadcaster writes to. */
export interface FrameSink {
  readonly writableNeedDrain: boolean;
  readonly destroyed: boolean;
  write(chunk: Uint8Array): boolean;
}

export interface TickResult {
  frame: Frame | null;
  delivered: number;
  skipped: number;
}

/**
 * Ticks the emulator and writes each frame to every attached socket. A socket
 * still draining the previous frame misses this one instead of buffering.
 */
export class FrameBroadcaster {
  private readonly sinks = new Set<FrameSink>();
  private skippedFrames = 0;

  constructor(private readonly emulator: Emulator) {}

  get listeners(): number {
    return this.sinks.size;
  }

  get skipped(): number {
    return this.skippedFrames;
  }

  attach(sink: FrameSink): () => void {
    this.sinks.add(sink);
    return () => this.sinks.delete(sink);
  }

  tick(): TickResult {
    let frame: Frame;
    try {
      frame = this.emulator.tick();
    } catch (err) {
      if (!(err instanceof EncodeError)) throw err;
      console.warn(`[car-emulator] tick ${this.emulator.ticks - 1} skipped: ${err.message}`);
      return { frame: null, delivered: 0, skipped: 0 };
    }

    let delivered = 0;
    let skipped = 0;
    for (const sink of this.sinks) {
      if (sink.destroyed) {
        this.sinks.delete(sink);
        continue;
      }
      if (sink.writableNeedDrain) {
        skipped++;
        continue;
      }
      sink.write(frame);
      delivered++;
    }
    this.skippedFrames += skipped;
    return { frame, delivered, skipped };
  }
}
