import { FRAME_HEADER_LENGTH, FRAME_TRAILER_LENGTH } from '@trackside/domain';
import type { Frame } from '@trackside/domain';
import { checksum } from './frame-codec.js';

export interface FramerOptions {
  startByte: number;
  /** Largest payload length accepted before a candidate is treated as garbage. */
  maxPayloadLength: number;
}

/**
 * Cuts a raw byte stream into frames. Bytes that do not start a frame with a
 * plausible length and a matching checksum are skipped one at a time until the
 * next start marker lines up.
 */
export class FrameFramer {
  private buffer: Uint8Array = new Uint8Array(0);
  private discarded = 0;

  constructor(private readonly options: FramerOptions) {}

  get startByte(): number {
    return this.options.startByte;
  }

  get maxPayloadLength(): number {
    return this.options.maxPayloadLength;
  }

  get discardedBytes(): number {
    return this.discarded;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): Frame[] {
    this.buffer = concat(this.buffer, chunk);
    const frames: Frame[] = [];

    let index = 0;
    while (index < this.buffer.length) {
      if (this.buffer[index] !== this.options.startByte) {
        index++;
        this.discarded++;
        continue;
      }
      if (this.buffer.length - index < FRAME_HEADER_LENGTH) break;

      const payloadLength = (this.buffer[index + 2] ?? 0) | ((this.buffer[index + 3] ?? 0) << 8);
      if (payloadLength > this.options.maxPayloadLength) {
        index++;
        this.discarded++;
        continue;
      }

      const frameLength = FRAME_HEADER_LENGTH + payloadLength + FRAME_TRAILER_LENGTH;
      if (this.buffer.length - index < frameLength) break;

      const payloadEnd = index + FRAME_HEADER_LENGTH + payloadLength;
      if (this.buffer[payloadEnd] !== checksum(this.buffer, index + 1, payloadEnd)) {
        index++;
        this.discarded++;
        continue;
      }

      frames.push(this.buffer.slice(index, index + frameLength));
      index += frameLength;
    }

    this.buffer = this.buffer.slice(index);
    return frames;
  }

  /** Drop any partially buffered frame, e.g. after the link went down mid-frame. */
  reset(): void {
    this.buffer = new Uint8Array(0);
  }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length === 0) return b.slice();
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
