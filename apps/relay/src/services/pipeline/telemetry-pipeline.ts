import { DecodeError } from '@trackside/domain';
import type { ClockPort, Frame, Reading, ReadingBatch, ReadingPublisherPort, Schema } from '@trackside/domain';
import { decodeFrame } from '@trackside/codec';
import type { SchemaProvider } from '@trackside/codec';

export interface PipelineCounters {
  decodedFrames: number;
  droppedFrames: number;
  invalidReadings: number;
  lastFrameAt: number | null;
  lastDropReason: string | null;
}

const DROP_LOG_EVERY = 100;

/**
 * Frame → ReadingBatch → hub. Runs synchronously inside the link loop so
 * batches are published in the order frames arrived. Malformed frames are
 * counted and dropped; they never escape as exceptions.
 */
export class TelemetryPipeline {
  private readonly latest = new Map<string, Reading>();
  private readonly counters: PipelineCounters = {
    decodedFrames: 0,
    droppedFrames: 0,
    invalidReadings: 0,
    lastFrameAt: null,
    lastDropReason: null,
  };

  constructor(
    private readonly schemas: SchemaProvider,
    private readonly publisher: ReadingPublisherPort,
    private readonly clock: ClockPort,
  ) {}

  handleFrame(frame: Frame): void {
    // Captured once: a schema swap mid-frame does not affect this decode.
    const schema = this.schemas.current;
    const receivedAt = this.clock.now().getTime();

    let batch: ReadingBatch;
    try {
      batch = decodeFrame(frame, schema, { receivedAt });
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.counters.droppedFrames++;
      this.counters.lastDropReason = err.message;
      if (this.counters.droppedFrames % DROP_LOG_EVERY === 1) {
        console.warn(`[pipeline] dropped frame (${this.counters.droppedFrames} so far): ${err.message}`);
      }
      return;
    }

    this.counters.decodedFrames++;
    this.counters.lastFrameAt = receivedAt;
    for (const reading of batch.readings) {
      if (!reading.valid) this.counters.invalidReadings++;
      this.latest.set(reading.sensorId, reading);
    }
    this.publisher.publish(batch);
  }

  /** Forget latest readings for sensors the new schema no longer carries. */
  retain(schema: Schema): void {
    for (const sensorId of [...this.latest.keys()]) {
      if (!schema.lookup(sensorId)?.enable) this.latest.delete(sensorId);
    }
  }

  latestReading(sensorId: string): Reading | undefined {
    return this.latest.get(sensorId);
  }

  stats(): Readonly<PipelineCounters> {
    return { ...this.counters };
  }
}
