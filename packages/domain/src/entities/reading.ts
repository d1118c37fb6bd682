/** Value carried by a reading whose field was missing from the frame. */
export const MISSING_VALUE = Number.NaN;

export interface Reading {
  readonly sensorId: string;
  readonly value: number;
  readonly timestamp: number; // epoch ms
  readonly valid: boolean;
}

export interface ReadingBatch {
  readonly schemaVersion: string;
  readonly frameTimestamp: number; // epoch ms
  readonly receivedAt: number; // epoch ms
  readonly readings: readonly Reading[];
}
