/**
 * One framed record as received from the link:
 *
 *   [start][frame id][payload length u16 LE][presence bitfield][f64 epoch s][fields...][xor checksum]
 *
 * Fields follow schema declaration order, little-endian.
 */
export type Frame = Uint8Array;

export const FRAME_HEADER_LENGTH = 4;
export const FRAME_TIMESTAMP_LENGTH = 8;
export const FRAME_TRAILER_LENGTH = 1;
