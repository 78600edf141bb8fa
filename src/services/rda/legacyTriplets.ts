import type { TripletSummary } from './types';

/** [azimuth u16][range u16][value u8][reserved u16] */
export const TRIPLET_RECORD_BYTES = 7;
const VALUE_OFFSET = 4;

/**
 * Summarize a legacy 'q' payload without rebuilding a grid.
 *
 * Only whole records are counted; a trailing partial record is ignored.
 * The sample value is read at a fixed offset and is not checked against
 * the record layout; it is a diagnostic, nothing more.
 */
export function summarizeTriplets(payload: Uint8Array): TripletSummary {
  const recordCount = Math.floor(payload.length / TRIPLET_RECORD_BYTES);
  return {
    recordCount,
    sampleValue: payload.length > VALUE_OFFSET ? payload[VALUE_OFFSET] : null,
    trailingBytes: payload.length % TRIPLET_RECORD_BYTES,
  };
}
