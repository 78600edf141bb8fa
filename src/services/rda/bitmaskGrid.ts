import { DataTooShortError, MalformedMetadataError } from './errors';
import { dequantize } from './quantization';
import type { Grid, GridSummary } from './types';

export function bitmaskByteLength(rayCount: number, gateCount: number): number {
  return Math.ceil((rayCount * gateCount) / 8);
}

function assertDimension(name: string, key: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new MalformedMetadataError(`${name} must be a positive integer, got ${value}`, [key]);
  }
}

/**
 * Reconstruct a dense grid from a bitmask-compressed payload:
 *
 *   [ceil(rays*gates/8) bytes bitmask, MSB first][one byte per set bit]
 *
 * Cells are visited in row-major order (ray slowest, gate fastest). Each set
 * bit consumes the next packed byte. If the packed stream runs out, the
 * remaining set cells stay at 0.0; that truncation is silent by contract and
 * shows up only as `filledCells < explicitCells`.
 */
export function decodeBitmaskGrid(
  rayCount: number,
  gateCount: number,
  productType: string,
  payload: Uint8Array,
): Grid {
  assertDimension('ray count', 'r', rayCount);
  assertDimension('gate count', 'g', gateCount);

  const totalCells = rayCount * gateCount;
  const maskLength = bitmaskByteLength(rayCount, gateCount);
  if (payload.length < maskLength) {
    throw new DataTooShortError(maskLength, payload.length);
  }

  // 256-entry table built from dequantize(); same values as per-cell calls
  const lut = new Float64Array(256);
  for (let b = 0; b < 256; b++) lut[b] = dequantize(productType, b);

  const values = new Float64Array(totalCells);
  const packedEnd = payload.length;
  let cursor = maskLength;
  let explicitCells = 0;
  let filledCells = 0;

  for (let byteIdx = 0; byteIdx < maskLength; byteIdx++) {
    const maskByte = payload[byteIdx];
    if (maskByte === 0) continue;

    const base = byteIdx * 8;
    for (let bit = 0; bit < 8; bit++) {
      const cell = base + bit;
      if (cell >= totalCells) break; // padding bits in the last byte
      if (((maskByte >> (7 - bit)) & 1) === 0) continue;

      explicitCells++;
      if (cursor < packedEnd) {
        values[cell] = lut[payload[cursor++]];
        filledCells++;
      }
    }
  }

  return { rayCount, gateCount, values, explicitCells, filledCells };
}

/** Value at (ray, gate). */
export function gridValue(grid: Grid, ray: number, gate: number): number {
  if (ray < 0 || ray >= grid.rayCount || gate < 0 || gate >= grid.gateCount) {
    throw new RangeError(`Cell (${ray}, ${gate}) outside ${grid.rayCount}x${grid.gateCount} grid`);
  }
  return grid.values[ray * grid.gateCount + gate];
}

/**
 * Statistics over the non-zero cells. A decoded value of exactly 0.0 cannot be
 * told apart from an empty cell, so it is not counted.
 */
export function summarizeGrid(grid: Grid): GridSummary {
  let nonZeroCells = 0;
  let minValue = Infinity;
  let maxValue = -Infinity;

  for (const v of grid.values) {
    if (v === 0) continue;
    nonZeroCells++;
    if (v < minValue) minValue = v;
    if (v > maxValue) maxValue = v;
  }

  return nonZeroCells === 0
    ? { nonZeroCells, minValue: null, maxValue: null }
    : { nonZeroCells, minValue, maxValue };
}
