/**
 * Reverse scan conversion of a decoded ray × gate grid into an RGBA raster.
 *
 * For each output pixel: pixel → polar coords → (ray, gate) → color lookup.
 * Rays are spread evenly over 360° clockwise from north (ray 0 starts at
 * north); gate g spans [firstGate + g*gateSpacing, firstGate + (g+1)*gateSpacing)
 * metres. The image is scaled so the outer edge of the last gate touches the
 * image border.
 *
 * No DOM or canvas dependency; output is a plain RGBA byte array.
 */

import type { Grid } from '../rda/types';
import type { ColorStop } from './colorTables';

export interface PolarGeometry {
  firstGate: number;
  gateSpacing: number;
}

export interface RgbaImage {
  width: number;
  height: number;
  /** width * height * 4 bytes, row-major, top row first */
  data: Uint8Array;
}

export type Rgba = [number, number, number, number];

/**
 * Map a value to RGBA (0-255 per channel) using a color table.
 * Step lookup: the largest stop with stop.value <= value wins.
 * Returns null below the first stop.
 */
export function valueToRGBA(value: number, colorTable: ColorStop[]): Rgba | null {
  const len = colorTable.length;
  if (len === 0 || value < colorTable[0].value) return null;

  // Binary search: find largest i where colorTable[i].value <= value
  let lo = 0;
  let hi = len - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1; // Round up to avoid infinite loop
    if (colorTable[mid].value <= value) lo = mid;
    else hi = mid - 1;
  }

  const stop = colorTable[lo];
  return [stop.r, stop.g, stop.b, Math.round(stop.a * 255)];
}

/**
 * Locate the grid cell under a point given in metres east/north of the radar.
 * Returns null outside the scanned annulus.
 */
export function locateCell(
  eastM: number,
  northM: number,
  grid: Pick<Grid, 'rayCount' | 'gateCount'>,
  geometry: PolarGeometry,
): { ray: number; gate: number } | null {
  const rangeM = Math.sqrt(eastM * eastM + northM * northM);
  const g = Math.floor((rangeM - geometry.firstGate) / geometry.gateSpacing);
  if (g < 0 || g >= grid.gateCount) return null;

  // Azimuth: CW from north, [0, 2π)
  let az = Math.atan2(eastM, northM);
  if (az < 0) az += 2 * Math.PI;
  const ray = Math.min(Math.floor((az / (2 * Math.PI)) * grid.rayCount), grid.rayCount - 1);

  return { ray, gate: g };
}

/**
 * Rasterize `grid` into a square RGBA image of `size` pixels.
 * Cells holding exactly 0.0 are left transparent: the grid cannot tell an
 * explicit zero from an empty cell.
 */
export function rasterizePolarGrid(
  grid: Grid,
  geometry: PolarGeometry,
  colorTable: ColorStop[],
  size: number,
): RgbaImage {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Image size must be a positive integer, got ${size}`);
  }
  if (!(geometry.gateSpacing > 0)) {
    throw new RangeError(`Gate spacing must be positive, got ${geometry.gateSpacing}`);
  }

  const data = new Uint8Array(size * size * 4);
  const maxRangeM = geometry.firstGate + grid.gateCount * geometry.gateSpacing;
  if (!(maxRangeM > 0)) return { width: size, height: size, data };

  const center = size / 2;
  const mPerPx = maxRangeM / center;

  // At most 256 distinct values per product
  const colorCache = new Map<number, Rgba | null>();

  for (let y = 0; y < size; y++) {
    const northM = (center - (y + 0.5)) * mPerPx;
    const rowOffset = y * size * 4;

    for (let x = 0; x < size; x++) {
      const eastM = (x + 0.5 - center) * mPerPx;
      const cell = locateCell(eastM, northM, grid, geometry);
      if (!cell) continue;

      const value = grid.values[cell.ray * grid.gateCount + cell.gate];
      if (value === 0) continue;

      let color = colorCache.get(value);
      if (color === undefined) {
        color = valueToRGBA(value, colorTable);
        colorCache.set(value, color);
      }
      if (!color) continue;

      const o = rowOffset + x * 4;
      data[o] = color[0];
      data[o + 1] = color[1];
      data[o + 2] = color[2];
      data[o + 3] = color[3];
    }
  }

  return { width: size, height: size, data };
}
