/**
 * Color tables for each radar product, in the product's physical units.
 * Each stop defines: value threshold, RGBA color.
 * Colors are applied to values >= the stop's value and < the next stop's value.
 */

import { getQuantizationRange, isKnownProductType, type KnownProductType } from '../rda/quantization';

export interface ColorStop {
  value: number;
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Reflectivity (dBZ) color table - NWS standard.
 * Range: -30 to 75+ dBZ
 */
export const REF_COLOR_TABLE: ColorStop[] = [
  // Light returns
  { value: -30, r: 0, g: 0, b: 0, a: 0 },
  { value: 5, r: 40, g: 40, b: 40, a: 0.6 },
  // Greens (light to moderate rain)
  { value: 10, r: 0, g: 100, b: 0, a: 0.85 },
  { value: 15, r: 0, g: 140, b: 0, a: 0.85 },
  { value: 20, r: 0, g: 180, b: 0, a: 0.85 },
  { value: 25, r: 0, g: 220, b: 0, a: 0.85 },
  { value: 30, r: 0, g: 255, b: 0, a: 0.85 },
  // Yellows (moderate to heavy rain)
  { value: 35, r: 255, g: 255, b: 0, a: 0.85 },
  { value: 40, r: 230, g: 190, b: 0, a: 0.85 },
  // Oranges/Reds (heavy rain, possible hail)
  { value: 45, r: 255, g: 144, b: 0, a: 0.85 },
  { value: 50, r: 255, g: 0, b: 0, a: 0.85 },
  { value: 55, r: 200, g: 0, b: 0, a: 0.85 },
  // Magentas/Purples (extreme, large hail)
  { value: 60, r: 180, g: 0, b: 180, a: 0.85 },
  { value: 65, r: 255, g: 0, b: 255, a: 0.85 },
  // Whites (extremely intense)
  { value: 70, r: 255, g: 200, b: 200, a: 0.85 },
  { value: 75, r: 255, g: 255, b: 255, a: 0.85 },
];

/**
 * Velocity (m/s) color table - NWS standard.
 * Negative = inbound (toward radar, greens)
 * Positive = outbound (away from radar, reds)
 * Snapshots quantize velocity over ±100 m/s, so the end stops open the table.
 */
export const VEL_COLOR_TABLE: ColorStop[] = [
  { value: -100, r: 0, g: 255, b: 0, a: 0.85 },
  { value: -50, r: 0, g: 220, b: 0, a: 0.85 },
  { value: -40, r: 0, g: 190, b: 0, a: 0.85 },
  { value: -30, r: 0, g: 160, b: 0, a: 0.85 },
  { value: -20, r: 0, g: 130, b: 0, a: 0.85 },
  { value: -15, r: 0, g: 110, b: 0, a: 0.85 },
  { value: -10, r: 0, g: 90, b: 0, a: 0.85 },
  { value: -5, r: 0, g: 70, b: 0, a: 0.85 },
  // Near zero (gray)
  { value: -1, r: 80, g: 80, b: 80, a: 0.5 },
  { value: 1, r: 80, g: 80, b: 80, a: 0.5 },
  { value: 5, r: 70, g: 0, b: 0, a: 0.85 },
  { value: 10, r: 90, g: 0, b: 0, a: 0.85 },
  { value: 15, r: 110, g: 0, b: 0, a: 0.85 },
  { value: 20, r: 130, g: 0, b: 0, a: 0.85 },
  { value: 30, r: 160, g: 0, b: 0, a: 0.85 },
  { value: 40, r: 190, g: 0, b: 0, a: 0.85 },
  { value: 50, r: 220, g: 0, b: 0, a: 0.85 },
  { value: 64, r: 255, g: 0, b: 0, a: 0.85 },
];

/** Spectrum width (m/s): quiet grays into turbulent oranges. */
export const SW_COLOR_TABLE: ColorStop[] = [
  { value: 0, r: 60, g: 60, b: 60, a: 0.6 },
  { value: 2, r: 110, g: 110, b: 110, a: 0.8 },
  { value: 4, r: 0, g: 140, b: 200, a: 0.85 },
  { value: 8, r: 0, g: 200, b: 120, a: 0.85 },
  { value: 12, r: 255, g: 220, b: 0, a: 0.85 },
  { value: 16, r: 255, g: 140, b: 0, a: 0.85 },
  { value: 24, r: 220, g: 0, b: 0, a: 0.85 },
  { value: 32, r: 255, g: 255, b: 255, a: 0.85 },
];

/** Differential reflectivity (dB). */
export const ZDR_COLOR_TABLE: ColorStop[] = [
  { value: -8, r: 40, g: 40, b: 40, a: 0.7 },
  { value: -2, r: 120, g: 120, b: 180, a: 0.85 },
  { value: -0.5, r: 200, g: 200, b: 200, a: 0.85 },
  { value: 0.5, r: 0, g: 160, b: 255, a: 0.85 },
  { value: 1.5, r: 0, g: 200, b: 0, a: 0.85 },
  { value: 2.5, r: 255, g: 255, b: 0, a: 0.85 },
  { value: 4, r: 255, g: 128, b: 0, a: 0.85 },
  { value: 6, r: 255, g: 0, b: 255, a: 0.85 },
];

/** Differential phase (degrees). */
export const PHI_COLOR_TABLE: ColorStop[] = [
  { value: 0, r: 50, g: 0, b: 120, a: 0.85 },
  { value: 60, r: 0, g: 80, b: 220, a: 0.85 },
  { value: 120, r: 0, g: 190, b: 190, a: 0.85 },
  { value: 180, r: 0, g: 200, b: 0, a: 0.85 },
  { value: 240, r: 255, g: 230, b: 0, a: 0.85 },
  { value: 300, r: 255, g: 90, b: 0, a: 0.85 },
];

/** Cross-correlation ratio (unitless). Non-meteorological echoes sit below ~0.8. */
export const CC_COLOR_TABLE: ColorStop[] = [
  { value: 0, r: 30, g: 30, b: 30, a: 0.6 },
  { value: 0.5, r: 90, g: 50, b: 140, a: 0.85 },
  { value: 0.7, r: 0, g: 80, b: 220, a: 0.85 },
  { value: 0.85, r: 0, g: 200, b: 200, a: 0.85 },
  { value: 0.9, r: 0, g: 200, b: 0, a: 0.85 },
  { value: 0.95, r: 255, g: 230, b: 0, a: 0.85 },
  { value: 0.97, r: 255, g: 120, b: 0, a: 0.85 },
  { value: 0.99, r: 220, g: 0, b: 0, a: 0.85 },
  { value: 1.02, r: 255, g: 170, b: 255, a: 0.85 },
];

export const PRODUCT_COLOR_TABLES: Readonly<Record<KnownProductType, ColorStop[]>> = {
  reflectivity: REF_COLOR_TABLE,
  velocity: VEL_COLOR_TABLE,
  spectrum_width: SW_COLOR_TABLE,
  differential_reflectivity: ZDR_COLOR_TABLE,
  differential_phase: PHI_COLOR_TABLE,
  cross_correlation_ratio: CC_COLOR_TABLE,
};

const GRAYSCALE_STEPS = 16;

/** Evenly spaced gray stops spanning [min, max). */
export function grayscaleTable(min: number, max: number, steps = GRAYSCALE_STEPS): ColorStop[] {
  const stops: ColorStop[] = [];
  for (let i = 0; i < steps; i++) {
    const level = Math.round(40 + (215 * i) / (steps - 1));
    stops.push({ value: min + ((max - min) * i) / steps, r: level, g: level, b: level, a: 0.85 });
  }
  return stops;
}

/**
 * Color table for a product. Products outside the known set get a grayscale
 * ramp over the range they are dequantized into.
 */
export function getColorTable(productType: string): ColorStop[] {
  if (isKnownProductType(productType)) return PRODUCT_COLOR_TABLES[productType];
  const { min, max } = getQuantizationRange(productType);
  return grayscaleTable(min, max);
}
