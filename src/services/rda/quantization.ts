/**
 * 8-bit quantization ranges for each radar product.
 *
 * Snapshots store one byte per gate; the byte maps linearly onto the
 * product's physical range, 0 → min and 255 → max.
 */

export interface QuantizationRange {
  min: number;
  max: number;
}

export const PRODUCT_TYPES = [
  'reflectivity',
  'velocity',
  'spectrum_width',
  'differential_reflectivity',
  'differential_phase',
  'cross_correlation_ratio',
] as const;

export type KnownProductType = (typeof PRODUCT_TYPES)[number];

export const DEFAULT_PRODUCT_TYPE: KnownProductType = 'reflectivity';

const QUANTIZATION_RANGES: Readonly<Record<KnownProductType, QuantizationRange>> = Object.freeze({
  reflectivity: { min: -32, max: 95 }, // dBZ
  velocity: { min: -100, max: 100 }, // m/s
  spectrum_width: { min: 0, max: 64 }, // m/s
  differential_reflectivity: { min: -8, max: 8 }, // dB
  differential_phase: { min: 0, max: 360 }, // degrees
  cross_correlation_ratio: { min: 0, max: 1.1 },
});

const LEVELS = 255;

export function isKnownProductType(product: string): product is KnownProductType {
  return PRODUCT_TYPES.some((known) => known === product);
}

/** Range for a product; anything unrecognized falls back to reflectivity. */
export function getQuantizationRange(productType: string): QuantizationRange {
  const key = isKnownProductType(productType) ? productType : DEFAULT_PRODUCT_TYPE;
  return QUANTIZATION_RANGES[key];
}

/**
 * Map a quantized byte to its physical value.
 * Monotonic in `byteValue`; the result never leaves [min, max].
 */
export function dequantize(productType: string, byteValue: number): number {
  const { min, max } = getQuantizationRange(productType);
  const value = min + (byteValue / LEVELS) * (max - min);
  return value < min ? min : value > max ? max : value;
}

/**
 * Inverse of dequantize: nearest of the 256 levels, clamped.
 * Only the snapshot writer needs this; the decoder never quantizes.
 */
export function quantize(productType: string, value: number): number {
  const { min, max } = getQuantizationRange(productType);
  const normalized = (value - min) / (max - min);
  const clamped = normalized < 0 ? 0 : normalized > 1 ? 1 : normalized;
  return Math.round(clamped * LEVELS);
}
