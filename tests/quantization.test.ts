import { describe, expect, it } from 'vitest';
import {
  dequantize,
  getQuantizationRange,
  isKnownProductType,
  PRODUCT_TYPES,
  quantize,
} from '../src/services/rda/quantization';

describe('getQuantizationRange', () => {
  it('returns the fixed table entries', () => {
    expect(getQuantizationRange('velocity')).toEqual({ min: -100, max: 100 });
    expect(getQuantizationRange('spectrum_width')).toEqual({ min: 0, max: 64 });
    expect(getQuantizationRange('differential_reflectivity')).toEqual({ min: -8, max: 8 });
    expect(getQuantizationRange('differential_phase')).toEqual({ min: 0, max: 360 });
    expect(getQuantizationRange('cross_correlation_ratio')).toEqual({ min: 0, max: 1.1 });
    expect(getQuantizationRange('reflectivity')).toEqual({ min: -32, max: 95 });
  });

  it('falls back to the reflectivity range for unknown products', () => {
    expect(getQuantizationRange('correlation_coefficient')).toEqual({ min: -32, max: 95 });
    expect(getQuantizationRange('')).toEqual({ min: -32, max: 95 });
    expect(isKnownProductType('correlation_coefficient')).toBe(false);
  });
});

describe('dequantize', () => {
  it('maps the byte extremes onto the reflectivity range', () => {
    expect(dequantize('reflectivity', 0)).toBe(-32);
    expect(dequantize('reflectivity', 255)).toBe(95);
  });

  it('is the linear map min + b/255 * (max - min)', () => {
    expect(dequantize('velocity', 51)).toBeCloseTo(-60, 10);
    expect(dequantize('differential_phase', 85)).toBeCloseTo(120, 10);
    expect(dequantize('reflectivity', 128)).toBeCloseTo(31.749, 3);
  });

  it('is monotonic and stays within range for every product and byte', () => {
    for (const product of [...PRODUCT_TYPES, 'unknown_product']) {
      const { min, max } = getQuantizationRange(product);
      expect(dequantize(product, 0)).toBe(min);
      expect(dequantize(product, 255)).toBe(max);

      let previous = -Infinity;
      for (let b = 0; b <= 255; b++) {
        const v = dequantize(product, b);
        expect(v).toBeGreaterThanOrEqual(previous);
        expect(v).toBeGreaterThanOrEqual(min);
        expect(v).toBeLessThanOrEqual(max);
        previous = v;
      }
    }
  });
});

describe('quantize', () => {
  it('inverts dequantize on every level', () => {
    for (const product of PRODUCT_TYPES) {
      for (let b = 0; b <= 255; b++) {
        expect(quantize(product, dequantize(product, b))).toBe(b);
      }
    }
  });

  it('clamps values outside the range', () => {
    expect(quantize('reflectivity', -100)).toBe(0);
    expect(quantize('reflectivity', 500)).toBe(255);
  });
});
