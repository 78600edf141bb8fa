import { describe, expect, it } from 'vitest';
import {
  bitmaskByteLength,
  decodeBitmaskGrid,
  gridValue,
  summarizeGrid,
} from '../src/services/rda/bitmaskGrid';
import { DataTooShortError, MalformedMetadataError } from '../src/services/rda/errors';
import { dequantize } from '../src/services/rda/quantization';
import { packCells } from './helpers/snapshotBuilder';

describe('bitmaskByteLength', () => {
  it('rounds the bit count up to whole bytes', () => {
    expect(bitmaskByteLength(2, 4)).toBe(1);
    expect(bitmaskByteLength(3, 3)).toBe(2);
    expect(bitmaskByteLength(720, 1832)).toBe(164880);
  });
});

describe('decodeBitmaskGrid', () => {
  it('places packed values on set bits, MSB first', () => {
    const payload = new Uint8Array([0b10110000, 0, 128, 255]);
    const grid = decodeBitmaskGrid(2, 4, 'reflectivity', payload);

    expect(gridValue(grid, 0, 0)).toBe(-32);
    expect(gridValue(grid, 0, 1)).toBe(0);
    expect(gridValue(grid, 0, 2)).toBeCloseTo(31.749, 3);
    expect(gridValue(grid, 0, 3)).toBe(95);
    for (let gate = 0; gate < 4; gate++) {
      expect(gridValue(grid, 1, gate)).toBe(0);
    }
    expect(grid.explicitCells).toBe(3);
    expect(grid.filledCells).toBe(3);
  });

  it('walks rays slowest and gates fastest', () => {
    // 3 rays x 3 gates: cells 1 (ray 0 gate 1) and 7 (ray 2 gate 1)
    const payload = new Uint8Array([0b01000001, 0b00000000, 51, 204]);
    const grid = decodeBitmaskGrid(3, 3, 'velocity', payload);

    expect(Array.from(grid.values)).toEqual([
      0, dequantize('velocity', 51), 0,
      0, 0, 0,
      0, dequantize('velocity', 204), 0,
    ]);
  });

  it('ignores padding bits past the last cell', () => {
    const payload = new Uint8Array([0b00000000, 0b01111111, 10]);
    const grid = decodeBitmaskGrid(3, 3, 'reflectivity', payload);

    expect(grid.explicitCells).toBe(0);
    expect(grid.values.every((v) => v === 0)).toBe(true);
  });

  it('leaves set cells at 0.0 once packed values run out', () => {
    const payload = new Uint8Array([0b11110000, 255, 255]);
    const grid = decodeBitmaskGrid(1, 8, 'reflectivity', payload);

    expect(Array.from(grid.values)).toEqual([95, 95, 0, 0, 0, 0, 0, 0]);
    expect(grid.explicitCells).toBe(4);
    expect(grid.filledCells).toBe(2);
  });

  it('ignores surplus packed values', () => {
    const payload = new Uint8Array([0b10000000, 255, 1, 2, 3]);
    const grid = decodeBitmaskGrid(1, 8, 'reflectivity', payload);
    expect(gridValue(grid, 0, 0)).toBe(95);
    expect(grid.filledCells).toBe(1);
  });

  it('decodes a bitmask with no packed values at all', () => {
    const grid = decodeBitmaskGrid(2, 4, 'reflectivity', new Uint8Array([0xff]));
    expect(grid.explicitCells).toBe(8);
    expect(grid.filledCells).toBe(0);
    expect(summarizeGrid(grid).nonZeroCells).toBe(0);
  });

  it('throws DataTooShort with both lengths when the bitmask is incomplete', () => {
    try {
      decodeBitmaskGrid(4, 10, 'reflectivity', new Uint8Array(4));
      expect.unreachable('decodeBitmaskGrid should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(DataTooShortError);
      expect(err).toMatchObject({
        required: 5,
        actual: 4,
        code: 'DATA_TOO_SHORT',
        message: 'Data too short: expected at least 5 bytes for bitmask, got 4',
      });
    }
  });

  it('rejects non-positive dimensions', () => {
    expect(() => decodeBitmaskGrid(0, 4, 'reflectivity', new Uint8Array(1))).toThrow(MalformedMetadataError);
    expect(() => decodeBitmaskGrid(2, 0, 'reflectivity', new Uint8Array(1))).toThrow(MalformedMetadataError);
    expect(() => decodeBitmaskGrid(2.5, 4, 'reflectivity', new Uint8Array(2))).toThrow(MalformedMetadataError);
  });

  it('matches a cell-by-cell reference decode on a larger grid', () => {
    const rays = 7;
    const gates = 13;
    const cells = new Map<number, number>();
    for (let i = 0; i < rays * gates; i++) {
      if ((i * 7) % 5 < 2) cells.set(i, (i * 37) % 256);
    }
    const grid = decodeBitmaskGrid(rays, gates, 'spectrum_width', packCells(rays, gates, cells));

    for (let i = 0; i < rays * gates; i++) {
      const byte = cells.get(i);
      const expected = byte === undefined ? 0 : dequantize('spectrum_width', byte);
      expect(gridValue(grid, Math.floor(i / gates), i % gates)).toBe(expected);
    }
    expect(grid.explicitCells).toBe(cells.size);
  });
});

describe('gridValue', () => {
  it('rejects out-of-range cells', () => {
    const grid = decodeBitmaskGrid(2, 4, 'reflectivity', new Uint8Array([0]));
    expect(() => gridValue(grid, 2, 0)).toThrow(RangeError);
    expect(() => gridValue(grid, 0, -1)).toThrow(RangeError);
  });
});

describe('summarizeGrid', () => {
  it('reports count and extrema over non-zero cells', () => {
    const grid = decodeBitmaskGrid(2, 4, 'reflectivity', new Uint8Array([0b10110000, 0, 128, 255]));
    const summary = summarizeGrid(grid);
    expect(summary.nonZeroCells).toBe(3);
    expect(summary.minValue).toBe(-32);
    expect(summary.maxValue).toBe(95);
  });

  it('returns null extrema for an empty grid', () => {
    const grid = decodeBitmaskGrid(1, 8, 'reflectivity', new Uint8Array([0]));
    expect(summarizeGrid(grid)).toEqual({ nonZeroCells: 0, minValue: null, maxValue: null });
  });
});
