import { z } from 'zod';
import { MalformedMetadataError, MissingGateCountError } from './errors';
import { DEFAULT_PRODUCT_TYPE } from './quantization';
import type { FormatTag, Metadata, RawMetadata } from './types';

export const DEFAULT_RAY_COUNT = 720;
export const DEFAULT_GATE_SPACING = 250;
export const DEFAULT_FIRST_GATE = 2125;

const count = z.number().int().nonnegative().nullish();
const finite = z.number().finite().nullish();
const text = z.string().nullish();

/**
 * Header keys as written by the frame storage writer. Unknown keys
 * (e.g. `tilts` on volumetric files) pass through untouched.
 */
const headerSchema = z
  .object({
    f: text,
    p: text,
    r: count,
    g: count,
    gs: finite,
    fg: finite,
    // display-only, passed through as written
    e: z.unknown(),
    t: z.unknown(),
    s: text,
    v: count,
  })
  .passthrough();

const FORMAT_CODES: Record<string, FormatTag> = {
  b: 'bitmask',
  q: 'quantizedTriplet',
};

export function toFormatTag(raw: string | null): FormatTag {
  if (raw === null) return 'unrecognized';
  return FORMAT_CODES[raw] ?? 'unrecognized';
}

/**
 * Convert the untyped header mapping into a typed Metadata record.
 *
 * All defaulting and validation happens here. The gate count is required
 * for every grid format; the triplet format never reads it.
 *
 * @throws MalformedMetadataError when a field has the wrong type
 * @throws MissingGateCountError when a grid format has no gate count (or 0)
 */
export function parseMetadata(mapping: RawMetadata): Metadata {
  const parsed = headerSchema.safeParse(mapping);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    const fields = [...new Set(issues.map((i) => i.path.join('.')))];
    const message = issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new MalformedMetadataError(message, fields);
  }

  const h = parsed.data;
  const rawFormat = h.f ?? null;
  const base = {
    rawFormat,
    productType: h.p ?? DEFAULT_PRODUCT_TYPE,
    rayCount: h.r ?? DEFAULT_RAY_COUNT,
    gateSpacing: h.gs ?? DEFAULT_GATE_SPACING,
    firstGate: h.fg ?? DEFAULT_FIRST_GATE,
    ...(h.e != null ? { elevation: h.e } : {}),
    ...(h.t != null ? { timestamp: h.t } : {}),
    ...(h.s != null ? { station: h.s } : {}),
    ...(h.v != null ? { declaredValueCount: h.v } : {}),
  };

  const format = toFormatTag(rawFormat);
  if (format === 'quantizedTriplet') {
    return h.g != null ? { ...base, format, gateCount: h.g } : { ...base, format };
  }

  if (!h.g) {
    throw new MissingGateCountError();
  }
  if (base.rayCount === 0) {
    throw new MalformedMetadataError('ray count must be positive', ['r']);
  }

  return { ...base, format, gateCount: h.g };
}
