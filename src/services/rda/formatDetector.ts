/**
 * Container detection for decompressed .RDA snapshots.
 *
 * Two framings exist in the wild:
 *   - framed (current):  [u32 LE metaLen][metaLen bytes JSON][binary payload]
 *   - legacy:            the whole file is JSON, payload base64 under "d"
 *
 * The framed branch is tried first. Every rejected branch records a named
 * reason so a final UnrecognizedFormatError (or a verbose log line) can say
 * exactly why each framing was ruled out.
 */

import { UnrecognizedFormatError } from './errors';
import type { BranchRejection, DetectedContainer, RawMetadata } from './types';

const HEADER_PREFIX_BYTES = 4;
/** Sanity bound on header size; legacy JSON starting with `{"..` reads as a huge u32 */
export const MAX_META_LENGTH = 65536;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

type BranchResult<T> = { ok: true; value: T } | { ok: false; rejection: BranchRejection };

// BOM is kept so JSON.parse rejects it
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function reject<T>(branch: BranchRejection['branch'], reason: BranchRejection['reason'], detail?: string): BranchResult<T> {
  return { ok: false, rejection: detail ? { branch, reason, detail } : { branch, reason } };
}

function isMapping(value: unknown): value is RawMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Strict UTF-8 decode + JSON parse, requiring a plain object at the top level. */
function parseMapping(bytes: Uint8Array, branch: BranchRejection['branch']): BranchResult<RawMetadata> {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return reject(branch, 'invalid-utf8');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return reject(branch, 'invalid-json', err instanceof Error ? err.message : String(err));
  }

  if (!isMapping(parsed)) {
    return reject(branch, 'not-a-mapping');
  }
  return { ok: true, value: parsed };
}

function decodeBase64(encoded: string): Uint8Array | null {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) return null;
  const buf = Buffer.from(compact, 'base64');
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function tryFramed(bytes: Uint8Array): BranchResult<DetectedContainer> {
  if (bytes.length <= HEADER_PREFIX_BYTES) {
    return reject('framed', 'too-short', `${bytes.length} bytes`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const metaLength = view.getUint32(0, true);
  if (metaLength >= bytes.length - HEADER_PREFIX_BYTES || metaLength >= MAX_META_LENGTH) {
    return reject('framed', 'length-out-of-bounds', `metaLen=${metaLength}, total=${bytes.length}`);
  }

  const headerEnd = HEADER_PREFIX_BYTES + metaLength;
  const mapping = parseMapping(bytes.subarray(HEADER_PREFIX_BYTES, headerEnd), 'framed');
  if (!mapping.ok) return mapping;
  if (!('f' in mapping.value)) {
    return reject('framed', 'missing-format-key');
  }

  return {
    ok: true,
    value: {
      isNewFormat: true,
      mapping: mapping.value,
      payload: bytes.subarray(headerEnd),
      metaLength,
      rejections: [],
    },
  };
}

function tryLegacy(bytes: Uint8Array): BranchResult<DetectedContainer> {
  const mapping = parseMapping(bytes, 'legacy');
  if (!mapping.ok) return mapping;

  const encoded = mapping.value.d;
  if (encoded === undefined) {
    return reject('legacy', 'missing-data-key');
  }
  if (typeof encoded !== 'string') {
    return reject('legacy', 'invalid-base64', `"d" is ${typeof encoded}`);
  }
  const payload = decodeBase64(encoded);
  if (!payload) {
    return reject('legacy', 'invalid-base64');
  }

  return {
    ok: true,
    value: {
      isNewFormat: false,
      mapping: mapping.value,
      payload,
      metaLength: null,
      rejections: [],
    },
  };
}

/**
 * Decide which container framing `bytes` uses and split it into the header
 * mapping and the payload. The payload of a framed container is a view into
 * `bytes`, not a copy.
 *
 * @throws UnrecognizedFormatError when neither framing applies
 */
export function detectFormat(bytes: Uint8Array): DetectedContainer {
  const framed = tryFramed(bytes);
  if (framed.ok) return framed.value;

  const legacy = tryLegacy(bytes);
  if (legacy.ok) {
    return { ...legacy.value, rejections: [framed.rejection] };
  }

  throw new UnrecognizedFormatError([framed.rejection, legacy.rejection]);
}
