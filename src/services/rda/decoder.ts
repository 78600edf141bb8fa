import pako from 'pako';
import { decodeBitmaskGrid } from './bitmaskGrid';
import { detectFormat } from './formatDetector';
import { summarizeTriplets } from './legacyTriplets';
import { parseMetadata } from './metadata';
import type { DecodedSnapshot, DetectedContainer, Metadata } from './types';

/** Optional callbacks fired as each stage completes, before the next one starts. */
export interface DecodeObserver {
  onDetected?(detection: DetectedContainer): void;
  onMetadata?(metadata: Metadata): void;
}

/**
 * Decompress gzip data if needed. .RDA files are written gzip-compressed,
 * but already-inflated buffers are accepted as-is.
 * Gzip magic bytes: 0x1f 0x8b
 */
export function maybeGunzip(bytes: Uint8Array): Uint8Array {
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    return pako.ungzip(bytes);
  }
  return bytes;
}

/**
 * Decode a decompressed snapshot.
 *
 * Detection happens before metadata validation, and metadata validation
 * before any payload byte is read. Errors propagate unchanged.
 */
export function decodeSnapshot(bytes: Uint8Array, observer: DecodeObserver = {}): DecodedSnapshot {
  const detection = detectFormat(bytes);
  observer.onDetected?.(detection);
  const metadata = parseMetadata(detection.mapping);
  observer.onMetadata?.(metadata);

  if (metadata.format === 'quantizedTriplet') {
    return {
      kind: 'triplets',
      metadata,
      summary: summarizeTriplets(detection.payload),
      detection,
    };
  }

  if (metadata.format === 'unrecognized') {
    // Legacy containers may omit "f"; those carry bitmask payloads too
    console.warn(
      `[Decoder] Unknown format tag ${JSON.stringify(metadata.rawFormat)}, decoding as bitmask`,
    );
  }

  const grid = decodeBitmaskGrid(
    metadata.rayCount,
    metadata.gateCount,
    metadata.productType,
    detection.payload,
  );
  return { kind: 'grid', metadata, grid, detection };
}

/** Decode a snapshot exactly as read from disk (gzip or raw). */
export function decodeSnapshotFile(bytes: Uint8Array, observer?: DecodeObserver): DecodedSnapshot {
  return decodeSnapshot(maybeGunzip(bytes), observer);
}
