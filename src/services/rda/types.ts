export type FormatTag = 'bitmask' | 'quantizedTriplet' | 'unrecognized';

/** Untyped key/value header as read from the container, before validation. */
export type RawMetadata = Record<string, unknown>;

interface MetadataBase {
  /** Raw `f` value, kept for diagnostics when the tag is unrecognized */
  rawFormat: string | null;
  productType: string;
  rayCount: number;
  /** Meters between gate centers */
  gateSpacing: number;
  /** Range of the first gate in meters */
  firstGate: number;
  /** Elevation angle as written by the producer, usually degrees (display only, unvalidated) */
  elevation?: unknown;
  /** Scan timestamp as written by the producer (display only, unvalidated) */
  timestamp?: unknown;
  /** NEXRAD site ID (display only) */
  station?: string;
  /** Packed-value count declared by the producer (diagnostic only) */
  declaredValueCount?: number;
}

export interface GridMetadata extends MetadataBase {
  format: 'bitmask' | 'unrecognized';
  gateCount: number;
}

export interface TripletMetadata extends MetadataBase {
  format: 'quantizedTriplet';
  /** Not required by the triplet path; present only if the header carried it */
  gateCount?: number;
}

export type Metadata = GridMetadata | TripletMetadata;

/**
 * Dense ray × gate grid, row-major (ray varies slowest).
 * Cells without an explicit value hold 0.0.
 */
export interface Grid {
  rayCount: number;
  gateCount: number;
  values: Float64Array;
  /** Number of set bits in the bitmask */
  explicitCells: number;
  /** Set bits that actually received a packed value */
  filledCells: number;
}

export interface GridSummary {
  nonZeroCells: number;
  minValue: number | null;
  maxValue: number | null;
}

export interface TripletSummary {
  recordCount: number;
  /** Byte at offset 4 of the first record, or null when fewer than 5 bytes exist */
  sampleValue: number | null;
  /** Length of the ignored partial record at the end (0-6) */
  trailingBytes: number;
}

export type DetectionBranch = 'framed' | 'legacy';

export type RejectionReason =
  | 'too-short'
  | 'length-out-of-bounds'
  | 'invalid-utf8'
  | 'invalid-json'
  | 'not-a-mapping'
  | 'missing-format-key'
  | 'missing-data-key'
  | 'invalid-base64';

export interface BranchRejection {
  branch: DetectionBranch;
  reason: RejectionReason;
  detail?: string;
}

export interface DetectedContainer {
  isNewFormat: boolean;
  mapping: RawMetadata;
  payload: Uint8Array;
  /** Declared header length (framed branch only) */
  metaLength: number | null;
  /** Why branches tried before the accepted one were rejected */
  rejections: BranchRejection[];
}

export type DecodedSnapshot =
  | {
      kind: 'grid';
      metadata: GridMetadata;
      grid: Grid;
      detection: DetectedContainer;
    }
  | {
      kind: 'triplets';
      metadata: TripletMetadata;
      summary: TripletSummary;
      detection: DetectedContainer;
    };
