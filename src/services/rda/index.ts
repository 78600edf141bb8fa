export { decodeSnapshot, decodeSnapshotFile, maybeGunzip, type DecodeObserver } from './decoder';
export { detectFormat } from './formatDetector';
export { parseMetadata, toFormatTag } from './metadata';
export { bitmaskByteLength, decodeBitmaskGrid, gridValue, summarizeGrid } from './bitmaskGrid';
export { summarizeTriplets, TRIPLET_RECORD_BYTES } from './legacyTriplets';
export {
  dequantize,
  quantize,
  getQuantizationRange,
  isKnownProductType,
  PRODUCT_TYPES,
  type KnownProductType,
  type QuantizationRange,
} from './quantization';
export {
  RdaDecodeError,
  UnrecognizedFormatError,
  MissingGateCountError,
  DataTooShortError,
  MalformedMetadataError,
  isRdaDecodeError,
  type RdaErrorCode,
} from './errors';
export type * from './types';
