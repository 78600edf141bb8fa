import type { BranchRejection } from './types';

export type RdaErrorCode =
  | 'UNRECOGNIZED_FORMAT'
  | 'MISSING_GATE_COUNT'
  | 'DATA_TOO_SHORT'
  | 'MALFORMED_METADATA';

/**
 * Base class for every fatal decode failure. Nothing in the decoder retries;
 * these propagate straight to the caller.
 */
export class RdaDecodeError extends Error {
  readonly code: RdaErrorCode;

  constructor(code: RdaErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

function describeRejection(r: BranchRejection): string {
  return r.detail ? `${r.branch}: ${r.reason} (${r.detail})` : `${r.branch}: ${r.reason}`;
}

export class UnrecognizedFormatError extends RdaDecodeError {
  readonly rejections: BranchRejection[];

  constructor(rejections: BranchRejection[]) {
    const reasons = rejections.map(describeRejection).join('; ');
    super(
      'UNRECOGNIZED_FORMAT',
      `Could not parse file as new or old format${reasons ? `: ${reasons}` : ''}`,
    );
    this.rejections = rejections;
  }
}

export class MissingGateCountError extends RdaDecodeError {
  constructor() {
    super('MISSING_GATE_COUNT', 'gate_count is 0 or missing');
  }
}

export class DataTooShortError extends RdaDecodeError {
  readonly required: number;
  readonly actual: number;

  constructor(required: number, actual: number) {
    super(
      'DATA_TOO_SHORT',
      `Data too short: expected at least ${required} bytes for bitmask, got ${actual}`,
    );
    this.required = required;
    this.actual = actual;
  }
}

export class MalformedMetadataError extends RdaDecodeError {
  /** Offending metadata keys, e.g. ['r', 'gs'] */
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super('MALFORMED_METADATA', `Malformed metadata: ${message}`);
    this.fields = fields;
  }
}

export function isRdaDecodeError(err: unknown): err is RdaDecodeError {
  return err instanceof RdaDecodeError;
}
