/**
 * CLI flow around the snapshot decoder: read file → decode → plot or summarize.
 *
 * Every side effect (file access, output, plotting) comes in through `deps`,
 * so the exit-code logic is testable without touching the disk.
 */

import {
  decodeSnapshotFile,
  isRdaDecodeError,
  summarizeGrid,
  type DecodedSnapshot,
  type DetectedContainer,
  type Metadata,
} from '../services/rda';
import type { PlotBackend } from '../services/render/plotBackend';

export interface RunOptions {
  file: string;
  output: string;
}

export interface RunDeps {
  readFile(path: string): Promise<Uint8Array>;
  fileExists(path: string): Promise<boolean>;
  log(line: string): void;
  /** null when no presentation capability is available */
  plotBackend: PlotBackend | null;
  verbose?: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeDetection(detection: DetectedContainer): string {
  return detection.isNewFormat
    ? `Detected NEW format (bitmask) with metadata size ${detection.metaLength}`
    : 'Detected OLD format (JSON/quantized)';
}

function formatElevation(metadata: Metadata): string {
  const { elevation } = metadata;
  if (elevation === undefined) return 'unknown elevation';
  const shown = typeof elevation === 'number' || typeof elevation === 'string' ? elevation : JSON.stringify(elevation);
  return `${shown}°`;
}

async function report(result: DecodedSnapshot, options: RunOptions, deps: RunDeps): Promise<void> {
  const { log } = deps;

  if (result.kind === 'triplets') {
    log("Processing legacy 'q' (quantized triplet) format...");
    log(`Found ${result.summary.recordCount} triplets`);
    if (result.summary.recordCount > 0) {
      log(`Example value: ${result.summary.sampleValue ?? 0}`);
    }
    return;
  }

  const { metadata, grid } = result;
  log(
    `Decoding ${metadata.productType} at ${formatElevation(metadata)} (${grid.rayCount}x${grid.gateCount} grid)...`,
  );

  if (deps.plotBackend) {
    const plot = await deps.plotBackend.render({ metadata, grid, outputPath: options.output });
    log(`Saved plot to ${plot.outputPath}`);
    return;
  }

  const summary = summarizeGrid(grid);
  log('');
  log('Success! Data decoded, but no plot backend is available.');
  log(`Grid shape: (${grid.rayCount}, ${grid.gateCount})`);
  log(`Non-zero bins: ${summary.nonZeroCells}`);
  log(`Max value: ${summary.maxValue ?? 'n/a'}`);
  log(`Filled cells: ${grid.filledCells}/${grid.explicitCells}`);
  log('');
  log('To render the plot, drop --no-plot and unset RDA_PLOT.');
}

/** Returns the process exit code: 0 on success, 1 on any failure. */
export async function runDecode(options: RunOptions, deps: RunDeps): Promise<number> {
  const { log } = deps;

  if (!(await deps.fileExists(options.file))) {
    log(`Error: File not found: ${options.file}`);
    return 1;
  }

  try {
    const bytes = await deps.readFile(options.file);
    const result = decodeSnapshotFile(bytes, {
      onDetected(detection) {
        log(describeDetection(detection));
        if (deps.verbose) {
          for (const r of detection.rejections) {
            log(`  rejected ${r.branch} framing: ${r.reason}${r.detail ? ` (${r.detail})` : ''}`);
          }
        }
      },
      onMetadata(metadata) {
        log(`Metadata: ${JSON.stringify(metadata)}`);
      },
    });
    await report(result, options, deps);
    return 0;
  } catch (err) {
    if (!isRdaDecodeError(err)) {
      console.error('[CLI] Unexpected failure:', err);
    }
    log(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
