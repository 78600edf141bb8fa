import { DEFAULT_IMAGE_SIZE } from '../services/render/plotBackend';

export interface DecoderConfig {
  /** False omits the plot backend; the CLI prints grid statistics instead */
  plotEnabled: boolean;
  imageSize: number;
  defaultOutput: string;
  /** Log why each rejected container framing was ruled out */
  verbose: boolean;
}

export const DEFAULT_OUTPUT_PATH = 'radar_plot.png';
export const MIN_IMAGE_SIZE = 64;
export const MAX_IMAGE_SIZE = 4096;

type Env = Record<string, string | undefined>;

export function resolveDecoderConfigFromEnv(env: Env = process.env): DecoderConfig {
  return {
    plotEnabled: !isOff(env.RDA_PLOT),
    imageSize: parseImageSize(env.RDA_IMAGE_SIZE) ?? DEFAULT_IMAGE_SIZE,
    defaultOutput: env.RDA_DEFAULT_OUTPUT?.trim() || DEFAULT_OUTPUT_PATH,
    verbose: env.RDA_VERBOSE?.trim().toLowerCase() === 'true',
  };
}

function isOff(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === 'off' || normalized === 'false' || normalized === '0';
}

/** Integer pixel size within [MIN_IMAGE_SIZE, MAX_IMAGE_SIZE], else undefined. */
export function parseImageSize(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed >= MIN_IMAGE_SIZE && parsed <= MAX_IMAGE_SIZE ? parsed : undefined;
}
