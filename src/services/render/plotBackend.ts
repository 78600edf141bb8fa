import { writeFile as fsWriteFile } from 'fs/promises';
import type { Grid, GridMetadata } from '../rda/types';
import { getColorTable, type ColorStop } from './colorTables';
import { encodePng } from './pngEncoder';
import { rasterizePolarGrid } from './polarRaster';

export interface PlotRequest {
  metadata: GridMetadata;
  grid: Grid;
  outputPath: string;
}

export interface PlotResult {
  outputPath: string;
  width: number;
  height: number;
  bytesWritten: number;
}

/**
 * Presentation capability. Callers receive one (or null) at construction;
 * nothing looks it up globally.
 */
export interface PlotBackend {
  readonly name: string;
  render(request: PlotRequest): Promise<PlotResult>;
}

export interface PngPlotOptions {
  /** Image width and height in pixels */
  size: number;
  /** Per-product palette override */
  colorTableFor?: (productType: string) => ColorStop[];
  writeFile?: (path: string, data: Uint8Array) => Promise<void>;
}

export const DEFAULT_IMAGE_SIZE = 1200;

/** Renders the grid as a north-up polar PNG, clockwise azimuths. */
export function createPngPlotBackend(options: PngPlotOptions): PlotBackend {
  const colorTableFor = options.colorTableFor ?? getColorTable;
  const writeFile = options.writeFile ?? ((path: string, data: Uint8Array) => fsWriteFile(path, data));

  return {
    name: 'png',
    async render({ metadata, grid, outputPath }) {
      const image = rasterizePolarGrid(
        grid,
        { firstGate: metadata.firstGate, gateSpacing: metadata.gateSpacing },
        colorTableFor(metadata.productType),
        options.size,
      );
      const png = encodePng(image);
      await writeFile(outputPath, png);
      console.log(
        `[PlotBackend] ${metadata.productType} ${image.width}x${image.height} → ${outputPath} (${png.length} bytes)`,
      );
      return { outputPath, width: image.width, height: image.height, bytesWritten: png.length };
    },
  };
}
