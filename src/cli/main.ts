#!/usr/bin/env node
/**
 * rda-decode: decode a .RDA radar snapshot and render it as a polar PNG.
 *
 *   rda-decode KTLX/20240520_231502/reflectivity/0.5.RDA --output ktlx.png
 */

import { access, readFile } from 'fs/promises';
import { resolveDecoderConfigFromEnv } from '../config/decoderConfig';
import { createPngPlotBackend } from '../services/render/plotBackend';
import { parseCliArgs, usage } from './args';
import { runDecode } from './runDecode';

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(usage());
    return 0;
  }
  if (args.errors.length > 0 || !args.file) {
    for (const e of args.errors) console.log(`Error: ${e}`);
    console.log(usage());
    return 1;
  }

  const config = resolveDecoderConfigFromEnv();
  const plotBackend =
    config.plotEnabled && !args.noPlot
      ? createPngPlotBackend({ size: args.size ?? config.imageSize })
      : null;

  return runDecode(
    { file: args.file, output: args.output ?? config.defaultOutput },
    {
      readFile: (path) => readFile(path),
      fileExists: (path) => access(path).then(() => true, () => false),
      log: (line) => console.log(line),
      plotBackend,
      verbose: config.verbose,
    },
  );
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[rda-decode] Failed:', err);
    process.exit(1);
  });
