import { parseImageSize } from '../config/decoderConfig';

export interface CliArgs {
  file: string | null;
  output: string | null;
  noPlot: boolean;
  size: number | null;
  help: boolean;
  errors: string[];
}

export function usage(): string {
  return [
    'Usage: rda-decode <file> [--output <path>] [--no-plot] [--size <px>]',
    '',
    'Decode a bitmask-compressed radar snapshot (.RDA) and render it as a polar PNG.',
    '',
    'Options:',
    '  --output <path>  Output image file (default: radar_plot.png, or RDA_DEFAULT_OUTPUT)',
    '  --no-plot        Print grid statistics instead of rendering (same as RDA_PLOT=off)',
    '  --size <px>      Image width/height, 64-4096 (default: 1200, or RDA_IMAGE_SIZE)',
    '  -h, --help       Show this message',
  ].join('\n');
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { file: null, output: null, noPlot: false, size: null, help: false, errors: [] };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '-h' || token === '--help') {
      args.help = true;
      continue;
    }
    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    const key = eq >= 0 ? token.slice(2, eq) : token.slice(2);
    const inline = eq >= 0 ? token.slice(eq + 1) : undefined;
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) return undefined;
      i++;
      return next;
    };

    switch (key) {
      case 'output': {
        const value = takeValue();
        if (value) args.output = value;
        else args.errors.push('--output requires a path');
        break;
      }
      case 'size': {
        const raw = takeValue();
        const size = parseImageSize(raw);
        if (size !== undefined) args.size = size;
        else args.errors.push(`--size must be an integer between 64 and 4096, got ${raw ?? 'nothing'}`);
        break;
      }
      case 'no-plot':
        args.noPlot = true;
        break;
      default:
        args.errors.push(`Unknown option: --${key}`);
    }
  }

  if (positional.length > 1) {
    args.errors.push(`Expected one file, got ${positional.length}: ${positional.join(' ')}`);
  }
  args.file = positional[0] ?? null;
  if (!args.file && !args.help) {
    args.errors.push('Missing file argument');
  }

  return args;
}
