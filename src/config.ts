import path from 'node:path';
import {
  DEFAULT_API_BASE,
  DEFAULT_BITRATE_KBPS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_WORKERS,
  isYoutubeUrl,
} from './utils.js';

export interface CliConfig {
  readonly url?: string;
  readonly outputDir: string;
  readonly workers: number;
  readonly verbose: boolean;
  readonly apiBase: string;
  readonly bitrateKbps: number;
  readonly help: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

const parsePositiveInt = (value: string | undefined): number | undefined => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
};

const isTruthy = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());

/**
 * Parses incoming CLI arguments and resolves the effective execution configuration.
 * Flags win over environment variables, which win over defaults.
 */
export const parseArgs = (argv: readonly string[], env: Env = process.env, cwd: string = process.cwd()): CliConfig => {
  let workers = parsePositiveInt(env.DOWNLOAD_CONCURRENCY) ?? DEFAULT_WORKERS;
  let outputDir = path.resolve(cwd, env.TUBESAAVN_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR);
  let verbose = isTruthy(env.TUBESAAVN_VERBOSE);
  let apiBase = env.SAAVN_API_BASE ?? DEFAULT_API_BASE;
  let bitrateKbps = DEFAULT_BITRATE_KBPS;
  let help = false;
  let url: string | undefined;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    const next = args[i + 1];
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--verbose':
      case '-v':
        verbose = true;
        break;
      case '--output':
      case '-o':
        if (next) {
          outputDir = path.resolve(cwd, next);
          i += 1;
        }
        break;
      case '--workers':
      case '-w':
        if (next) {
          workers = parsePositiveInt(next) ?? workers;
          i += 1;
        }
        break;
      case '--bitrate':
      case '-b':
        if (next) {
          bitrateKbps = parsePositiveInt(next) ?? bitrateKbps;
          i += 1;
        }
        break;
      case '--api':
        if (next) {
          apiBase = next;
          i += 1;
        }
        break;
      case '--url':
        if (next) {
          url = next;
          i += 1;
        }
        break;
      default: {
        if (arg.startsWith('--workers=')) {
          workers = parsePositiveInt(arg.slice('--workers='.length)) ?? workers;
          break;
        }
        if (!url && isYoutubeUrl(arg)) {
          url = arg;
        }
        break;
      }
    }
  }

  return { url, outputDir, workers, verbose, apiBase, bitrateKbps, help };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (write: (line: string) => void = console.log): void => {
  write('\nYouTube to catalog MP3 downloader\n');
  write('Usage:');
  write('  tubesaavn <YouTube video or playlist URL> [options]');
  write('\nOptions:');
  write(`  -o, --output <dir>       Output directory (default ./${DEFAULT_OUTPUT_DIR})`);
  write(`  -w, --workers <n>        Parallel download workers (default ${DEFAULT_WORKERS})`);
  write('      --workers=n          Alternative workers syntax');
  write(`  -b, --bitrate <kbps>     MP3 bitrate (default ${DEFAULT_BITRATE_KBPS})`);
  write(`      --api <url>          Catalog API base (default ${DEFAULT_API_BASE})`);
  write('  -v, --verbose            Enable verbose logging');
  write('  -h, --help               Show this help message');
  write('\nEnvironment: DOWNLOAD_CONCURRENCY, TUBESAAVN_OUTPUT_DIR, TUBESAAVN_VERBOSE, SAAVN_API_BASE, FFMPEG_PATH');
};
