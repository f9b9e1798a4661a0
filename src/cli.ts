import path from 'node:path';
import { isBackend, type Backend } from './source.js';
import type { RunReport } from './coordinator.js';
import type { RunConfig } from './types.js';
import { DEFAULT_CONCURRENCY, DEFAULT_DELAY_MS, DEFAULT_QUALITY, DOWNLOADS_DIR_NAME, isYoutubeUrl } from './utils.js';

export interface CliConfig {
  readonly url?: string;
  /** Output name for a single video. */
  readonly name?: string;
  readonly outputDir: string;
  readonly quality: number;
  readonly concurrency: number;
  readonly interItemDelayMs: number;
  readonly backend?: Backend;
  readonly apiKey?: string;
  readonly ffmpegPath?: string;
  readonly ytDlpPath?: string;
  readonly metadata: boolean;
  readonly thumbnails: boolean;
  readonly acceptTerms: boolean;
  readonly checkOnly: boolean;
  readonly help: boolean;
}

export type Env = Record<string, string | undefined>;

const parsePositive = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

const parseNonNegative = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Parses incoming CLI arguments on top of environment defaults.
 */
export const parseArgs = (argv: string[], env: Env = process.env, cwd: string = process.cwd()): CliConfig => {
  let url: string | undefined;
  let name: string | undefined;
  let outputDir = path.resolve(cwd, nonEmpty(env.DOWNLOAD_DIR) ?? DOWNLOADS_DIR_NAME);
  let quality = parsePositive(env.AUDIO_QUALITY, DEFAULT_QUALITY);
  let concurrency = parsePositive(env.DOWNLOAD_CONCURRENCY, DEFAULT_CONCURRENCY);
  let interItemDelayMs = parseNonNegative(env.DOWNLOAD_DELAY_MS, DEFAULT_DELAY_MS);
  let backend: Backend | undefined = env.DOWNLOAD_BACKEND && isBackend(env.DOWNLOAD_BACKEND) ? env.DOWNLOAD_BACKEND : undefined;
  let apiKey = nonEmpty(env.YOUTUBE_API_KEY);
  const ffmpegPath = nonEmpty(env.FFMPEG_PATH);
  const ytDlpPath = nonEmpty(env.YT_DLP_PATH);
  let metadata = false;
  let thumbnails = false;
  let acceptTerms = false;
  let checkOnly = false;
  let help = false;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=') ? arg.split(/=(.*)/su, 2) : [arg, undefined];
    const takeValue = (): string | undefined => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[i + 1];
      if (next !== undefined) {
        i += 1;
      }
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--url':
      case '--playlist':
        url = nonEmpty(takeValue()) ?? url;
        break;
      case '--name':
        name = nonEmpty(takeValue()) ?? name;
        break;
      case '--metadata':
        metadata = true;
        break;
      case '--thumbnails':
        metadata = true;
        thumbnails = true;
        break;
      case '--output':
      case '-o': {
        const value = nonEmpty(takeValue());
        if (value) {
          outputDir = path.resolve(cwd, value);
        }
        break;
      }
      case '--quality':
      case '-q':
        quality = parsePositive(takeValue(), quality);
        break;
      case '--concurrency':
      case '-c':
        concurrency = parsePositive(takeValue(), concurrency);
        break;
      case '--delay':
        interItemDelayMs = parseNonNegative(takeValue(), interItemDelayMs);
        break;
      case '--backend': {
        const value = takeValue();
        if (value && isBackend(value)) {
          backend = value;
        }
        break;
      }
      case '--api-key':
        apiKey = nonEmpty(takeValue()) ?? apiKey;
        break;
      case '--yes':
      case '-y':
        acceptTerms = true;
        break;
      case '--check':
        checkOnly = true;
        break;
      default:
        if (!url && isYoutubeUrl(arg)) {
          url = arg;
        }
        break;
    }
  }

  return {
    url,
    name,
    outputDir,
    quality,
    concurrency,
    interItemDelayMs,
    backend,
    apiKey,
    ffmpegPath,
    ytDlpPath,
    metadata,
    thumbnails,
    acceptTerms,
    checkOnly,
    help,
  };
};

export const toRunConfig = (config: CliConfig): RunConfig => ({
  outputDir: config.outputDir,
  quality: config.quality,
  apiKey: config.apiKey,
  concurrency: config.concurrency,
  interItemDelayMs: config.interItemDelayMs,
});

/**
 * 0 when everything landed, 2 when some items failed or the run was interrupted, 1 when nothing could be resolved.
 */
export const exitCodeFor = (report: RunReport): number => {
  if (report.state === 'failed') {
    return 1;
  }
  return report.stats.failed > 0 || report.interrupted ? 2 : 0;
};

export const HELP_TEXT = [
  '',
  'YouTube Playlist MP3 Downloader',
  '',
  'Usage:',
  '  playlist-mp3                          # Interactive mode',
  '  playlist-mp3 <YouTube URL>            # Playlist or single video by positional URL',
  '  playlist-mp3 --playlist <URL>         # Download every video in a playlist',
  '  playlist-mp3 <URL> --name "My Song"    # Single video saved as My Song.mp3',
  '  playlist-mp3 --check                  # Report which backends are usable',
  '',
  'Options:',
  '      --url, --playlist <url>  Video or playlist to download',
  '  -o, --output <dir>           Output directory (default ./downloads)',
  `  -q, --quality <kbps>         MP3 bitrate (default ${DEFAULT_QUALITY})`,
  `  -c, --concurrency <n>        Parallel downloads; 1 is sequential (default ${DEFAULT_CONCURRENCY})`,
  `      --delay <ms>             Pause between sequential items (default ${DEFAULT_DELAY_MS})`,
  '      --backend <ytdl|yt-dlp>  Download backend (default: first one available)',
  '      --api-key <key>          YouTube Data API key for playlist listing (ytdl backend)',
  '      --name <file>            Output file name for a single video (skips the title lookup)',
  '      --metadata               Also write info JSON and subtitles (yt-dlp backend)',
  '      --thumbnails             Like --metadata, plus the thumbnail',
  '  -y, --yes                    Accept the usage notice without prompting',
  '  -h, --help                   Show this help message',
  '',
  'Environment: DOWNLOAD_DIR, AUDIO_QUALITY, DOWNLOAD_CONCURRENCY, DOWNLOAD_DELAY_MS,',
  '             DOWNLOAD_BACKEND, YOUTUBE_API_KEY, FFMPEG_PATH, YT_DLP_PATH',
].join('\n');

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  console.log(HELP_TEXT);
};
