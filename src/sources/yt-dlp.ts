import path from 'node:path';
import fs from 'fs-extra';
import { ItemFetchError, ResolutionError, toErrorMessage } from '../errors.js';
import type { MediaSource, MetadataOptions, ProgressCallback } from '../source.js';
import type { ItemDescriptor, PlaylistRef } from '../types.js';
import { toItemDescriptors, type RawEntry } from './entries.js';

interface YtDlpEmitter {
  on: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
  once: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
}

export interface YtDlpRunner {
  exec: (args: string[]) => YtDlpEmitter;
  execPromise: (args: string[]) => Promise<string>;
}

type YtDlpConstructor = new (binaryPath?: string) => YtDlpRunner;

export interface YtDlpSourceOptions {
  readonly binaryPath?: string;
  readonly ffmpegPath?: string;
  readonly maxRetries: number;
  /** Writes the info JSON and subtitles (and optionally the thumbnail) beside each mp3. */
  readonly metadata?: MetadataOptions;
  readonly runner?: YtDlpRunner;
}

const DEFAULT_BINARY = 'yt-dlp';

const isConstructor = (value: unknown): value is YtDlpConstructor => typeof value === 'function';

// yt-dlp-wrap is CommonJS with a default export; depending on the loader it arrives wrapped once or twice.
const pickConstructor = (value: unknown): YtDlpConstructor | undefined => {
  if (isConstructor(value)) {
    return value;
  }
  if (typeof value === 'object' && value !== null && 'default' in value) {
    return pickConstructor(value.default);
  }
  return undefined;
};

/**
 * Lazily instantiates the yt-dlp wrapper around an installed binary.
 */
const loadYtDlp = async (binaryPath: string): Promise<YtDlpRunner> => {
  const Constructor = pickConstructor(await import('yt-dlp-wrap'));
  if (!Constructor) {
    throw new Error('yt-dlp-wrap did not export a constructor');
  }
  return new Constructor(binaryPath);
};

const asRecord = (value: unknown): Record<string, unknown> | undefined =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const toRawEntry = (value: unknown): RawEntry | null => {
  const record = asRecord(value);
  if (!record) {
    return null;
  }
  return {
    id: asString(record.id),
    title: asString(record.title),
    url: asString(record.webpage_url) ?? asString(record.url),
  };
};

/**
 * Reads the JSON printed by `--dump-single-json`. Playlists carry an `entries` array,
 * single videos are the object itself.
 */
export const parseYtDlpDump = (output: string, kind: PlaylistRef['kind']): RawEntry[] => {
  const parsed: unknown = JSON.parse(output);
  const record = asRecord(parsed);
  if (!record) {
    return [];
  }
  if (kind === 'single-item') {
    const entry = toRawEntry(record);
    return entry ? [entry] : [];
  }
  const rawEntries: unknown = record.entries;
  if (!Array.isArray(rawEntries)) {
    return [];
  }
  return rawEntries.flatMap((entry: unknown) => {
    const raw = toRawEntry(entry);
    return raw ? [raw] : [];
  });
};

export const buildResolveArgs = (ref: PlaylistRef): string[] => [
  ref.url,
  '--dump-single-json',
  '--no-warnings',
  ...(ref.kind === 'collection' ? ['--flat-playlist', '--ignore-errors'] : ['--no-playlist']),
];

export const buildFetchArgs = (
  url: string,
  outputTemplate: string,
  quality: number,
  maxRetries: number,
  ffmpegPath?: string,
): string[] => [
  url,
  '-o',
  outputTemplate,
  '-f',
  'bestaudio/best',
  '-x',
  '--audio-format',
  'mp3',
  '--audio-quality',
  `${quality}K`,
  '--postprocessor-args',
  'ffmpeg:-ar 44100 -ac 2',
  '--no-playlist',
  '--no-part',
  '--force-overwrites',
  '--newline',
  '--no-warnings',
  '--retries',
  String(maxRetries),
  ...(ffmpegPath ? ['--ffmpeg-location', ffmpegPath] : []),
];

/**
 * Doubles every `%` so yt-dlp takes a path literally instead of expanding fields like `%(id)s` in it.
 */
export const escapeOutputTemplate = (value: string): string => value.replace(/%/g, '%%');

export const buildMetadataArgs = (sidecarTemplate: string, metadata: MetadataOptions): string[] => [
  '--write-info-json',
  '--write-subs',
  '--write-auto-subs',
  '-o',
  `infojson:${sidecarTemplate}`,
  '-o',
  `subtitle:${sidecarTemplate}`,
  ...(metadata.thumbnails ? ['--write-thumbnail', '-o', `thumbnail:${sidecarTemplate}`] : []),
];

const readPercent = (raw: unknown): number => {
  const percentValue = asRecord(raw)?.percent;
  if (typeof percentValue === 'number') {
    return percentValue;
  }
  if (typeof percentValue === 'string') {
    return Number.parseFloat(percentValue.replace('%', ''));
  }
  return Number.NaN;
};

/**
 * Removes every `<prefix>*` file yt-dlp may have left next to the destination.
 */
const removeLeftovers = async (prefix: string): Promise<void> => {
  const dir = path.dirname(prefix);
  const base = path.basename(prefix);
  if (!(await fs.pathExists(dir))) {
    return;
  }
  const entries = await fs.readdir(dir);
  await Promise.all(entries.filter((name) => name.startsWith(base)).map((name) => fs.remove(path.join(dir, name))));
};

/**
 * Integrated backend: one yt-dlp invocation lists playlists, another downloads and converts each item.
 */
export const createYtDlpSource = (options: YtDlpSourceOptions): MediaSource => {
  let runnerPromise: Promise<YtDlpRunner> | null = options.runner ? Promise.resolve(options.runner) : null;

  const getRunner = async (): Promise<YtDlpRunner> => {
    if (!runnerPromise) {
      runnerPromise = loadYtDlp(options.binaryPath ?? DEFAULT_BINARY);
    }
    return runnerPromise;
  };

  const resolve = async (ref: PlaylistRef): Promise<ItemDescriptor[]> => {
    let entries: RawEntry[];
    try {
      const runner = await getRunner();
      const output = await runner.execPromise(buildResolveArgs(ref));
      entries = parseYtDlpDump(output, ref.kind);
    } catch (error) {
      throw new ResolutionError(`Could not read ${ref.url}: ${toErrorMessage(error)}`, { cause: error });
    }

    const items = toItemDescriptors(entries);
    if (items.length === 0) {
      throw new ResolutionError(`No playable videos found at ${ref.url}`);
    }
    return items;
  };

  const fetchAndTranscode = async (
    item: ItemDescriptor,
    quality: number,
    dest: string,
    onProgress?: ProgressCallback,
  ): Promise<void> => {
    const tempPrefix = `${dest}.part.`;
    const producedPath = `${tempPrefix}mp3`;
    const args = buildFetchArgs(
      item.handle,
      `${escapeOutputTemplate(tempPrefix)}%(ext)s`,
      quality,
      options.maxRetries,
      options.ffmpegPath,
    );
    if (options.metadata) {
      const sidecarBase = path.join(path.dirname(dest), path.basename(dest, path.extname(dest)));
      args.push(...buildMetadataArgs(`${escapeOutputTemplate(sidecarBase)}.%(ext)s`, options.metadata));
    }

    try {
      await removeLeftovers(tempPrefix);
      const runner = await getRunner();

      await new Promise<void>((resolve, reject) => {
        const download = runner.exec(args);
        download.on('progress', (raw: unknown) => {
          const numeric = readPercent(raw);
          if (!Number.isNaN(numeric)) {
            onProgress?.(Math.min(1, Math.max(0, numeric / 100)));
          }
        });
        download.once('error', (error: unknown) => {
          reject(error instanceof Error ? error : new Error(String(error)));
        });
        download.once('close', (code: unknown) => {
          if (typeof code !== 'number' || code !== 0) {
            reject(new Error(`yt-dlp exited with code ${String(code)}`));
            return;
          }
          resolve();
        });
      });

      if (!(await fs.pathExists(producedPath))) {
        throw new Error(`yt-dlp finished without producing ${path.basename(producedPath)}`);
      }
      await fs.move(producedPath, dest, { overwrite: true });
      onProgress?.(1);
    } catch (error) {
      throw new ItemFetchError(toErrorMessage(error), { cause: error });
    } finally {
      await removeLeftovers(tempPrefix);
    }
  };

  return { name: 'yt-dlp', resolve, fetchAndTranscode };
};
