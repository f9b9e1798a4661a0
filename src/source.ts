import type { ItemDescriptor, PlaylistRef } from './types.js';
import { createYtdlSource } from './sources/ytdl.js';
import { createYtDlpSource } from './sources/yt-dlp.js';

export type ProgressCallback = (ratio: number) => void;

/**
 * A backend able to list a playlist and turn one entry into an mp3 on disk.
 *
 * `resolve` rejects with a ResolutionError when nothing usable comes back;
 * unreadable entries are dropped and the survivors numbered 1..n.
 * `fetchAndTranscode` rejects with an ItemFetchError, never leaves a partial
 * file at `dest` and removes its own temporaries either way.
 */
export interface MediaSource {
  readonly name: string;
  resolve(ref: PlaylistRef): Promise<ItemDescriptor[]>;
  fetchAndTranscode(
    item: ItemDescriptor,
    quality: number,
    dest: string,
    onProgress?: ProgressCallback,
  ): Promise<void>;
}

export type Backend = 'ytdl' | 'yt-dlp';

export const BACKENDS: readonly Backend[] = ['ytdl', 'yt-dlp'];

export const isBackend = (value: string): value is Backend => BACKENDS.some((backend) => backend === value);

export interface MetadataOptions {
  readonly thumbnails: boolean;
}

export interface SourceOptions {
  readonly ffmpegPath?: string;
  readonly ytDlpPath?: string;
  readonly apiKey?: string;
  /** Sidecar files are written by yt-dlp; the ytdl backend refuses this option. */
  readonly metadata?: MetadataOptions;
  readonly maxRetries?: number;
  readonly retryDelayMs?: number;
}

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Picks the backend once, up front. Callers only ever see the MediaSource interface.
 */
export const createMediaSource = (backend: Backend, options: SourceOptions = {}): MediaSource => {
  const retry = {
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
  };

  switch (backend) {
    case 'ytdl':
      if (options.metadata) {
        throw new Error('Writing metadata files needs the yt-dlp backend');
      }
      return createYtdlSource({ ffmpegPath: options.ffmpegPath, apiKey: options.apiKey, ...retry });
    case 'yt-dlp':
      return createYtDlpSource({
        binaryPath: options.ytDlpPath,
        ffmpegPath: options.ffmpegPath,
        maxRetries: retry.maxRetries,
        metadata: options.metadata,
      });
  }
};
