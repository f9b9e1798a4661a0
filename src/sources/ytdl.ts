import fs from 'fs-extra';
import ytdl from '@distube/ytdl-core';
import ytpl from 'ytpl';
import { fetchPlaylistEntries } from '../data-api.js';
import { ItemFetchError, ResolutionError, toErrorMessage } from '../errors.js';
import { withRetry } from '../retry.js';
import type { MediaSource, ProgressCallback } from '../source.js';
import { transcodeToMp3, type Transcoder } from '../transcode.js';
import type { ItemDescriptor, PlaylistRef } from '../types.js';
import { extractPlaylistId } from '../utils.js';
import { toItemDescriptors, type RawEntry } from './entries.js';

export type Fetcher = (url: string, rawPath: string, onProgress?: ProgressCallback) => Promise<void>;
export type PlaylistLookup = (url: string) => Promise<RawEntry[]>;
export type VideoLookup = (url: string) => Promise<RawEntry>;

export interface YtdlSourceOptions {
  readonly ffmpegPath?: string;
  readonly apiKey?: string;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly fetcher?: Fetcher;
  readonly transcoder?: Transcoder;
  readonly lookupPlaylist?: PlaylistLookup;
  readonly lookupVideo?: VideoLookup;
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

// Share of the progress bar given to the download stage; transcoding fills the rest.
const FETCH_SHARE = 0.8;

/**
 * Streams the highest quality audio track of a video into a local file.
 */
export const downloadAudioStream: Fetcher = (url, rawPath, onProgress) =>
  new Promise((resolve, reject) => {
    const stream = ytdl(url, {
      quality: 'highestaudio',
      highWaterMark: 1 << 25,
      dlChunkSize: 1 << 20,
      requestOptions: { headers: REQUEST_HEADERS },
    });
    const writer = fs.createWriteStream(rawPath);

    stream.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
      onProgress?.(total > 0 ? downloaded / total : 0);
    });

    stream.on('error', (error: Error) => {
      writer.destroy();
      reject(error);
    });
    writer.on('error', (error) => {
      stream.destroy();
      reject(error);
    });
    writer.on('finish', () => resolve());

    stream.pipe(writer);
  });

const lookupPlaylistWithYtpl: PlaylistLookup = async (url) => {
  const playlist = await ytpl(url, { limit: Infinity });
  return playlist.items.map((item) => ({
    id: item.id,
    title: item.title,
    url: item.shortUrl ?? item.url,
  }));
};

const lookupVideoWithYtdl: VideoLookup = async (url) => {
  const info = await ytdl.getBasicInfo(url, { requestOptions: { headers: REQUEST_HEADERS } });
  return { id: info.videoDetails.videoId, title: info.videoDetails.title, url };
};

const lookupPlaylistWithApi =
  (apiKey: string): PlaylistLookup =>
  async (url) => {
    const playlistId = extractPlaylistId(url);
    if (!playlistId) {
      throw new ResolutionError(`No playlist id in ${url}`);
    }
    return fetchPlaylistEntries(playlistId, apiKey);
  };

/**
 * Two-stage backend: ytdl-core downloads the raw audio, ffmpeg converts it, the raw file is deleted.
 * With an API key, playlists are listed through the YouTube Data API instead of ytpl.
 */
export const createYtdlSource = (options: YtdlSourceOptions): MediaSource => {
  const fetcher = options.fetcher ?? downloadAudioStream;
  const transcoder = options.transcoder ?? transcodeToMp3;
  const lookupPlaylist =
    options.lookupPlaylist ?? (options.apiKey ? lookupPlaylistWithApi(options.apiKey) : lookupPlaylistWithYtpl);
  const lookupVideo = options.lookupVideo ?? lookupVideoWithYtdl;
  const retry = { maxRetries: options.maxRetries, retryDelayMs: options.retryDelayMs };

  const resolve = async (ref: PlaylistRef): Promise<ItemDescriptor[]> => {
    let entries: RawEntry[];
    try {
      if (ref.kind === 'single-item') {
        if (!ytdl.validateURL(ref.url)) {
          throw new ResolutionError(`Not a YouTube video URL: ${ref.url}`);
        }
        entries = [await withRetry(() => lookupVideo(ref.url), retry)];
      } else {
        entries = await withRetry(() => lookupPlaylist(ref.url), retry);
      }
    } catch (error) {
      if (error instanceof ResolutionError) {
        throw error;
      }
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
    const rawPath = `${dest}.source.part`;
    const tempPath = `${dest}.part`;
    await fs.remove(rawPath);
    await fs.remove(tempPath);

    try {
      try {
        await withRetry(
          () => fetcher(item.handle, rawPath, (ratio) => onProgress?.(ratio * FETCH_SHARE)),
          retry,
        );
      } catch (error) {
        throw new ItemFetchError(`Download failed: ${toErrorMessage(error)}`, { cause: error });
      }

      try {
        await transcoder({
          inputPath: rawPath,
          outputPath: tempPath,
          quality,
          ffmpegPath: options.ffmpegPath,
          onProgress: (ratio) => onProgress?.(FETCH_SHARE + ratio * (1 - FETCH_SHARE)),
        });
        await fs.move(tempPath, dest, { overwrite: true });
      } catch (error) {
        await fs.remove(tempPath);
        throw new ItemFetchError(`Transcode failed: ${toErrorMessage(error)}`, { cause: error });
      }
      onProgress?.(1);
    } finally {
      await fs.remove(rawPath);
    }
  };

  return { name: 'ytdl', resolve, fetchAndTranscode };
};
