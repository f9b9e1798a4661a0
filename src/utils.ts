import path from 'node:path';
import { promises as dns } from 'node:dns';
import { setTimeout as delay } from 'node:timers/promises';
import fs from 'fs-extra';
import type { PlaylistRef } from './types.js';

export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_QUALITY = 320;
export const DEFAULT_DELAY_MS = 1000;
export const DOWNLOADS_DIR_NAME = 'downloads';
export const AUDIO_EXTENSION = 'mp3';

const MAX_NAME_LENGTH = 200;
const ELLIPSIS = '...';
const EMPTY_PLACEHOLDER = '_';

/**
 * Sanitizes titles so they are safe to write to the filesystem. Never returns an empty string.
 */
export const sanitizeFileName = (value: string): string => {
  let sanitized = value.replace(/[<>:"/\\|?*]/g, '_').replace(/\s+/g, ' ').trim();
  if (sanitized.length > MAX_NAME_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_NAME_LENGTH)}${ELLIPSIS}`;
  }
  return sanitized.length > 0 ? sanitized : EMPTY_PLACEHOLDER;
};

/**
 * Formats the numeric filename prefix, padded to three digits.
 */
export const formatSequencePrefix = (sequenceIndex: number): string =>
  String(sequenceIndex).padStart(3, '0');

/**
 * Returns the absolute mp3 path for a title. Collection items carry their sequence prefix.
 */
export const resolveDestinationPath = (
  outputDir: string,
  title: string,
  sequenceIndex?: number,
): string => {
  const safeTitle = sanitizeFileName(title);
  const baseName =
    sequenceIndex === undefined ? safeTitle : `${formatSequencePrefix(sequenceIndex)}_${safeTitle}`;
  return path.resolve(outputDir, `${baseName}.${AUDIO_EXTENSION}`);
};

/**
 * Checks whether the given mp3 file has already been downloaded.
 */
export const isAlreadyDownloaded = async (filePath: string): Promise<boolean> =>
  fs.pathExists(filePath);

/**
 * Detects whether a given string looks like a direct YouTube URL.
 */
export const isYoutubeUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
  } catch {
    return false;
  }
};

/**
 * Detects whether a given string refers to a YouTube playlist (via list parameter or playlist path).
 */
export const isYoutubePlaylistUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    if (!isYoutubeUrl(input)) {
      return false;
    }
    if (parsed.searchParams.has('list')) {
      return true;
    }
    return parsed.pathname.includes('/playlist');
  } catch {
    return false;
  }
};

/**
 * Extracts the playlist id from a playlist URL, or null when there is none.
 */
export const extractPlaylistId = (input: string): string | null => {
  try {
    const list = new URL(input).searchParams.get('list');
    return list && list.length > 0 ? list : null;
  } catch {
    return null;
  }
};

/**
 * Extracts the video id from a watch, short or youtu.be URL, or null when there is none.
 */
export const extractVideoId = (input: string): string | null => {
  try {
    const parsed = new URL(input);
    if (parsed.hostname === 'youtu.be') {
      const id = parsed.pathname.split('/')[1];
      return id ? id : null;
    }
    const fromQuery = parsed.searchParams.get('v');
    if (fromQuery) {
      return fromQuery;
    }
    const match = /^\/(?:shorts|embed|live)\/([^/]+)/u.exec(parsed.pathname);
    return match?.[1] ?? null;
  } catch {
    return null;
  }
};

/**
 * Classifies a URL as a collection or single-item reference. A custom name only sticks to single items,
 * without any trailing .mp3.
 */
export const parsePlaylistRef = (url: string, name?: string): PlaylistRef => {
  const kind = isYoutubePlaylistUrl(url) ? 'collection' : 'single-item';
  const customName = name?.trim().replace(/\.mp3$/iu, '').trim();
  if (kind === 'single-item' && customName) {
    return { kind, url: url.trim(), name: customName };
  }
  return { kind, url: url.trim() };
};

/**
 * Pauses between sequential items so the remote side does not rate limit us.
 * Returns early, without throwing, once the signal is aborted.
 */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (ms <= 0 || signal?.aborted) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
};

/**
 * Quickly probes DNS to help surface connectivity issues before downloads run.
 */
export const verifyInternet = async (): Promise<void> => {
  await dns.lookup('youtube.com');
};

/**
 * Removes temporary player script files that ytdl-core may leave behind.
 * Returns the messages of removals that failed so the caller can log them.
 */
export const cleanupPlayerScripts = async (cwd: string = process.cwd()): Promise<string[]> => {
  const problems: string[] = [];
  try {
    const entries = await fs.readdir(cwd);
    const targets = entries.filter((name) => /player-script\.js$/u.test(name));
    await Promise.all(
      targets.map(async (name) => {
        const filePath = path.resolve(cwd, name);
        try {
          await fs.remove(filePath);
        } catch (error) {
          problems.push(`Cleanup failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }),
    );
  } catch (error) {
    problems.push(`Cleanup scan failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  return problems;
};
