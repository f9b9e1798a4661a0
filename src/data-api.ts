import axios from 'axios';
import type { RawEntry } from './sources/entries.js';

const PLAYLIST_ITEMS_ENDPOINT = 'https://www.googleapis.com/youtube/v3/playlistItems';
const PAGE_SIZE = 50;

export interface PlaylistPage {
  readonly entries: RawEntry[];
  readonly nextPageToken?: string;
}

const asRecord = (value: unknown): Record<string, unknown> | undefined =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

/**
 * Reads one playlistItems response body. Items missing a video id come back without one
 * and are dropped later.
 */
export const parsePlaylistPage = (body: unknown): PlaylistPage => {
  const record = asRecord(body);
  const rawItems: unknown = record?.items;
  const items: unknown[] = Array.isArray(rawItems) ? rawItems : [];

  const entries = items.map((item: unknown): RawEntry => {
    const snippet = asRecord(asRecord(item)?.snippet);
    const resourceId = asRecord(snippet?.resourceId);
    return {
      id: asString(resourceId?.videoId),
      title: asString(snippet?.title),
    };
  });

  return { entries, nextPageToken: asString(record?.nextPageToken) };
};

/**
 * Lists every entry of a playlist through the YouTube Data API, following page tokens.
 */
export const fetchPlaylistEntries = async (playlistId: string, apiKey: string): Promise<RawEntry[]> => {
  const entries: RawEntry[] = [];
  let pageToken: string | undefined;

  do {
    const response = await axios.get<unknown>(PLAYLIST_ITEMS_ENDPOINT, {
      params: {
        part: 'snippet',
        maxResults: PAGE_SIZE,
        playlistId,
        key: apiKey,
        ...(pageToken ? { pageToken } : {}),
      },
    });
    const page = parsePlaylistPage(response.data);
    entries.push(...page.entries);
    pageToken = page.nextPageToken;
  } while (pageToken);

  return entries;
};
