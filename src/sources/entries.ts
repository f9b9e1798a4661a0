import type { ItemDescriptor } from '../types.js';

export interface RawEntry {
  readonly id?: string | null;
  readonly title?: string | null;
  readonly url?: string | null;
}

const UNAVAILABLE_TITLES = new Set(['[Deleted video]', '[Private video]', 'Deleted video', 'Private video']);

export const watchUrl = (id: string): string => `https://www.youtube.com/watch?v=${id}`;

/**
 * Drops entries that cannot be fetched and numbers the rest 1..n in playlist order.
 */
export const toItemDescriptors = (entries: readonly (RawEntry | null | undefined)[]): ItemDescriptor[] => {
  const descriptors: ItemDescriptor[] = [];
  for (const entry of entries) {
    if (!entry?.id) {
      continue;
    }
    const title = entry.title ?? '';
    if (UNAVAILABLE_TITLES.has(title)) {
      continue;
    }
    descriptors.push({
      id: entry.id,
      title,
      sequenceIndex: descriptors.length + 1,
      handle: entry.url && entry.url.length > 0 ? entry.url : watchUrl(entry.id),
    });
  }
  return descriptors;
};
