import { describe, expect, it } from 'vitest';
import { parsePlaylistPage } from './data-api.js';

describe('parsePlaylistPage', () => {
  it('extracts video ids, titles and the next page token', () => {
    const page = parsePlaylistPage({
      nextPageToken: 'CDIQAA',
      items: [
        { snippet: { title: 'First', resourceId: { kind: 'youtube#video', videoId: 'v1' } } },
        { snippet: { title: 'Private video', resourceId: { kind: 'youtube#video', videoId: 'v2' } } },
        { snippet: { title: 'Broken' } },
      ],
    });

    expect(page).toEqual({
      nextPageToken: 'CDIQAA',
      entries: [
        { id: 'v1', title: 'First' },
        { id: 'v2', title: 'Private video' },
        { id: undefined, title: 'Broken' },
      ],
    });
  });

  it('tolerates bodies without items', () => {
    expect(parsePlaylistPage({})).toEqual({ entries: [], nextPageToken: undefined });
    expect(parsePlaylistPage('oops')).toEqual({ entries: [], nextPageToken: undefined });
  });
});
