import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runPlaylist, runPlaylistOrThrow } from './coordinator.js';
import { ItemFetchError, ResolutionError } from './errors.js';
import { createMemoryReporter } from './reporter.js';
import type { MediaSource } from './source.js';
import type { ItemDescriptor, PlaylistRef, RunConfig, RunState } from './types.js';
import { sleep } from './utils.js';

const playlist: PlaylistRef = { kind: 'collection', url: 'https://www.youtube.com/playlist?list=PLtest' };
const video: PlaylistRef = { kind: 'single-item', url: 'https://www.youtube.com/watch?v=single' };

const makeItems = (titles: string[]): ItemDescriptor[] =>
  titles.map((title, index) => ({
    id: `id-${index + 1}`,
    title,
    sequenceIndex: index + 1,
    handle: `https://www.youtube.com/watch?v=id-${index + 1}`,
  }));

interface FakeBehaviour {
  readonly failing?: readonly number[];
  readonly delays?: Readonly<Record<number, number>>;
  readonly onStart?: (item: ItemDescriptor) => void;
}

const createFakeSource = (items: ItemDescriptor[] | Error, behaviour: FakeBehaviour = {}) => {
  const attempted: number[] = [];
  const completed: number[] = [];
  const handles: string[] = [];
  let inFlight = 0;
  let maxInFlight = 0;
  let resolveCalls = 0;

  const source: MediaSource = {
    name: 'fake',
    resolve: async () => {
      resolveCalls += 1;
      if (items instanceof Error) {
        throw items;
      }
      return items;
    },
    fetchAndTranscode: async (item, _quality, dest) => {
      attempted.push(item.sequenceIndex);
      handles.push(item.handle);
      behaviour.onStart?.(item);
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      try {
        await sleep(behaviour.delays?.[item.sequenceIndex] ?? 0);
        if (behaviour.failing?.includes(item.sequenceIndex)) {
          throw new ItemFetchError(`item ${item.sequenceIndex} unavailable`);
        }
        await fs.writeFile(dest, `audio ${item.id}`);
        completed.push(item.sequenceIndex);
      } finally {
        inFlight -= 1;
      }
    },
  };

  return {
    source,
    attempted,
    completed,
    handles,
    maxInFlight: () => maxInFlight,
    resolveCalls: () => resolveCalls,
  };
};

describe('runPlaylist', () => {
  let outputDir: string;
  let config: RunConfig;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playlist-mp3-run-'));
    config = { outputDir, quality: 320, concurrency: 1, interItemDelayMs: 0 };
  });

  afterEach(async () => {
    await fs.remove(outputDir);
  });

  it('sanitizes titles and numbers files in resolution order', async () => {
    const fake = createFakeSource(makeItems(['A/B', '', 'C'.repeat(250)]));

    const report = await runPlaylist(playlist, config, { source: fake.source });

    expect(report.state).toBe('done');
    expect(report.stats).toEqual({ total: 3, successful: 3, failed: 0, skipped: 0 });
    expect(report.outcomes.map((outcome) => path.basename(outcome.filePath))).toEqual([
      '001_A_B.mp3',
      '002__.mp3',
      `003_${'C'.repeat(200)}....mp3`,
    ]);
    expect((await fs.readdir(outputDir)).sort()).toEqual([
      '001_A_B.mp3',
      '002__.mp3',
      `003_${'C'.repeat(200)}....mp3`,
    ]);
  });

  it('skips an existing single item without touching the source', async () => {
    await fs.writeFile(path.join(outputDir, 'Only Song.mp3'), 'existing');
    const fake = createFakeSource(makeItems(['Only Song']));

    const report = await runPlaylist(video, config, { source: fake.source });

    expect(report.stats).toEqual({ total: 1, successful: 0, failed: 0, skipped: 1 });
    expect(report.outcomes[0]?.status).toBe('skipped');
    expect(fake.attempted).toEqual([]);
  });

  it('skips an existing named single item without resolving it', async () => {
    await fs.writeFile(path.join(outputDir, 'Only Song.mp3'), 'existing');
    const fake = createFakeSource(makeItems(['Something Else']));

    const report = await runPlaylist({ ...video, name: 'Only Song' }, config, { source: fake.source });

    expect(report.stats).toEqual({ total: 1, successful: 0, failed: 0, skipped: 1 });
    expect(fake.resolveCalls()).toBe(0);
    expect(fake.attempted).toEqual([]);
  });

  it('downloads a named single item under its name, straight from the URL', async () => {
    const fake = createFakeSource(makeItems(['Looked Up Title']));

    const report = await runPlaylist({ ...video, name: 'My: Song' }, config, { source: fake.source });

    expect(fake.resolveCalls()).toBe(0);
    expect(fake.handles).toEqual([video.url]);
    expect(report.stats).toEqual({ total: 1, successful: 1, failed: 0, skipped: 0 });
    expect(report.outcomes[0]?.item).toEqual({ id: 'single', title: 'My: Song', sequenceIndex: 1, handle: video.url });
    expect(report.outcomes[0]?.filePath).toBe(path.join(outputDir, 'My_ Song.mp3'));
  });

  it('writes single items without a numeric prefix', async () => {
    const fake = createFakeSource(makeItems(['Only Song']));

    const report = await runPlaylist(video, config, { source: fake.source });

    expect(report.stats).toEqual({ total: 1, successful: 1, failed: 0, skipped: 0 });
    expect(report.outcomes[0]?.filePath).toBe(path.join(outputDir, 'Only Song.mp3'));
  });

  it('keeps going after a failed item', async () => {
    const fake = createFakeSource(makeItems(['one', 'two', 'three', 'four', 'five']), { failing: [3] });

    const report = await runPlaylist(playlist, config, { source: fake.source });

    expect(report.stats).toEqual({ total: 5, successful: 4, failed: 1, skipped: 0 });
    expect(fake.attempted).toEqual([1, 2, 3, 4, 5]);
    const failure = report.outcomes[2];
    expect(failure?.status).toBe('failure');
    expect(failure?.status === 'failure' && failure.reason).toBe('item 3 unavailable');
  });

  it('produces the same ledger under bounded concurrency, whatever the completion order', async () => {
    const fake = createFakeSource(makeItems(['w', 'x', 'y', 'z']), { delays: { 1: 40, 2: 5, 3: 25, 4: 1 } });

    const report = await runPlaylist(playlist, { ...config, concurrency: 2 }, { source: fake.source });

    expect(report.stats).toEqual({ total: 4, successful: 4, failed: 0, skipped: 0 });
    expect(fake.maxInFlight()).toBe(2);
    expect(fake.completed).not.toEqual([1, 2, 3, 4]);
    expect(report.outcomes.map((outcome) => path.basename(outcome.filePath))).toEqual([
      '001_w.mp3',
      '002_x.mp3',
      '003_y.mp3',
      '004_z.mp3',
    ]);
  });

  it('does not pause between items under bounded concurrency', async () => {
    const fake = createFakeSource(makeItems(['a', 'b', 'c', 'd']));
    const started = Date.now();

    const report = await runPlaylist(
      playlist,
      { ...config, concurrency: 2, interItemDelayMs: 200 },
      { source: fake.source },
    );

    expect(report.stats).toEqual({ total: 4, successful: 4, failed: 0, skipped: 0 });
    expect(Date.now() - started).toBeLessThan(300);
  });

  it('runs one item at a time in sequential mode', async () => {
    const fake = createFakeSource(makeItems(['a', 'b', 'c']), { delays: { 1: 5, 2: 5, 3: 5 } });

    await runPlaylist(playlist, config, { source: fake.source });

    expect(fake.maxInFlight()).toBe(1);
    expect(fake.completed).toEqual([1, 2, 3]);
  });

  it('pauses between sequential items but not after the last one', async () => {
    const fake = createFakeSource(makeItems(['a', 'b', 'c']));
    const started = Date.now();

    await runPlaylist(playlist, { ...config, interItemDelayMs: 30 }, { source: fake.source });

    expect(Date.now() - started).toBeGreaterThanOrEqual(55);
  });

  it('skips everything on a second run over the same directory', async () => {
    const items = makeItems(['first', 'second', 'third']);
    const firstRun = await runPlaylist(playlist, config, { source: createFakeSource(items).source });
    expect(firstRun.stats).toEqual({ total: 3, successful: 3, failed: 0, skipped: 0 });

    const second = createFakeSource(items);
    const secondRun = await runPlaylist(playlist, config, { source: second.source });

    expect(secondRun.stats).toEqual({ total: 3, successful: 0, failed: 0, skipped: 3 });
    expect(second.attempted).toEqual([]);
  });

  it('reports a resolution failure distinctly from an empty playlist', async () => {
    const fake = createFakeSource(new Error('catalog unreachable'));
    const reporter = createMemoryReporter();
    const states: RunState[] = [];

    const report = await runPlaylist(playlist, config, {
      source: fake.source,
      reporter,
      onStateChange: (state) => states.push(state),
    });

    expect(report.state).toBe('failed');
    expect(report.stats).toEqual({ total: 0, successful: 0, failed: 0, skipped: 0 });
    expect(report.error).toBeInstanceOf(ResolutionError);
    expect(report.error?.message).toBe(`Could not read ${playlist.url}: catalog unreachable`);
    expect(states).toEqual(['resolving', 'failed']);
    expect(reporter.events.map((event) => event.type)).toEqual(['run-start', 'run-failed']);
  });

  it('treats an empty resolution as a resolution failure', async () => {
    const fake = createFakeSource([]);

    await expect(runPlaylistOrThrow(playlist, config, { source: fake.source })).rejects.toThrow(ResolutionError);
  });

  it('walks through every state on a successful run', async () => {
    const states: RunState[] = [];
    const fake = createFakeSource(makeItems(['a']));

    await runPlaylist(playlist, config, { source: fake.source, onStateChange: (state) => states.push(state) });

    expect(states).toEqual(['resolving', 'iterating', 'reporting', 'done']);
  });

  it('stops starting new items once aborted', async () => {
    const controller = new AbortController();
    const fake = createFakeSource(makeItems(['a', 'b', 'c', 'd']), {
      onStart: (item) => {
        if (item.sequenceIndex === 2) {
          controller.abort();
        }
      },
    });

    const report = await runPlaylist(playlist, config, { source: fake.source, signal: controller.signal });

    expect(fake.attempted).toEqual([1, 2]);
    expect(report.stats).toEqual({ total: 4, successful: 2, failed: 0, skipped: 0 });
    expect(report.interrupted).toBe(true);
  });

  it('lets in-flight items finish but starts no queued ones once aborted under bounded concurrency', async () => {
    const controller = new AbortController();
    const fake = createFakeSource(makeItems(['a', 'b', 'c', 'd', 'e']), {
      delays: { 1: 20, 2: 20, 3: 20, 4: 20, 5: 20 },
      onStart: (item) => {
        if (item.sequenceIndex === 2) {
          controller.abort();
        }
      },
    });

    const report = await runPlaylist(
      playlist,
      { ...config, concurrency: 2 },
      { source: fake.source, signal: controller.signal },
    );

    expect([...fake.attempted].sort()).toEqual([1, 2]);
    expect([...fake.completed].sort()).toEqual([1, 2]);
    expect(report.stats).toEqual({ total: 5, successful: 2, failed: 0, skipped: 0 });
    expect(report.interrupted).toBe(true);
  });

  it('cuts the inter-item pause short when aborted', async () => {
    const controller = new AbortController();
    const fake = createFakeSource(makeItems(['a', 'b', 'c']));
    const started = Date.now();
    setTimeout(() => controller.abort(), 20);

    const report = await runPlaylist(
      playlist,
      { ...config, interItemDelayMs: 5000 },
      { source: fake.source, signal: controller.signal },
    );

    expect(Date.now() - started).toBeLessThan(1000);
    expect(fake.attempted).toEqual([1]);
    expect(report.stats).toEqual({ total: 3, successful: 1, failed: 0, skipped: 0 });
    expect(report.interrupted).toBe(true);
  });
});
