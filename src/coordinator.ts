import pLimit from 'p-limit';
import { ResolutionError, toErrorMessage } from './errors.js';
import { createLedger, isBalanced, recordOutcome } from './ledger.js';
import { processItem, type ProcessContext } from './processor.js';
import type { Reporter } from './reporter.js';
import type { MediaSource } from './source.js';
import type { ItemDescriptor, Outcome, PlaylistRef, RunConfig, RunState, StatsLedger } from './types.js';
import { extractVideoId, sleep } from './utils.js';

export interface RunDependencies {
  readonly source: MediaSource;
  readonly reporter?: Reporter;
  /** Once aborted, no further items are started; in-flight items run to completion. */
  readonly signal?: AbortSignal;
  readonly onStateChange?: (state: RunState) => void;
}

export interface RunReport {
  readonly state: 'done' | 'failed';
  readonly stats: StatsLedger;
  /** In sequence order, whatever order the items finished in. */
  readonly outcomes: Outcome[];
  readonly interrupted: boolean;
  readonly error?: ResolutionError;
}

/**
 * A named single item needs no lookup: the name is its title and the URL its handle.
 */
const describeNamedItem = (ref: PlaylistRef, name: string): ItemDescriptor => ({
  id: extractVideoId(ref.url) ?? ref.url,
  title: name,
  sequenceIndex: 1,
  handle: ref.url,
});

const bySequence = (a: { sequenceIndex: number }, b: { sequenceIndex: number }): number =>
  a.sequenceIndex - b.sequenceIndex;

/**
 * Resolves the reference, processes every item and returns the per-run ledger.
 *
 * Item failures are recorded and the run carries on. A resolution failure ends the run in the
 * `failed` state with an empty ledger and the error attached, so an unreadable playlist is
 * never reported as an empty successful one.
 */
export const runPlaylist = async (
  ref: PlaylistRef,
  config: RunConfig,
  deps: RunDependencies,
): Promise<RunReport> => {
  const { source, reporter, signal } = deps;
  const stats = createLedger();
  const outcomes: Outcome[] = [];
  let state: RunState = 'idle';

  const enter = (next: RunState): void => {
    state = next;
    deps.onStateChange?.(state);
  };

  reporter?.onEvent({ type: 'run-start', ref, source: source.name });
  enter('resolving');

  let items: ItemDescriptor[];
  try {
    items =
      ref.kind === 'single-item' && ref.name ? [describeNamedItem(ref, ref.name)] : await source.resolve(ref);
    if (items.length === 0) {
      throw new ResolutionError(`No playable videos found at ${ref.url}`);
    }
  } catch (error) {
    const resolutionError =
      error instanceof ResolutionError
        ? error
        : new ResolutionError(`Could not read ${ref.url}: ${toErrorMessage(error)}`, { cause: error });
    enter('failed');
    reporter?.onEvent({ type: 'run-failed', ref, reason: resolutionError.message });
    return { state: 'failed', stats, outcomes, interrupted: false, error: resolutionError };
  }

  if (ref.kind === 'single-item') {
    const [first] = items;
    items = [{ ...first, sequenceIndex: 1 }];
  } else {
    items = [...items].sort(bySequence);
  }

  stats.total = items.length;
  reporter?.onEvent({ type: 'resolved', ref, total: stats.total });
  enter('iterating');

  const context: ProcessContext = {
    source,
    outputDir: config.outputDir,
    quality: config.quality,
    kind: ref.kind,
    reporter,
  };

  const record = (outcome: Outcome): void => {
    recordOutcome(stats, outcome.status);
    outcomes.push(outcome);
  };

  if (config.concurrency > 1) {
    const limit = pLimit(config.concurrency);
    await Promise.all(
      items.map((item) =>
        limit(async () => {
          if (signal?.aborted) {
            return;
          }
          record(await processItem(item, context));
        }),
      ),
    );
  } else {
    for (const [position, item] of items.entries()) {
      if (signal?.aborted) {
        break;
      }
      record(await processItem(item, context));
      if (position < items.length - 1) {
        await sleep(config.interItemDelayMs, signal);
      }
    }
  }

  enter('reporting');
  outcomes.sort((a, b) => bySequence(a.item, b.item));
  const interrupted = !isBalanced(stats);
  reporter?.onEvent({ type: 'run-complete', ref, stats: { ...stats }, outputDir: config.outputDir });
  enter('done');

  return { state: 'done', stats, outcomes, interrupted };
};

/**
 * Same as runPlaylist but rejects with the ResolutionError instead of returning a failed report.
 */
export const runPlaylistOrThrow = async (
  ref: PlaylistRef,
  config: RunConfig,
  deps: RunDependencies,
): Promise<RunReport> => {
  const report = await runPlaylist(ref, config, deps);
  if (report.error) {
    throw report.error;
  }
  return report;
};
