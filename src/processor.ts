import fs from 'fs-extra';
import { FilesystemError, toErrorMessage } from './errors.js';
import type { Reporter } from './reporter.js';
import type { MediaSource } from './source.js';
import type { ItemDescriptor, Outcome, RefKind } from './types.js';
import { isAlreadyDownloaded, resolveDestinationPath } from './utils.js';

export interface ProcessContext {
  readonly source: MediaSource;
  readonly outputDir: string;
  readonly quality: number;
  /** Collection items get a numeric filename prefix, single items do not. */
  readonly kind: RefKind;
  readonly reporter?: Reporter;
}

/**
 * Computes where an item's mp3 lands for the given run shape.
 */
export const destinationFor = (item: ItemDescriptor, outputDir: string, kind: RefKind): string =>
  resolveDestinationPath(outputDir, item.title, kind === 'collection' ? item.sequenceIndex : undefined);

/**
 * Turns one item into an Outcome. Existing files are skipped without touching the source.
 * Never throws; every error becomes a failure outcome.
 */
export const processItem = async (item: ItemDescriptor, context: ProcessContext): Promise<Outcome> => {
  const { source, outputDir, quality, kind, reporter } = context;
  const filePath = destinationFor(item, outputDir, kind);

  const fail = (error: unknown): Outcome => {
    const cause = error instanceof Error ? error : new Error(String(error));
    reporter?.onEvent({ type: 'item-error', item, reason: cause.message });
    return { status: 'failure', item, filePath, reason: cause.message, error: cause };
  };

  try {
    if (await isAlreadyDownloaded(filePath)) {
      reporter?.onEvent({ type: 'item-skipped', item, filePath });
      return { status: 'skipped', item, filePath };
    }
  } catch (error) {
    return fail(error);
  }

  try {
    await fs.ensureDir(outputDir);
  } catch (error) {
    return fail(
      new FilesystemError(outputDir, `Cannot create ${outputDir}: ${toErrorMessage(error)}`, { cause: error }),
    );
  }

  reporter?.onEvent({ type: 'item-start', item, filePath });

  try {
    await source.fetchAndTranscode(item, quality, filePath, (ratio) => {
      reporter?.onEvent({ type: 'item-progress', item, ratio });
    });
  } catch (error) {
    return fail(error);
  }

  reporter?.onEvent({ type: 'item-complete', item, filePath });
  return { status: 'success', item, filePath };
};
