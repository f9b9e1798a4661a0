import path from 'node:path';
import cliProgress from 'cli-progress';
import fs from 'fs-extra';
import { summarizeStats } from './ledger.js';
import type { ItemDescriptor, ProgressEvent } from './types.js';

/**
 * Receives pipeline events. Purely observational: nothing a reporter does feeds back into the run.
 */
export interface Reporter {
  onEvent(event: ProgressEvent): void;
  /** Resolves once everything the reporter queued (log file appends) has been written. */
  flush?(): Promise<void>;
}

/**
 * Collects every event in memory, mostly useful for tests.
 */
export const createMemoryReporter = (): Reporter & { readonly events: ProgressEvent[] } => {
  const events: ProgressEvent[] = [];
  return {
    events,
    onEvent: (event) => {
      events.push(event);
    },
  };
};

export interface ConsoleReporterOptions {
  /** Directory holding errors.log and downloaded.log. */
  readonly logDir: string;
  readonly showProgress?: boolean;
  readonly write?: (line: string) => void;
}

export const ERRORS_LOG_NAME = 'errors.log';
export const DOWNLOADED_LOG_NAME = 'downloaded.log';

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

const displayTitle = (item: ItemDescriptor): string =>
  `${item.sequenceIndex}. ${item.title.length > 0 ? item.title : item.id}`;

export const formatFailureLine = (timestamp: string, item: ItemDescriptor, reason: string): string =>
  `[${timestamp}] ${item.title || item.id} (${item.handle}) :: ${reason}\n`;

export const formatSuccessLine = (
  timestamp: string,
  filePath: string,
  playlistUrl?: string,
): string => {
  const fileName = path.basename(filePath);
  if (playlistUrl) {
    const folderName = path.basename(path.dirname(filePath));
    return `[${timestamp}] [PLAYLIST: ${playlistUrl}] [FOLDER: ${folderName}] ${fileName}\n`;
  }
  return `[${timestamp}] ${fileName}\n`;
};

export const formatPlaylistSummary = (
  timestamp: string,
  playlistUrl: string,
  outputDir: string,
  completed: number,
  total: number,
): string =>
  `\n[${timestamp}] ========================================\n` +
  `[${timestamp}] PLAYLIST SUMMARY: ${playlistUrl}\n` +
  `[${timestamp}] FOLDER: ${path.basename(outputDir)}\n` +
  `[${timestamp}] COMPLETED: ${completed}/${total} files\n` +
  `[${timestamp}] ========================================\n\n`;

type ProgressBar = ReturnType<cliProgress.MultiBar['create']>;

/**
 * Console output with per-item progress bars, plus append-only log files for successes and failures.
 */
export const createConsoleReporter = (options: ConsoleReporterOptions): Reporter => {
  const write = options.write ?? ((line: string) => console.log(line));
  const errorsLog = path.resolve(options.logDir, ERRORS_LOG_NAME);
  const downloadedLog = path.resolve(options.logDir, DOWNLOADED_LOG_NAME);
  const bars = new Map<number, ProgressBar>();
  let multiBar: cliProgress.MultiBar | null = null;
  let playlistUrl: string | undefined;
  let pending: Promise<void> = Promise.resolve();

  const append = (file: string, text: string): void => {
    pending = pending
      .then(() => fs.ensureDir(path.dirname(file)))
      .then(() => fs.appendFile(file, text))
      .catch((error: unknown) => {
        console.warn(`Could not write ${file}: ${error instanceof Error ? error.message : String(error)}`);
      });
  };

  const getMultiBar = (): cliProgress.MultiBar => {
    if (!multiBar) {
      multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          format: '{bar} {percentage}% | {title}',
        },
        cliProgress.Presets.shades_grey,
      );
    }
    return multiBar;
  };

  const stopBar = (item: ItemDescriptor): void => {
    const bar = bars.get(item.sequenceIndex);
    if (bar) {
      bar.stop();
      multiBar?.remove(bar);
      bars.delete(item.sequenceIndex);
    }
  };

  const stopAll = (): void => {
    if (multiBar) {
      multiBar.stop();
      multiBar = null;
    }
    bars.clear();
  };

  const onEvent = (event: ProgressEvent): void => {
    const timestamp = new Date().toISOString();
    switch (event.type) {
      case 'run-start':
        playlistUrl = event.ref.kind === 'collection' ? event.ref.url : undefined;
        write(`Resolving ${event.ref.url} with ${event.source}...`);
        break;
      case 'resolved':
        write(`Found ${event.total} item(s).`);
        break;
      case 'item-start':
        if (options.showProgress ?? true) {
          bars.set(
            event.item.sequenceIndex,
            getMultiBar().create(100, 0, { title: truncateTitle(displayTitle(event.item)) }),
          );
        }
        break;
      case 'item-progress': {
        const clamped = Math.min(100, Math.max(0, Math.floor(event.ratio * 100)));
        bars.get(event.item.sequenceIndex)?.update(clamped);
        break;
      }
      case 'item-complete':
        bars.get(event.item.sequenceIndex)?.update(100);
        stopBar(event.item);
        append(downloadedLog, formatSuccessLine(timestamp, event.filePath, playlistUrl));
        break;
      case 'item-skipped':
        write(`Skipping existing file: ${path.basename(event.filePath)}`);
        break;
      case 'item-error':
        stopBar(event.item);
        append(errorsLog, formatFailureLine(timestamp, event.item, event.reason));
        break;
      case 'run-failed':
        stopAll();
        write(`Failed to load ${event.ref.url}: ${event.reason}`);
        append(errorsLog, `[${timestamp}] Playlist load failed (${event.ref.url}) :: ${event.reason}\n`);
        break;
      case 'run-complete':
        stopAll();
        write(summarizeStats(event.stats));
        if (event.ref.kind === 'collection') {
          append(
            downloadedLog,
            formatPlaylistSummary(timestamp, event.ref.url, event.outputDir, event.stats.successful, event.stats.total),
          );
        }
        break;
    }
  };

  return {
    onEvent,
    flush: async () => {
      await pending;
    },
  };
};
