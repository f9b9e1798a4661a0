#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { exitCodeFor, parseArgs, printHelp, toRunConfig, type CliConfig } from './cli.js';
import { runPlaylist, type RunReport } from './coordinator.js';
import {
  availableBackends,
  checkEnvironment,
  formatEnvironmentReport,
  installGuidance,
  type EnvironmentReport,
} from './environment.js';
import { createConsoleReporter } from './reporter.js';
import { createMediaSource, type Backend } from './source.js';
import { cleanupPlayerScripts, isYoutubePlaylistUrl, isYoutubeUrl, parsePlaylistRef, verifyInternet } from './utils.js';

const LEGAL_NOTICE = [
  '',
  'NOTICE',
  'Only download content you have the rights or permission to use, and respect',
  "the platform's Terms of Service and applicable copyright law.",
  '',
].join('\n');

/**
 * Shows the usage notice and requires explicit agreement before anything is downloaded.
 */
const promptForNotice = async (): Promise<boolean> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    console.log(LEGAL_NOTICE);
    for (;;) {
      const answer = await rl.question('Do you agree? (y/n): ');
      const normalized = answer.trim().toLowerCase();
      if (normalized === 'y' || normalized === 'yes') {
        return true;
      }
      if (normalized === 'n' || normalized === 'no') {
        return false;
      }
      console.log('Please respond with y(es) or n(o).');
    }
  } finally {
    rl.close();
  }
};

/**
 * Prompts for a YouTube playlist or video URL when none was passed on the command line.
 */
const promptForUrl = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      const answer = await rl.question('Enter a YouTube playlist or video URL: ');
      const normalized = answer.trim();
      if (normalized && isYoutubeUrl(normalized)) {
        return normalized;
      }
      console.log('Please provide a valid YouTube URL.');
    }
  } finally {
    rl.close();
  }
};

/**
 * Asks for an optional output name for a single video. Blank keeps the video title.
 */
const promptForName = async (): Promise<string | undefined> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = (await rl.question('Custom file name (optional): ')).trim();
    return answer || undefined;
  } finally {
    rl.close();
  }
};

/**
 * Lets the user pick a backend when more than one is installed.
 */
const promptForBackend = async (backends: Backend[]): Promise<Backend> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      console.log('\nSelect download backend:');
      backends.forEach((backend, index) => {
        console.log(`  ${index + 1}. ${backend}${index === 0 ? ' (default)' : ''}`);
      });
      const answer = (await rl.question(`Enter choice (1-${backends.length}): `)).trim();
      if (answer === '') {
        return backends[0] ?? 'ytdl';
      }
      const choice = backends[Number.parseInt(answer, 10) - 1];
      if (choice) {
        return choice;
      }
      console.log('Invalid selection, please try again.');
    }
  } finally {
    rl.close();
  }
};

const printEnvironment = (report: EnvironmentReport): void => {
  console.log('\nDependency status:');
  formatEnvironmentReport(report).forEach((line) => console.log(line));
  installGuidance(report).forEach((line) => console.log(`  - ${line}`));
};

/**
 * Decides the backend: explicit choice first, then yt-dlp when metadata files are wanted,
 * otherwise the only one installed, otherwise ask.
 */
const chooseBackend = async (
  config: CliConfig,
  report: EnvironmentReport,
  interactive: boolean,
): Promise<Backend | null> => {
  const usable = availableBackends(report);
  if (config.backend) {
    if (!usable.includes(config.backend)) {
      console.warn(`Backend ${config.backend} is missing tools; continuing anyway.`);
    }
    return config.backend;
  }
  if (usable.length === 0) {
    return null;
  }
  if (config.metadata && usable.includes('yt-dlp')) {
    return 'yt-dlp';
  }
  if (usable.length === 1 || !interactive) {
    return usable[0] ?? null;
  }
  return promptForBackend(usable);
};

/**
 * Summarizes per-item results once the run has finished.
 */
const printSummary = (report: RunReport): void => {
  if (report.outcomes.length === 0) {
    return;
  }
  console.log('\nDownload summary');
  console.table(
    report.outcomes.map((outcome) => ({
      '#': outcome.item.sequenceIndex,
      Title: outcome.item.title,
      Status: outcome.status,
      Reason: outcome.status === 'failure' ? outcome.reason : '',
      File: path.basename(outcome.filePath),
    })),
  );
  if (report.interrupted) {
    console.log(`Interrupted: ${report.stats.total - report.outcomes.length} item(s) were never started.`);
  }
};

/**
 * Entry point that resolves configuration, checks the environment, and runs one session.
 */
const main = async (): Promise<number> => {
  const rawArgs = process.argv.slice(2);
  const config = parseArgs(rawArgs);
  const interactive = Boolean(stdin.isTTY);

  if (config.help) {
    printHelp();
    return 0;
  }

  const environment = await checkEnvironment({ ffmpegPath: config.ffmpegPath, ytDlpPath: config.ytDlpPath });
  if (config.checkOnly) {
    printEnvironment(environment);
    return availableBackends(environment).length > 0 ? 0 : 1;
  }

  if (!config.acceptTerms) {
    if (!interactive) {
      console.error('Pass --yes to accept the usage notice in non-interactive mode.');
      return 1;
    }
    if (!(await promptForNotice())) {
      console.log('You must agree to the notice to continue.');
      return 1;
    }
  }

  const backend = await chooseBackend(config, environment, interactive);
  if (!backend) {
    printEnvironment(environment);
    console.error('No download backend is usable. Install the missing tools and try again.');
    return 1;
  }
  if (config.metadata && backend !== 'yt-dlp') {
    console.error('--metadata and --thumbnails need the yt-dlp backend.');
    return 1;
  }

  const promptedUrl = config.url === undefined && interactive;
  const url = config.url ?? (promptedUrl ? await promptForUrl() : undefined);
  if (!url || !isYoutubeUrl(url)) {
    console.error('A valid YouTube URL is required.');
    return 1;
  }
  const isPlaylist = isYoutubePlaylistUrl(url);
  if (config.name && isPlaylist) {
    console.warn('--name only applies to single videos; ignoring it.');
  }
  const name = config.name ?? (promptedUrl && !isPlaylist ? await promptForName() : undefined);

  try {
    await verifyInternet();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Connectivity check failed: ${message}`);
  }

  const ref = parsePlaylistRef(url, name);
  const runConfig = toRunConfig(config);
  const reporter = createConsoleReporter({ logDir: process.cwd() });
  const source = createMediaSource(backend, {
    ffmpegPath: config.ffmpegPath,
    ytDlpPath: config.ytDlpPath,
    apiKey: runConfig.apiKey,
    metadata: config.metadata ? { thumbnails: config.thumbnails } : undefined,
  });

  console.log(`\n${ref.kind === 'collection' ? 'Playlist' : 'Single video'} -> ${runConfig.outputDir}`);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.log('\nStopping after the items in progress. Press Ctrl+C again to quit immediately.');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  try {
    const report = await runPlaylist(ref, runConfig, { source, reporter, signal: controller.signal });
    printSummary(report);
    return exitCodeFor(report);
  } finally {
    process.off('SIGINT', onInterrupt);
    const problems = await cleanupPlayerScripts();
    problems.forEach((problem) => console.warn(problem));
    await reporter.flush?.();
  }
};

void main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Fatal error: ${message}`);
    process.exit(1);
  });
