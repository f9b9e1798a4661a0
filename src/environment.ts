import { spawn } from 'node:child_process';
import type { Backend } from './source.js';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (args: string[]) => Promise<CommandResult>;

export interface ToolStatus {
  readonly name: 'ffmpeg' | 'yt-dlp';
  readonly path: string;
  readonly available: boolean;
  readonly version?: string;
}

export interface EnvironmentReport {
  readonly ffmpeg: ToolStatus;
  readonly ytDlp: ToolStatus;
}

/**
 * Runs a binary and collects its output. Rejects only when the process cannot be started.
 */
export const runCommand = async (args: string[]): Promise<CommandResult> => {
  const [cmd, ...rest] = args;
  if (!cmd) {
    throw new Error('runCommand requires at least one argument');
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(cmd, rest, { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on('error', reject);
    proc.on('close', (code) => {
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      });
    });
  });
};

const probe = async (
  name: ToolStatus['name'],
  path: string,
  versionFlag: string,
  run: CommandRunner,
): Promise<ToolStatus> => {
  try {
    const result = await run([path, versionFlag]);
    if (result.code !== 0) {
      return { name, path, available: false };
    }
    const firstLine = result.stdout.split(/\r?\n/u)[0]?.trim();
    return { name, path, available: true, version: firstLine || undefined };
  } catch {
    // spawn fails with ENOENT when the binary is not installed
    return { name, path, available: false };
  }
};

/**
 * Checks which external tools the backends rely on are installed.
 */
export const checkEnvironment = async (
  paths: { readonly ffmpegPath?: string; readonly ytDlpPath?: string } = {},
  run: CommandRunner = runCommand,
): Promise<EnvironmentReport> => {
  const [ffmpeg, ytDlp] = await Promise.all([
    probe('ffmpeg', paths.ffmpegPath ?? 'ffmpeg', '-version', run),
    probe('yt-dlp', paths.ytDlpPath ?? 'yt-dlp', '--version', run),
  ]);
  return { ffmpeg, ytDlp };
};

/**
 * Backends whose tools are all present. yt-dlp needs ffmpeg for audio extraction too.
 */
export const availableBackends = (report: EnvironmentReport): Backend[] => {
  const backends: Backend[] = [];
  if (report.ffmpeg.available) {
    backends.push('ytdl');
    if (report.ytDlp.available) {
      backends.push('yt-dlp');
    }
  }
  return backends;
};

export const installGuidance = (report: EnvironmentReport): string[] => {
  const lines: string[] = [];
  if (!report.ffmpeg.available) {
    lines.push(
      `ffmpeg not found at "${report.ffmpeg.path}". Install it (apt install ffmpeg, brew install ffmpeg, winget install ffmpeg) or set FFMPEG_PATH.`,
    );
  }
  if (!report.ytDlp.available) {
    lines.push(
      `yt-dlp not found at "${report.ytDlp.path}". Install it (pipx install yt-dlp, brew install yt-dlp) or set YT_DLP_PATH to use the yt-dlp backend.`,
    );
  }
  return lines;
};

export const formatEnvironmentReport = (report: EnvironmentReport): string[] =>
  [report.ffmpeg, report.ytDlp].map(
    (tool) => `  ${tool.name.padEnd(8)} ${tool.available ? `ok (${tool.version ?? 'unknown version'})` : 'missing'}`,
  );
