import { describe, expect, it } from 'vitest';
import {
  availableBackends,
  checkEnvironment,
  formatEnvironmentReport,
  installGuidance,
  runCommand,
  type CommandRunner,
} from './environment.js';

const runnerWith =
  (installed: Record<string, string>): CommandRunner =>
  async ([binary]) => {
    const version = binary === undefined ? undefined : installed[binary];
    if (version === undefined) {
      throw Object.assign(new Error(`spawn ${binary ?? ''} ENOENT`), { code: 'ENOENT' });
    }
    return { code: 0, stdout: `${version}\nmore output\n`, stderr: '' };
  };

describe('checkEnvironment', () => {
  it('reports both tools when installed', async () => {
    const report = await checkEnvironment({}, runnerWith({ ffmpeg: 'ffmpeg version 6.1', 'yt-dlp': '2024.08.06' }));

    expect(report.ffmpeg).toEqual({ name: 'ffmpeg', path: 'ffmpeg', available: true, version: 'ffmpeg version 6.1' });
    expect(report.ytDlp.available).toBe(true);
    expect(availableBackends(report)).toEqual(['ytdl', 'yt-dlp']);
    expect(installGuidance(report)).toEqual([]);
    expect(formatEnvironmentReport(report)).toEqual([
      '  ffmpeg   ok (ffmpeg version 6.1)',
      '  yt-dlp   ok (2024.08.06)',
    ]);
  });

  it('uses configured binary paths', async () => {
    const report = await checkEnvironment(
      { ffmpegPath: '/opt/ffmpeg', ytDlpPath: '/opt/yt-dlp' },
      runnerWith({ '/opt/ffmpeg': 'ffmpeg version 7.0' }),
    );

    expect(report.ffmpeg.available).toBe(true);
    expect(report.ytDlp).toEqual({ name: 'yt-dlp', path: '/opt/yt-dlp', available: false });
    expect(availableBackends(report)).toEqual(['ytdl']);
    expect(installGuidance(report)).toHaveLength(1);
  });

  it('has no backend without ffmpeg', async () => {
    const report = await checkEnvironment({}, runnerWith({ 'yt-dlp': '2024.08.06' }));

    expect(availableBackends(report)).toEqual([]);
    expect(installGuidance(report)[0]).toMatch(/^ffmpeg not found at "ffmpeg"/);
  });

  it('treats a non-zero exit as missing', async () => {
    const report = await checkEnvironment({}, async () => ({ code: 1, stdout: '', stderr: 'bad' }));

    expect(report.ffmpeg.available).toBe(false);
    expect(report.ytDlp.available).toBe(false);
  });
});

describe('runCommand', () => {
  it('rejects without a binary to run', async () => {
    await expect(runCommand([])).rejects.toThrow('runCommand requires at least one argument');
  });
});
