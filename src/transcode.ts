import ffmpeg from 'fluent-ffmpeg';
import type { ProgressCallback } from './source.js';

export interface TranscodeOptions {
  readonly inputPath: string;
  readonly outputPath: string;
  /** Bitrate in kbps. */
  readonly quality: number;
  readonly ffmpegPath?: string;
  readonly onProgress?: ProgressCallback;
}

export type Transcoder = (options: TranscodeOptions) => Promise<void>;

const SAMPLE_RATE = 44100;
const CHANNELS = 2;

/**
 * Converts a local media file into an mp3 at the requested bitrate.
 */
export const transcodeToMp3: Transcoder = ({ inputPath, outputPath, quality, ffmpegPath, onProgress }) =>
  new Promise((resolve, reject) => {
    const command = ffmpeg(inputPath);
    if (ffmpegPath) {
      command.setFfmpegPath(ffmpegPath);
    }

    command
      .noVideo()
      .audioCodec('libmp3lame')
      .audioBitrate(quality)
      .audioFrequency(SAMPLE_RATE)
      .audioChannels(CHANNELS)
      .format('mp3')
      .on('progress', (progress: { percent?: number }) => {
        if (typeof progress.percent === 'number' && !Number.isNaN(progress.percent)) {
          onProgress?.(Math.min(1, Math.max(0, progress.percent / 100)));
        }
      })
      .on('error', (error: Error) => {
        reject(error);
      })
      .on('end', () => {
        resolve();
      })
      .save(outputPath);
  });
