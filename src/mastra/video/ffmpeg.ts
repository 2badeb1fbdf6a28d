import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { config } from '../../config';
import logger from '../../utils/logger';
import { SHORTS_FORMAT, type CombineResult, type ProcessVideoResult } from './types';

export interface FfmpegOutcome {
  exitCode: number;
  stderr: string;
}

export type FfmpegRunner = (args: string[]) => Promise<FfmpegOutcome>;

export interface MediaOptions {
  runFfmpeg?: FfmpegRunner;
  outputDir?: string;
  now?: () => Date;
}

// Spawns the configured ffmpeg binary and collects stderr; resolves on exit.
export const runFfmpeg: FfmpegRunner = (args) =>
  new Promise((resolve, reject) => {
    const child = spawn(config.video.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => resolve({ exitCode: code ?? 1, stderr }));
  });

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS, used to name output files. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function outputPath(prefix: string, extension: string, options: MediaOptions = {}): string {
  const now = options.now?.() ?? new Date();
  return join(options.outputDir ?? config.video.outputDir, `${prefix}_${fileTimestamp(now)}.${extension}`);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Scale and crop a background clip to 1080x1920 and cap its length,
 * the format YouTube Shorts expects.
 */
export async function processBackgroundVideo(
  videoPath: string,
  duration: number = 60,
  options: MediaOptions = {}
): Promise<ProcessVideoResult> {
  if (!existsSync(videoPath)) {
    return { status: 'error', errorMessage: `Video file not found: ${videoPath}` };
  }

  const target = outputPath('processed_background', 'mp4', options);
  const args = [
    '-i', videoPath,
    '-vf', 'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920',
    '-t', String(duration),
    '-c:v', 'libx264', '-c:a', 'aac',
    '-b:v', '2M', '-b:a', '128k',
    '-movflags', '+faststart',
    '-y', target,
  ];

  try {
    const { exitCode, stderr } = await (options.runFfmpeg ?? runFfmpeg)(args);
    if (exitCode !== 0) {
      return { status: 'error', errorMessage: `FFmpeg error: ${stderr}` };
    }

    return {
      status: 'success',
      message: `Video processed successfully: ${target}`,
      outputPath: target,
      format: SHORTS_FORMAT,
      duration,
    };
  } catch (error) {
    logger.error('Error processing video', { error: describeError(error) });
    return { status: 'error', errorMessage: `Error processing video: ${describeError(error)}` };
  }
}

// Lay the voiceover over the processed clip, stopping at the shorter input
export async function combineAudioVideo(
  videoPath: string,
  audioPath: string,
  title: string = 'YouTube Short',
  options: MediaOptions = {}
): Promise<CombineResult> {
  if (!existsSync(videoPath) || !existsSync(audioPath)) {
    return { status: 'error', errorMessage: 'Video or audio file not found' };
  }

  const target = outputPath('youtube_short', 'mp4', options);
  const args = [
    '-i', videoPath, '-i', audioPath,
    '-c:v', 'copy', '-c:a', 'aac', '-b:a', '128k',
    '-map', '0:v:0', '-map', '1:a:0',
    '-shortest',
    '-movflags', '+faststart',
    '-y', target,
  ];

  try {
    const { exitCode, stderr } = await (options.runFfmpeg ?? runFfmpeg)(args);
    if (exitCode !== 0) {
      return { status: 'error', errorMessage: `FFmpeg error: ${stderr}` };
    }

    return {
      status: 'success',
      message: `YouTube Short created: ${target}`,
      outputPath: target,
      title,
      readyForUpload: true,
    };
  } catch (error) {
    logger.error('Error combining audio/video', { error: describeError(error) });
    return { status: 'error', errorMessage: `Error combining audio/video: ${describeError(error)}` };
  }
}
