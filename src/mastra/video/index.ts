import logger from '../../utils/logger';
import { combineAudioVideo, processBackgroundVideo, type MediaOptions } from './ffmpeg';
import { generateTtsAudio, type SpeechApi } from './tts';
import { uploadToYoutube, type YoutubeVideosApi } from './youtube';
import type { OpenAIVoice, PipelineStep, YoutubeShortResult } from './types';

export interface YoutubeShortRequest {
  videoPath: string;
  transcript: string;
  title: string;
  description?: string;
  voice?: OpenAIVoice;
  tags?: string[];
}

export interface YoutubeShortDeps extends MediaOptions {
  speech?: SpeechApi | null;
  videos?: YoutubeVideosApi | null;
}

/**
 * Process the background clip, voice the transcript, combine the two and
 * upload the result. Stops at the first failing step; a failed upload
 * still returns the finished file as a partial success.
 */
export async function createYoutubeShort(
  request: YoutubeShortRequest,
  deps: YoutubeShortDeps = {}
): Promise<YoutubeShortResult> {
  const pipelineSteps: PipelineStep[] = [];

  logger.info('[Step 1] Processing background video', { videoPath: request.videoPath });
  const videoResult = await processBackgroundVideo(request.videoPath, 60, deps);
  pipelineSteps.push({ step: 'video_processing', result: videoResult });
  if (videoResult.status === 'error') {
    return {
      status: 'error',
      errorMessage: `Video processing failed: ${videoResult.errorMessage}`,
      pipelineSteps,
    };
  }

  logger.info('[Step 2] Generating TTS audio', { voice: request.voice ?? 'alloy' });
  const audioResult = await generateTtsAudio(request.transcript, request.voice, deps);
  pipelineSteps.push({ step: 'tts_generation', result: audioResult });
  if (audioResult.status === 'error') {
    return {
      status: 'error',
      errorMessage: `TTS generation failed: ${audioResult.errorMessage}`,
      pipelineSteps,
    };
  }

  logger.info('[Step 3] Combining audio and video');
  const combineResult = await combineAudioVideo(
    videoResult.outputPath,
    audioResult.audioPath,
    request.title,
    deps
  );
  pipelineSteps.push({ step: 'audio_video_combine', result: combineResult });
  if (combineResult.status === 'error') {
    return {
      status: 'error',
      errorMessage: `Audio/video combination failed: ${combineResult.errorMessage}`,
      pipelineSteps,
    };
  }

  logger.info('[Step 4] Uploading to YouTube');
  const uploadResult = await uploadToYoutube(
    combineResult.outputPath,
    request.title,
    request.description,
    request.tags,
    deps.videos
  );
  pipelineSteps.push({ step: 'youtube_upload', result: uploadResult });
  if (uploadResult.status === 'error') {
    return {
      status: 'partial_success',
      message: `YouTube Short created but upload failed: ${uploadResult.errorMessage}`,
      finalVideoPath: combineResult.outputPath,
      pipelineSteps,
    };
  }

  return {
    status: 'success',
    message: 'YouTube Short created and uploaded successfully!',
    videoUrl: uploadResult.videoUrl,
    videoId: uploadResult.videoId,
    finalVideoPath: combineResult.outputPath,
    pipelineSteps,
  };
}

export { combineAudioVideo, fileTimestamp, processBackgroundVideo, runFfmpeg } from './ffmpeg';
export type { FfmpegOutcome, FfmpegRunner, MediaOptions } from './ffmpeg';
export { createSpeechApi, generateTtsAudio, getSupportedVoices, isOpenAIVoice } from './tts';
export type { SpeechApi, TtsOptions } from './tts';
export { createYoutubeVideosApi, DEFAULT_TAGS, uploadToYoutube } from './youtube';
export type { YoutubeVideosApi } from './youtube';
export * from './types';
