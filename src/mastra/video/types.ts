export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAIVoice = typeof OPENAI_VOICES[number];

export const SHORTS_FORMAT = '9:16 (YouTube Shorts)';

export type ErrorResult = { status: 'error'; errorMessage: string };

export type ProcessVideoResult =
  | {
      status: 'success';
      message: string;
      outputPath: string;
      format: typeof SHORTS_FORMAT;
      duration: number;
    }
  | ErrorResult;

export type TtsResult =
  | {
      status: 'success';
      message: string;
      audioPath: string;
      voice: OpenAIVoice;
      transcriptLength: number;
    }
  | ErrorResult;

export type CombineResult =
  | {
      status: 'success';
      message: string;
      outputPath: string;
      title: string;
      readyForUpload: true;
    }
  | ErrorResult;

export type UploadResult =
  | {
      status: 'success';
      message: string;
      videoId: string;
      videoUrl: string;
      title: string;
    }
  | ErrorResult;

export type PipelineStep =
  | { step: 'video_processing'; result: ProcessVideoResult }
  | { step: 'tts_generation'; result: TtsResult }
  | { step: 'audio_video_combine'; result: CombineResult }
  | { step: 'youtube_upload'; result: UploadResult };

export type YoutubeShortResult =
  | {
      status: 'success';
      message: string;
      videoUrl: string;
      videoId: string;
      finalVideoPath: string;
      pipelineSteps: PipelineStep[];
    }
  | {
      status: 'partial_success';
      message: string;
      finalVideoPath: string;
      pipelineSteps: PipelineStep[];
    }
  | { status: 'error'; errorMessage: string; pipelineSteps: PipelineStep[] };
