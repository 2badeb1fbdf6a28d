import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import {
  combineAudioVideo,
  createYoutubeShort,
  generateTtsAudio,
  getSupportedVoices,
  OPENAI_VOICES,
  processBackgroundVideo,
  uploadToYoutube,
} from '../video';

export const youtubeShortTool = createTool({
  id: 'youtube-short-tool',
  description:
    'Turn a background video and a transcript into a 9:16 YouTube Short with an AI voiceover, and upload it',
  inputSchema: z.object({
    action: z.enum([
      'processBackgroundVideo',
      'generateTtsAudio',
      'combineAudioVideo',
      'uploadToYoutube',
      'createYoutubeShort',
      'getSupportedVoices',
    ]),
    videoPath: z.string().optional(),
    audioPath: z.string().optional(),
    duration: z.number().int().positive().optional().default(60),
    transcript: z.string().optional(),
    voice: z.enum(OPENAI_VOICES).optional().default('alloy'),
    title: z.string().optional(),
    description: z.string().optional().default(''),
    tags: z.array(z.string()).optional(),
  }),
  execute: async ({ context }) => {
    const { action, videoPath, audioPath, duration, transcript, voice, title, description, tags } =
      context;

    switch (action) {
      case 'processBackgroundVideo': {
        if (!videoPath) {
          return { status: 'error' as const, errorMessage: 'Video path is required' };
        }
        return processBackgroundVideo(videoPath, duration);
      }

      case 'generateTtsAudio': {
        if (!transcript) {
          return { status: 'error' as const, errorMessage: 'Transcript is required' };
        }
        return generateTtsAudio(transcript, voice);
      }

      case 'combineAudioVideo': {
        if (!videoPath || !audioPath) {
          return { status: 'error' as const, errorMessage: 'Video and audio paths are required' };
        }
        return combineAudioVideo(videoPath, audioPath, title);
      }

      case 'uploadToYoutube': {
        if (!videoPath || !title) {
          return { status: 'error' as const, errorMessage: 'Video path and title are required' };
        }
        return uploadToYoutube(videoPath, title, description, tags);
      }

      case 'createYoutubeShort': {
        if (!videoPath || !transcript || !title) {
          return {
            status: 'error' as const,
            errorMessage: 'Video path, transcript and title are required',
          };
        }
        return createYoutubeShort({ videoPath, transcript, title, description, voice, tags });
      }

      case 'getSupportedVoices':
        return getSupportedVoices();
    }
  },
});
