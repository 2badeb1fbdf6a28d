import { writeFile } from 'node:fs/promises';
import OpenAI from 'openai';
import { config } from '../../config';
import logger from '../../utils/logger';
import { outputPath, type MediaOptions } from './ffmpeg';
import { OPENAI_VOICES, type OpenAIVoice, type TtsResult } from './types';

const VOICE_DESCRIPTIONS: Record<OpenAIVoice, string> = {
  alloy: 'Neutral, balanced voice',
  echo: 'Male voice',
  fable: 'British accent',
  onyx: 'Deep male voice',
  nova: 'Female voice',
  shimmer: 'Soft female voice',
};

/** The slice of the OpenAI speech endpoint this module calls. */
export interface SpeechApi {
  create(params: {
    model: string;
    voice: OpenAIVoice;
    input: string;
  }): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
}

export interface TtsOptions extends MediaOptions {
  speech?: SpeechApi | null;
}

export function createSpeechApi(): SpeechApi | null {
  if (!config.openai.apiKey) return null;
  return new OpenAI({ apiKey: config.openai.apiKey }).audio.speech;
}

export function isOpenAIVoice(value: string): value is OpenAIVoice {
  return OPENAI_VOICES.some((voice) => voice === value);
}

// Render the transcript to an mp3 voiceover
export async function generateTtsAudio(
  transcript: string,
  voice: OpenAIVoice = 'alloy',
  options: TtsOptions = {}
): Promise<TtsResult> {
  const speech = options.speech === undefined ? createSpeechApi() : options.speech;
  if (!speech) {
    return {
      status: 'error',
      errorMessage: 'OpenAI API key not configured. Set OPENAI_API_KEY environment variable.',
    };
  }

  const audioPath = outputPath('voiceover', 'mp3', options);

  try {
    const response = await speech.create({ model: config.models.tts, voice, input: transcript });
    await writeFile(audioPath, Buffer.from(await response.arrayBuffer()));

    return {
      status: 'success',
      message: `TTS audio generated: ${audioPath}`,
      audioPath,
      voice,
      transcriptLength: Array.from(transcript).length,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error('Error generating TTS', { error: reason });
    return { status: 'error', errorMessage: `Error generating TTS: ${reason}` };
  }
}

export function getSupportedVoices() {
  return {
    status: 'success' as const,
    supportedVoices: VOICE_DESCRIPTIONS,
    default: 'alloy' as const,
    note: 'These are OpenAI TTS voices. Make sure OPENAI_API_KEY is configured.',
  };
}
