import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_METADATA_FIELDS = [
  'filename',
  'filepath',
  'file_size',
  'last_modified',
  'department',
  'document_type',
  'status',
  'owner',
  'access_level',
  'created_date',
];

const csv = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter(Boolean));

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).catch('development'),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional().catch(undefined),

  models: z.object({
    intent: z.string().default('gpt-4o'),
    agent: z.string().default('gpt-4o'),
    tts: z.string().default('tts-1'),
  }),

  openai: z.object({
    apiKey: z.string().optional(),
  }),

  intent: z.object({
    metadataFields: csv
      .optional()
      .transform((fields) => (fields && fields.length > 0 ? fields : DEFAULT_METADATA_FIELDS)),
    maxOutputTokens: z.coerce.number().int().positive().catch(1000),
  }),

  gmail: z.object({
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    redirectUri: z.string().optional(),
    refreshToken: z.string().optional(),
    maxResults: z.coerce.number().int().min(1).max(50).catch(10),
  }),

  telegram: z.object({
    botToken: z.string().optional(),
    chatId: z.string().optional(),
  }),

  youtube: z.object({
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    refreshToken: z.string().optional(),
  }),

  video: z.object({
    ffmpegPath: z.string().min(1).catch('ffmpeg'),
    outputDir: z.string().min(1).catch('.'),
  }),
});

export type Config = z.infer<typeof configSchema>;

export const config: Config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  models: {
    intent: process.env.INTENT_MODEL,
    agent: process.env.AGENT_MODEL,
    tts: process.env.TTS_MODEL,
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY,
  },
  intent: {
    metadataFields: process.env.METADATA_FIELDS,
    maxOutputTokens: process.env.INTENT_MAX_OUTPUT_TOKENS,
  },
  gmail: {
    clientId: process.env.GMAIL_CLIENT_ID,
    clientSecret: process.env.GMAIL_CLIENT_SECRET,
    redirectUri: process.env.GMAIL_REDIRECT_URI,
    refreshToken: process.env.GMAIL_REFRESH_TOKEN,
    maxResults: process.env.GMAIL_MAX_RESULTS,
  },
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN,
    chatId: process.env.TELEGRAM_CHAT_ID,
  },
  youtube: {
    clientId: process.env.YOUTUBE_CLIENT_ID,
    clientSecret: process.env.YOUTUBE_CLIENT_SECRET,
    refreshToken: process.env.YOUTUBE_REFRESH_TOKEN,
  },
  video: {
    ffmpegPath: process.env.FFMPEG_PATH,
    outputDir: process.env.VIDEO_OUTPUT_DIR,
  },
});

export default config;
