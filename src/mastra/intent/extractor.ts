import { openai } from '@ai-sdk/openai';
import { generateText, type LanguageModel } from 'ai';
import { config } from '../../config';
import logger from '../../utils/logger';
import { applyContentRequestHeuristics } from './heuristics';
import { parseIntentResponse } from './parse';
import { buildIntentPrompt, INTENT_SYSTEM_PROMPT } from './prompt';
import {
  clampMaxFiles,
  createDefaultIntent,
  createNotDatasetRelatedIntent,
  DEFAULT_CLARIFICATION_MESSAGE,
  queryIntentSchema,
  type QueryIntent,
} from './types';

export interface ExtractQueryIntentOptions {
  /** Metadata field names the model may filter on. Defaults to the configured list. */
  knownFields?: Iterable<string>;
  model?: LanguageModel;
  maxOutputTokens?: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Interpret a free-text dataset query as a {@link QueryIntent}.
 *
 * Never rejects: a failed model call, unparseable output or a record that
 * fails validation all resolve to the default intent.
 */
export async function extractQueryIntent(
  query: string,
  options: ExtractQueryIntentOptions = {}
): Promise<QueryIntent> {
  const knownFields = Array.from(options.knownFields ?? config.intent.metadataFields);

  let responseText: string;
  try {
    const { text } = await generateText({
      model: options.model ?? openai(config.models.intent),
      system: INTENT_SYSTEM_PROMPT,
      prompt: buildIntentPrompt(query, knownFields),
      temperature: 0,
      maxTokens: options.maxOutputTokens ?? config.intent.maxOutputTokens,
      maxRetries: 0,
    });
    responseText = text;
  } catch (error) {
    logger.error('Error extracting query intent', { error: describeError(error) });
    return createDefaultIntent();
  }

  const candidate = parseIntentResponse(responseText);
  if (Object.keys(candidate).length === 0) {
    logger.warn('Failed to extract JSON from model response');
    return createDefaultIntent();
  }

  if (typeof candidate.max_files === 'number') {
    candidate.max_files = clampMaxFiles(candidate.max_files);
  }

  const corrected = applyContentRequestHeuristics(query, candidate);

  const result = queryIntentSchema.safeParse(corrected);
  if (!result.success) {
    logger.error('Error validating query intent', { issues: result.error.issues });
    return createDefaultIntent();
  }

  const intent = result.data;

  if (!intent.is_dataset_related) {
    logger.info('Query not related to dataset search', { query });
    return createNotDatasetRelatedIntent();
  }

  if (intent.needs_clarification && !intent.clarification_message) {
    return { ...intent, clarification_message: DEFAULT_CLARIFICATION_MESSAGE };
  }

  return intent;
}
