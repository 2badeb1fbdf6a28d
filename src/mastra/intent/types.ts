import { z } from 'zod';

export const MIN_FILES = 5;
export const MAX_FILES = 25;
export const DEFAULT_MAX_FILES = 10;

export const NOT_DATASET_RELATED_MESSAGE =
  "Your question doesn't appear to be related to searching the dataset. Please try a query about the dataset content or metadata.";

export const DEFAULT_CLARIFICATION_MESSAGE =
  "Could you provide more details about what you're looking for in the dataset?";

export const filterKindSchema = z.enum(['equals', 'contains', 'exists']);
export type FilterKind = z.infer<typeof filterKindSchema>;

export const filterCombineSchema = z.enum(['AND', 'OR']);
export type FilterCombine = z.infer<typeof filterCombineSchema>;

export const filterConditionSchema = z
  .object({
    field: z.string(),
    kind: filterKindSchema,
    value: z.string().nullable().default(null),
    combine: filterCombineSchema.default('AND'),
    include: z.boolean().default(true),
  })
  .superRefine((filter, ctx) => {
    if (filter.kind === 'exists' && filter.value !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'exists filters take no value',
      });
    }
    if (filter.kind !== 'exists' && filter.value === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: `${filter.kind} filters need a value`,
      });
    }
  });

export type FilterCondition = z.infer<typeof filterConditionSchema>;

/**
 * Structured interpretation of a dataset query.
 *
 * Field names match what the model is asked to emit, so a parsed model
 * response can be validated directly.
 */
export const queryIntentSchema = z
  .object({
    dataset_info: z.boolean().default(false),
    file_metadata: z.boolean().default(false),
    file_content: z.boolean().default(false),
    summary: z.boolean().default(false),
    filters: z.array(filterConditionSchema).default([]),
    fields: z
      .array(z.string())
      .default([])
      .transform((fields) => [...new Set(fields)]),
    is_dataset_related: z.boolean().default(true),
    needs_clarification: z.boolean().default(false),
    clarification_message: z.string().nullable().default(null),
    max_files: z.number().int().min(MIN_FILES).max(MAX_FILES).default(DEFAULT_MAX_FILES),
  })
  // content is located through file metadata
  .transform((intent) => (intent.file_content ? { ...intent, file_metadata: true } : intent));

export type QueryIntent = z.infer<typeof queryIntentSchema>;

/** Untrusted record parsed from model output, before validation. */
export type IntentCandidate = Record<string, unknown>;

export function createDefaultIntent(): QueryIntent {
  return {
    dataset_info: false,
    file_metadata: false,
    file_content: false,
    summary: false,
    filters: [],
    fields: [],
    is_dataset_related: true,
    needs_clarification: false,
    clarification_message: null,
    max_files: DEFAULT_MAX_FILES,
  };
}

export function createNotDatasetRelatedIntent(): QueryIntent {
  return {
    dataset_info: false,
    file_metadata: false,
    file_content: false,
    summary: false,
    filters: [],
    fields: [],
    is_dataset_related: false,
    needs_clarification: true,
    clarification_message: NOT_DATASET_RELATED_MESSAGE,
    max_files: MIN_FILES,
  };
}

export function clampMaxFiles(value: number): number {
  return Math.max(MIN_FILES, Math.min(MAX_FILES, value));
}
