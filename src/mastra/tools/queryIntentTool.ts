import { createTool } from '@mastra/core/tools';
import { z } from 'zod';
import { extractQueryIntent, queryIntentSchema } from '../intent';

export const queryIntentTool = createTool({
  id: 'query-intent-tool',
  description:
    'Interpret a dataset question: which sources to search (dataset metadata, file metadata, file content), which filters to apply and how many files to return',
  inputSchema: z.object({
    query: z.string().min(1).describe('The user question about the dataset'),
    knownFields: z
      .array(z.string())
      .optional()
      .describe('Metadata field names available for filtering'),
  }),
  outputSchema: queryIntentSchema,
  execute: async ({ context }) => {
    return extractQueryIntent(context.query, { knownFields: context.knownFields });
  },
});
