export const INTENT_SYSTEM_PROMPT = `You are a helpful AI assistant that extracts structured information from user queries about datasets.
You should respond with valid JSON that matches the structure defined in the prompt.
Extract the most accurate intent possible from the query.`;

export function buildIntentPrompt(query: string, knownFields: readonly string[]): string {
  const fieldList = knownFields.length > 0 ? knownFields.join(', ') : 'filename, filepath';

  return `
Analyze the following user query about a dataset and determine the search intent.
Query: "${query}"

First, determine if the query is related to dataset search or if it's a general question unrelated to datasets.
Set "is_dataset_related" to false for unrelated questions.

If the query is related to dataset search, determine which of these data sources should be searched:
1. "dataset_info" - Dataset metadata (name, status, total_size, total_files, etc.)
2. "file_metadata" - File metadata (filename, filepath, access information)
3. "file_content" - The actual content of files in the dataset

Set file_content to true if the user:
- Asks to "provide", "display", "show", "view", "summarize", "read", or otherwise access the CONTENT of a file
- Asks for "content of", "text of" or "what's in" a file
- Mentions a specific filename

Content and summary handling:
- When file_content is true, also set file_metadata to true
- By default, when file_content is true, also set summary to true
- ONLY set summary to false if the user explicitly asks for "full content", "complete text" or "entire content"

Decide how many files are needed to answer the query ("max_files"):
- General questions about the dataset: 5-10 files
- Broad questions needing representative content: up to 25 files
- The minimum is 5 and the maximum is 25

General file listing requests ("list files", "show me some files") get NO filename filters.

Extract any filters mentioned in the query. For each filter, determine:
- field: the field to filter on (one of: ${fieldList})
- kind: how to filter ("equals", "contains", "exists")
- value: the value to filter by; null for "exists"
- combine: how this filter combines with the previous ones ("AND" or "OR")
- include: true to keep matching files, false to exclude them

Examples of filters:
1. "Show me files with Risk in the filename" -> {"field": "filename", "kind": "contains", "value": "Risk", "combine": "AND", "include": true}
2. "Summarize the content of the file Risk20140318.pdf" -> {"field": "filename", "kind": "contains", "value": "Risk20140318.pdf", "combine": "AND", "include": true}

Respond with a JSON object in the following format:
{
  "dataset_info": boolean,
  "file_metadata": boolean,
  "file_content": boolean,
  "summary": boolean,
  "filters": [
    {
      "field": string,
      "kind": "equals" | "contains" | "exists",
      "value": string | null,
      "combine": "AND" | "OR",
      "include": boolean
    }
  ],
  "is_dataset_related": boolean,
  "needs_clarification": boolean,
  "clarification_message": string | null,
  "fields": [string],
  "max_files": number
}

Only include filters and fields that are needed to answer the query.
`;
}
