import { describe, expect, it, vi } from 'vitest';
import type { LanguageModelV1 } from 'ai';
import { MockLanguageModelV1 } from 'ai/test';
import { extractQueryIntent } from './extractor';
import {
  createDefaultIntent,
  createNotDatasetRelatedIntent,
  DEFAULT_CLARIFICATION_MESSAGE,
  NOT_DATASET_RELATED_MESSAGE,
} from './types';

const KNOWN_FIELDS = ['filename', 'department', 'owner'];

type GenerateOptions = Parameters<LanguageModelV1['doGenerate']>[0];

function modelReturning(text: string) {
  return new MockLanguageModelV1({
    doGenerate: async () => ({
      rawCall: { rawPrompt: null, rawSettings: {} },
      finishReason: 'stop',
      usage: { promptTokens: 10, completionTokens: 20 },
      text,
    }),
  });
}

function failingModel(message: string) {
  return new MockLanguageModelV1({
    doGenerate: async () => {
      throw new Error(message);
    },
  });
}

describe('extractQueryIntent', () => {
  it('forces content search for a request to show a file', async () => {
    const intent = await extractQueryIntent('Show me the content of Risk20140318.pdf', {
      knownFields: KNOWN_FIELDS,
      model: modelReturning('{"file_content": false, "is_dataset_related": true}'),
    });

    expect(intent).toEqual({
      dataset_info: false,
      file_metadata: true,
      file_content: true,
      summary: true,
      filters: [],
      fields: [],
      is_dataset_related: true,
      needs_clarification: false,
      clarification_message: null,
      max_files: 10,
    });
  });

  it('adds a filename filter when the model extracted none', async () => {
    const intent = await extractQueryIntent('filename contains Budget', {
      knownFields: KNOWN_FIELDS,
      model: modelReturning('{"filters": []}'),
    });

    expect(intent.filters).toEqual([
      { field: 'filename', kind: 'contains', value: 'budget', combine: 'AND', include: true },
    ]);
    // "file" in "filename" plus "get" in "budget" read as an action on a file
    expect(intent.file_content).toBe(true);
    expect(intent.file_metadata).toBe(true);
    expect(intent.summary).toBe(true);
    expect(intent.max_files).toBe(10);
  });

  it('returns the fixed record for questions unrelated to the dataset', async () => {
    const intent = await extractQueryIntent('What time is it?', {
      knownFields: KNOWN_FIELDS,
      model: modelReturning('{"is_dataset_related": false}'),
    });

    expect(intent).toEqual(createNotDatasetRelatedIntent());
    expect(intent.clarification_message).toBe(NOT_DATASET_RELATED_MESSAGE);
    expect(intent.max_files).toBe(5);
  });

  it('ignores other fields once the query is unrelated', async () => {
    const intent = await extractQueryIntent('Tell me a joke about content', {
      knownFields: KNOWN_FIELDS,
      model: modelReturning(
        '{"is_dataset_related": false, "dataset_info": true, "max_files": 20, "fields": ["owner"]}'
      ),
    });

    expect(intent).toEqual(createNotDatasetRelatedIntent());
  });

  it('falls back to the default intent when the model call fails', async () => {
    const intent = await extractQueryIntent('Show me the content of Risk20140318.pdf', {
      model: failingModel('rate limited'),
    });

    expect(intent).toEqual(createDefaultIntent());
  });

  it('falls back to the default intent when the reply has no JSON', async () => {
    const intent = await extractQueryIntent('List all files in the dataset', {
      model: modelReturning('Sorry, I am not sure what you mean.'),
    });

    expect(intent).toEqual({
      dataset_info: false,
      file_metadata: false,
      file_content: false,
      summary: false,
      filters: [],
      fields: [],
      is_dataset_related: true,
      needs_clarification: false,
      clarification_message: null,
      max_files: 10,
    });
  });

  it('falls back to the default intent when validation fails', async () => {
    const intent = await extractQueryIntent('List files owned by finance', {
      model: modelReturning('{"filters": [{"field": "owner", "kind": "contains"}]}'),
    });

    expect(intent).toEqual(createDefaultIntent());
  });

  it('rejects a value on an exists filter', async () => {
    const intent = await extractQueryIntent('List files that have an owner', {
      model: modelReturning(
        '{"filters": [{"field": "owner", "kind": "exists", "value": "finance"}]}'
      ),
    });

    expect(intent).toEqual(createDefaultIntent());
  });

  it('clamps max_files into range', async () => {
    const high = await extractQueryIntent('List all files in the dataset', {
      model: modelReturning('```json\n{"file_metadata": true, "max_files": 40}\n```'),
    });
    const low = await extractQueryIntent('List all files in the dataset', {
      model: modelReturning('{"file_metadata": true, "max_files": 2}'),
    });

    expect(high.max_files).toBe(25);
    expect(low.max_files).toBe(5);
  });

  it('fills in filter defaults and de-duplicates requested fields', async () => {
    const intent = await extractQueryIntent('List files from finance', {
      model: modelReturning(
        '{"file_metadata": true, "filters": [{"field": "department", "kind": "equals", "value": "finance"}], "fields": ["filename", "owner", "filename"]}'
      ),
    });

    expect(intent.filters).toEqual([
      { field: 'department', kind: 'equals', value: 'finance', combine: 'AND', include: true },
    ]);
    expect(intent.fields).toEqual(['filename', 'owner']);
  });

  it('switches summary off when the full text is requested', async () => {
    const intent = await extractQueryIntent('Show me the full text of the file Risk20140318.pdf', {
      model: modelReturning(
        '{"file_content": false, "summary": true, "filters": [{"field": "filename", "kind": "contains", "value": "Risk20140318.pdf"}]}'
      ),
    });

    expect(intent.file_content).toBe(true);
    expect(intent.file_metadata).toBe(true);
    expect(intent.summary).toBe(false);
    expect(intent.filters).toHaveLength(1);
  });

  it('turns on file metadata whenever file content is searched', async () => {
    const intent = await extractQueryIntent('Risk report overview', {
      model: modelReturning('{"file_content": true, "file_metadata": false}'),
    });

    expect(intent.file_content).toBe(true);
    expect(intent.file_metadata).toBe(true);
    expect(intent.summary).toBe(false);
  });

  it('supplies a clarification message when the model left it out', async () => {
    const intent = await extractQueryIntent('Find the thing', {
      model: modelReturning('{"needs_clarification": true}'),
    });

    expect(intent.needs_clarification).toBe(true);
    expect(intent.clarification_message).toBe(DEFAULT_CLARIFICATION_MESSAGE);
  });

  it('calls the model deterministically with the known fields in the prompt', async () => {
    const doGenerate = vi.fn(async (_options: GenerateOptions) => ({
      rawCall: { rawPrompt: null, rawSettings: {} },
      finishReason: 'stop' as const,
      usage: { promptTokens: 10, completionTokens: 20 },
      text: '{"dataset_info": true}',
    }));

    const intent = await extractQueryIntent('How big is the dataset?', {
      knownFields: new Set(KNOWN_FIELDS),
      model: new MockLanguageModelV1({ doGenerate }),
      maxOutputTokens: 1000,
    });

    expect(intent.dataset_info).toBe(true);
    expect(doGenerate).toHaveBeenCalledTimes(1);
    const [options] = doGenerate.mock.calls[0];
    expect(options.temperature).toBe(0);
    expect(options.maxTokens).toBe(1000);
    expect(JSON.stringify(options.prompt)).toContain('filename, department, owner');
  });

  it('accepts a filter on an empty field name', async () => {
    const intent = await extractQueryIntent('List files tagged finance', {
      model: modelReturning(
        '{"filters": [{"field": "", "kind": "contains", "value": "finance"}]}'
      ),
    });

    expect(intent.filters).toEqual([
      { field: '', kind: 'contains', value: 'finance', combine: 'AND', include: true },
    ]);
  });
});
