import { describe, expect, it } from 'vitest';
import { findFirstObjectSpan, parseIntentResponse } from './parse';

describe('parseIntentResponse', () => {
  it('parses a reply that is pure JSON', () => {
    expect(parseIntentResponse('{"file_content": true, "max_files": 7}')).toEqual({
      file_content: true,
      max_files: 7,
    });
  });

  it('pulls the object out of surrounding prose and code fences', () => {
    const reply = 'Here is the intent:\n```json\n{"summary": true, "filters": []}\n```\nLet me know!';
    expect(parseIntentResponse(reply)).toEqual({ summary: true, filters: [] });
  });

  it('keeps nested objects and braces inside strings intact', () => {
    const reply =
      'Result: {"filters": [{"field": "filename", "kind": "contains", "value": "a}b{c"}], "fields": []} trailing }';
    expect(parseIntentResponse(reply)).toEqual({
      filters: [{ field: 'filename', kind: 'contains', value: 'a}b{c' }],
      fields: [],
    });
  });

  it('takes only the first of several objects', () => {
    expect(parseIntentResponse('{"dataset_info": true} and {"file_metadata": true}')).toEqual({
      dataset_info: true,
    });
  });

  it('returns an empty record for non-object JSON', () => {
    expect(parseIntentResponse('[1, 2, 3]')).toEqual({});
    expect(parseIntentResponse('"just a string"')).toEqual({});
  });

  it('returns an empty record when no object can be parsed', () => {
    expect(parseIntentResponse('I cannot answer that.')).toEqual({});
    expect(parseIntentResponse('{"summary": true')).toEqual({});
    expect(parseIntentResponse('{summary: yes}')).toEqual({});
  });
});

describe('findFirstObjectSpan', () => {
  it('handles escaped quotes inside strings', () => {
    expect(findFirstObjectSpan('x {"a": "say \\"}\\" now"} y')).toBe('{"a": "say \\"}\\" now"}');
  });

  it('returns null without an opening brace', () => {
    expect(findFirstObjectSpan('no json here')).toBeNull();
  });
});
