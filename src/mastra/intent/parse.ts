import logger from '../../utils/logger';
import type { IntentCandidate } from './types';

function isRecord(value: unknown): value is IntentCandidate {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): IntentCandidate | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Returns the first balanced top-level `{...}` span in `text`, skipping
 * braces inside JSON string literals, or null if none closes.
 */
export function findFirstObjectSpan(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Parse the model's reply into a candidate intent record. Tries the whole
 * reply first, then the first embedded object. Returns `{}` when neither
 * yields a JSON object.
 */
export function parseIntentResponse(responseText: string): IntentCandidate {
  const direct = tryParseObject(responseText.trim());
  if (direct) return direct;

  const span = findFirstObjectSpan(responseText);
  if (!span) return {};

  const embedded = tryParseObject(span);
  if (!embedded) {
    logger.warn('Failed to parse extracted JSON', { span });
    return {};
  }
  return embedded;
}
