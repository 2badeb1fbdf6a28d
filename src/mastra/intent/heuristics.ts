import logger from '../../utils/logger';
import type { FilterCondition, IntentCandidate } from './types';

const CONTENT_KEYWORDS = ['content', 'text', 'document', "what's in", 'what is in'];

const ACTION_KEYWORDS = [
  'display',
  'show',
  'view',
  'summarize',
  'read',
  'get',
  'extract',
  'tell me about',
  'tell about',
];

const FILE_EXTENSIONS = ['.pdf', '.docx', '.txt', '.xlsx'];

const FULL_CONTENT_INDICATORS = [
  'full content',
  'complete text',
  'entire content',
  'full text',
  'verbatim',
];

const TELL_ABOUT_FILE_PATTERN =
  /tell\s+(?:me\s+)?about\s+([\p{L}\p{M}\p{N}_\s\-.,]+\.(?:pdf|docx|txt|xlsx))/iu;

// Tried in order; later patterns are looser fallbacks.
const FILENAME_PATTERNS: RegExp[] = [
  /filename\s+(?:that\s+)?contains\s+([^\s.,]+)/i,
  /filename\s+([^\s.,]+)/i,
  /file\s+named\s+([^\s.,]+)/i,
  /file\s+([^\s.,]+\.(?:pdf|csv|txt|xlsx|docx|html))/i,
];

export function isContentRequest(query: string): boolean {
  const queryLower = query.toLowerCase();

  const hasContentKeyword = CONTENT_KEYWORDS.some((keyword) => queryLower.includes(keyword));
  const hasActionKeyword = ACTION_KEYWORDS.some((keyword) => queryLower.includes(keyword));
  const hasFileMention =
    queryLower.includes('file') || FILE_EXTENSIONS.some((ext) => queryLower.includes(ext));

  return (
    hasContentKeyword ||
    (hasActionKeyword && hasFileMention) ||
    TELL_ABOUT_FILE_PATTERN.test(queryLower)
  );
}

export function wantsFullContent(query: string): boolean {
  const queryLower = query.toLowerCase();
  return FULL_CONTENT_INDICATORS.some((indicator) => queryLower.includes(indicator));
}

/**
 * Pull a filename fragment out of queries like "filename contains Budget"
 * or "file named report". Matching runs on the lower-cased query, so the
 * captured value is lower-cased too.
 */
export function extractFilenameFilter(query: string): FilterCondition | null {
  const queryLower = query.toLowerCase();
  if (!queryLower.includes('filename')) return null;

  for (const pattern of FILENAME_PATTERNS) {
    const match = queryLower.match(pattern);
    if (match?.[1]) {
      return {
        field: 'filename',
        kind: 'contains',
        value: match[1],
        combine: 'AND',
        include: true,
      };
    }
  }
  return null;
}

function hasFilters(candidate: IntentCandidate): boolean {
  const { filters } = candidate;
  if (Array.isArray(filters)) return filters.length > 0;
  return Boolean(filters);
}

/**
 * Correct a candidate intent using keyword rules on the raw query.
 * Returns a new record; the input is left untouched.
 */
export function applyContentRequestHeuristics(
  query: string,
  candidate: IntentCandidate
): IntentCandidate {
  const corrected: IntentCandidate = { ...candidate };

  if (isContentRequest(query) && !corrected.file_content) {
    logger.info('Forcing file_content to true based on query keywords', { query });
    corrected.file_content = true;
    corrected.file_metadata = true;

    if (!('summary' in corrected)) {
      corrected.summary = true;
    }
    if (wantsFullContent(query)) {
      corrected.summary = false;
    }
  }

  if (!hasFilters(corrected)) {
    const filter = extractFilenameFilter(query);
    if (filter) {
      logger.info('Fallback filename filter extracted', { value: filter.value });
      corrected.filters = [filter];
    }
  }

  return corrected;
}
