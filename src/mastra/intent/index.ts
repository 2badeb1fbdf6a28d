export { extractQueryIntent } from './extractor';
export type { ExtractQueryIntentOptions } from './extractor';
export { applyContentRequestHeuristics, extractFilenameFilter, isContentRequest } from './heuristics';
export { parseIntentResponse } from './parse';
export {
  createDefaultIntent,
  createNotDatasetRelatedIntent,
  filterConditionSchema,
  queryIntentSchema,
} from './types';
export type { FilterCondition, FilterCombine, FilterKind, QueryIntent } from './types';
