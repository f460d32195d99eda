export type * from './types.js';
export { CONTEXT_LEVELS, CONTEXT_STATUSES, contextRecordSchema, storeContextSchema } from './schema.js';
export { parseContextFilters, buildContextPredicate, searchContexts, collectResults, compareByRecency, DEFAULT_SEARCH_LIMIT } from './search.js';
export type { ContextPredicate, ParsedSearch } from './search.js';
