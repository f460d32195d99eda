export type * from './types.js';
export { parseVersion, tryParseVersion, compareVersions, formatVersion, isValidVersion, MalformedVersionError } from './semver.js';
export type { SemanticVersion } from './semver.js';
export { similarity, toConfidence, rankBySimilarity } from './ranker.js';
export type { SkillVector } from './ranker.js';
export { tokenize, stem, scoreKeywordOverlap, matchByKeywords } from './keywords.js';
export { CatalogCache, CatalogSnapshot, listSkills, searchSkills } from './catalog.js';
export { SkillSuggestionEngine, DEFAULT_SUGGESTION_OPTIONS } from './suggest.js';
export type { SuggestionOptions } from './suggest.js';
export { diffSkills, recordCheck, parseLastCheck } from './updates.js';
export { skillSchema, installationSchema, updatesRequestSchema, suggestRequestSchema, skillSearchSchema } from './schema.js';
