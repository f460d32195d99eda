import type { ContextFilters, ContextRecord, ContextSearchResult } from './types.js';
import { contextFiltersSchema } from './schema.js';
import { InvalidFilterError, describeZodError } from '../errors.js';

export const DEFAULT_SEARCH_LIMIT = 10;

export type ContextPredicate = (record: ContextRecord) => boolean;

export interface ParsedSearch {
  filters: ContextFilters;
  limit: number;
}

/**
 * Validates raw filter input (CLI flags, query strings). Unknown keys,
 * unrecognized contextLevel/status values and out-of-range limits are rejected.
 */
export function parseContextFilters(input: unknown, defaultLimit = DEFAULT_SEARCH_LIMIT): ParsedSearch {
  const parsed = contextFiltersSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidFilterError('Invalid context search filters', describeZodError(parsed.error));
  }

  const { limit, ...filters } = parsed.data;
  return { filters, limit: limit ?? defaultLimit };
}

/**
 * AND of every supplied filter. A record missing the field a filter reads
 * does not match that filter.
 */
export function buildContextPredicate(filters: ContextFilters): ContextPredicate {
  const checks: ContextPredicate[] = [];

  if (filters.repoID !== undefined) {
    const repoID = filters.repoID;
    checks.push(record => record.data.repoID === repoID);
  }

  if (filters.ticketID !== undefined) {
    const ticketID = filters.ticketID;
    checks.push(record => record.data.ticketID === ticketID);
  }

  if (filters.filePath !== undefined) {
    const filePath = filters.filePath;
    checks.push(record => record.data.files?.some(file => file.path.includes(filePath)) ?? false);
  }

  if (filters.contextLevel !== undefined) {
    const level = filters.contextLevel;
    checks.push(record => record.data.contextLevel === level);
  }

  if (filters.aiClient !== undefined) {
    const client = filters.aiClient;
    checks.push(record => record.data.AI_Client_type?.includes(client) ?? false);
  }

  if (filters.status !== undefined) {
    const status = filters.status;
    checks.push(record => record.data.status === status);
  }

  if (filters.query !== undefined) {
    const needle = filters.query.toLowerCase();
    checks.push(record => record.data.details?.toLowerCase().includes(needle) ?? false);
  }

  return record => checks.every(check => check(record));
}

/** Newest first; contextId breaks timestamp ties */
export function compareByRecency(a: ContextRecord, b: ContextRecord): number {
  const diff = b.timestamp.getTime() - a.timestamp.getTime();
  if (diff !== 0) return diff;
  return a.contextId < b.contextId ? -1 : a.contextId > b.contextId ? 1 : 0;
}

/**
 * Orders matching records newest first and cuts them to `limit`.
 */
export function collectResults(matching: ContextRecord[], filters: ContextFilters, limit: number): ContextSearchResult {
  const ordered = [...matching].sort(compareByRecency);
  const data = ordered.slice(0, limit);

  return {
    count: data.length,
    total: ordered.length,
    filters,
    data,
  };
}

/**
 * Filters, orders and truncates an already-loaded record set.
 */
export function searchContexts(records: readonly ContextRecord[], filters: ContextFilters, limit: number): ContextSearchResult {
  return collectResults(records.filter(buildContextPredicate(filters)), filters, limit);
}
