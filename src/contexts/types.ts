import type { z } from 'zod';
import type {
  CONTEXT_LEVELS,
  CONTEXT_STATUSES,
  contextDataSchema,
  contextRecordSchema,
  fileRefSchema,
  storeContextSchema,
} from './schema.js';

export type ContextLevel = (typeof CONTEXT_LEVELS)[number];
export type ContextStatus = (typeof CONTEXT_STATUSES)[number];
export type FileRef = z.infer<typeof fileRefSchema>;
export type ContextData = z.infer<typeof contextDataSchema>;
export type ContextRecord = z.infer<typeof contextRecordSchema>;
export type StoreContextInput = z.input<typeof storeContextSchema>;

export interface ContextFilters {
  repoID?: string;
  ticketID?: string;
  filePath?: string;
  contextLevel?: ContextLevel;
  aiClient?: string;
  status?: ContextStatus;
  query?: string;
}

export interface ContextSearchResult {
  count: number;              // records returned
  total: number;              // records matching before the limit
  filters: ContextFilters;
  data: ContextRecord[];
}

export interface StoredContext {
  contextId: string;
  details: string;
  userAlert?: string;
  file?: {
    count: number;
    files: FileRef[];
  };
}
