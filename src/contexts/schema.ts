import { z } from 'zod';

export const CONTEXT_LEVELS = ['global', 'project', 'ticket'] as const;
export const CONTEXT_STATUSES = ['not_started', 'in_progress', 'blocked', 'needs_review', 'completed'] as const;

export const contextLevelSchema = z.enum(CONTEXT_LEVELS);
export const contextStatusSchema = z.enum(CONTEXT_STATUSES);

export const fileRefSchema = z.object({
  path: z.string(),
  type: z.string().optional(),
  action: z.string().optional(),
});

export const conversationTurnSchema = z
  .object({
    role: z.string(),
    content: z.string(),
    timestamp: z.string().optional(),
  })
  .passthrough();

/**
 * Recognized attributes of a context record. Anything else is kept as-is
 * but cannot be filtered on.
 */
export const contextDataSchema = z
  .object({
    repoID: z.string().optional(),
    catalogID: z.string().optional(),
    ticketID: z.string().optional(),
    contextLevel: contextLevelSchema.optional(),
    AI_Client_type: z.array(z.string()).optional(),
    status: contextStatusSchema.optional(),
    blockedBy: z.string().optional(),
    files: z.array(fileRefSchema).optional(),
    conversationHistory: z.array(conversationTurnSchema).optional(),
    details: z.string().optional(),
  })
  .passthrough();

export const contextRecordSchema = z.object({
  contextId: z.string().min(1),
  userId: z.string().min(1),
  sessionId: z.string().optional(),
  timestamp: z.coerce.date(),
  data: contextDataSchema,
});

export const storeContextSchema = z.object({
  userId: z.string().min(1),
  sessionId: z.string().optional(),
  timestamp: z.coerce.date().optional(),
  data: contextDataSchema,
});

export const contextFiltersSchema = z
  .object({
    repoID: z.string().min(1).optional(),
    ticketID: z.string().min(1).optional(),
    filePath: z.string().min(1).optional(),
    contextLevel: contextLevelSchema.optional(),
    aiClient: z.string().min(1).optional(),
    status: contextStatusSchema.optional(),
    query: z.string().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional(),
  })
  .strict();
