import { randomUUID } from 'crypto';
import type { Config } from './types.js';
import type { Stores } from './store/types.js';
import type { EmbeddingProvider } from './providers/embedding.js';
import type {
  Skill,
  SkillSearchFilters,
  SuggestRequest,
  SuggestResponse,
  UpdatesRequest,
  UpdatesResponse,
  UserSkillInstallation,
} from './skills/index.js';
import type { ContextRecord, ContextSearchResult, StoreContextInput, StoredContext } from './contexts/index.js';
import { loadConfig, getDataDir } from './config.js';
import { createJsonStores } from './store/json.js';
import { createEmbeddingProvider, skillEmbeddingText } from './providers/index.js';
import {
  CatalogCache,
  SkillSuggestionEngine,
  diffSkills,
  listSkills,
  parseLastCheck,
  recordCheck,
  searchSkills,
  skillSearchSchema,
  suggestRequestSchema,
  updatesRequestSchema,
} from './skills/index.js';
import {
  buildContextPredicate,
  collectResults,
  compareByRecency,
  parseContextFilters,
  storeContextSchema,
} from './contexts/index.js';
import {
  ContextNotFoundError,
  InvalidFilterError,
  InvalidInputError,
  SkillNotFoundError,
  describeZodError,
} from './errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('plane');

export interface SkillPlaneDeps {
  config: Config;
  stores: Stores;
  provider: EmbeddingProvider;
  now?: () => Date;
}

export interface InstallResult {
  skillId: string;
  version: string;
  installation: UserSkillInstallation;
}

export interface EmbedCatalogResult {
  embedded: string[];
  failed: string[];
  skipped: number;
}

function generateContextId(): string {
  return `ctx_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

function describeCapture(repoID?: string, ticketID?: string): string {
  if (ticketID && repoID) return `Context captured for ticket ${ticketID} in repo ${repoID}`;
  if (ticketID) return `Context captured for ticket ${ticketID}`;
  if (repoID) return `Context captured in repo ${repoID}`;
  return 'Context captured';
}

/**
 * Entry point for every operation: wires config, stores, the catalog cache
 * and the embedding provider. Engines below it hold no state of their own.
 */
export class SkillPlane {
  readonly config: Config;
  private readonly stores: Stores;
  private readonly provider: EmbeddingProvider;
  private readonly catalog: CatalogCache;
  private readonly suggestions: SkillSuggestionEngine;
  private readonly now: () => Date;

  constructor(deps: SkillPlaneDeps) {
    this.config = deps.config;
    this.stores = deps.stores;
    this.provider = deps.provider;
    this.now = deps.now ?? (() => new Date());
    this.catalog = new CatalogCache(deps.stores.catalog, {
      refreshIntervalMs: deps.config.catalog.refreshIntervalMs,
      now: () => this.now().getTime(),
    });
    this.suggestions = new SkillSuggestionEngine(deps.provider, {
      maxResults: deps.config.suggestions.maxResults,
      threshold: deps.config.suggestions.threshold,
      fallbackThreshold: deps.config.suggestions.fallbackThreshold,
      providerTimeoutMs: deps.config.embedding.timeoutMs,
    });
  }

  /** Reloads the catalog snapshot; resolves to the number of skills */
  async refreshCatalog(): Promise<number> {
    return (await this.catalog.refresh()).size;
  }

  // ── Skills ─────────────────────────────────────────────────

  async suggest(request: SuggestRequest): Promise<SuggestResponse> {
    const parsed = suggestRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid suggestion request', describeZodError(parsed.error));
    }

    const { taskDescription, userId } = parsed.data;
    const snapshot = await this.catalog.snapshot();
    const installed = userId
      ? new Set((await this.stores.installations.listForUser(userId)).map(row => row.skillId))
      : new Set<string>();

    const response = await this.suggestions.suggest(taskDescription, snapshot, installed);
    logger.debug('Suggestions computed', { method: response.method, count: response.suggestions.length });
    return response;
  }

  async checkForUpdates(request: UpdatesRequest): Promise<UpdatesResponse> {
    const parsed = updatesRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid updates request', describeZodError(parsed.error));
    }

    const { userId, installedSkills, lastCheck } = parsed.data;
    const snapshot = await this.catalog.snapshot();
    const diff = diffSkills(snapshot, installedSkills, parseLastCheck(lastCheck));

    const checkedAt = this.now();
    await recordCheck(this.stores.installations, userId, installedSkills, checkedAt);

    return { ...diff, checkedAt: checkedAt.toISOString() };
  }

  async getSkill(skillId: string): Promise<Skill> {
    const skill = await this.stores.catalog.getSkill(skillId);
    if (!skill) throw new SkillNotFoundError(skillId);
    return skill;
  }

  async listSkills(limit = 50): Promise<Skill[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
      throw new InvalidFilterError('limit must be an integer between 1 and 100');
    }
    return listSkills(await this.catalog.snapshot(), limit);
  }

  async searchSkills(filters: SkillSearchFilters): Promise<Skill[]> {
    const parsed = skillSearchSchema.safeParse(filters);
    if (!parsed.success) {
      throw new InvalidFilterError('Invalid skill search filters', describeZodError(parsed.error));
    }
    const { limit, ...rest } = parsed.data;
    return searchSkills(await this.catalog.snapshot(), rest, limit);
  }

  async getInstallations(userId: string): Promise<UserSkillInstallation[]> {
    return this.stores.installations.listForUser(userId);
  }

  async installSkill(userId: string, skillId: string): Promise<InstallResult> {
    if (!userId) throw new InvalidInputError('userId is required');

    const skill = await this.getSkill(skillId);
    const now = this.now();

    const installation = await this.stores.installations.upsert({
      userId,
      skillId,
      installedVersion: skill.version,
      lastCheckTimestamp: now,
      createdAt: now,
      updatedAt: now,
    });
    await this.stores.catalog.incrementUsage(skillId, now);
    this.catalog.invalidate();

    logger.info('Skill installed', { userId, skillId, version: skill.version });
    return { skillId, version: skill.version, installation };
  }

  /**
   * Embeds every skill that has no vector yet. A skill the provider cannot
   * embed is reported in `failed` and left for the next run.
   */
  async embedCatalog(): Promise<EmbedCatalogResult> {
    const skills = await this.stores.catalog.listSkills();
    const result: EmbedCatalogResult = { embedded: [], failed: [], skipped: 0 };

    for (const skill of skills) {
      if (skill.embedding && skill.embedding.length > 0) {
        result.skipped++;
        continue;
      }

      const outcome = await this.provider.embed(skillEmbeddingText(skill));
      if (!outcome.ok) {
        logger.warn('Failed to embed skill', { skillId: skill.skillId, reason: outcome.reason }, outcome.error);
        result.failed.push(skill.skillId);
        continue;
      }

      await this.stores.catalog.saveSkill({ ...skill, embedding: outcome.vector, updatedAt: this.now() });
      result.embedded.push(skill.skillId);
    }

    this.catalog.invalidate();
    return result;
  }

  // ── Contexts ───────────────────────────────────────────────

  async searchContexts(input: unknown): Promise<ContextSearchResult> {
    const { filters, limit } = parseContextFilters(input, this.config.search.defaultLimit);
    if (limit > this.config.search.maxLimit) {
      throw new InvalidFilterError(`limit must not exceed ${this.config.search.maxLimit}`);
    }

    const matching = await this.stores.contexts.scan(buildContextPredicate(filters));
    return collectResults(matching, filters, limit);
  }

  /** Accepts a `StoreContextInput` or raw JSON; both are validated */
  async storeContext(input: StoreContextInput | unknown): Promise<StoredContext> {
    const parsed = storeContextSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid context record', describeZodError(parsed.error));
    }

    const { userId, sessionId, timestamp, data } = parsed.data;
    if (data.status === 'blocked' && !data.blockedBy) {
      logger.warn('Blocked context stored without blockedBy', { userId, ticketID: data.ticketID });
    }

    const record: ContextRecord = {
      contextId: generateContextId(),
      userId,
      sessionId,
      timestamp: timestamp ?? this.now(),
      data,
    };
    await this.stores.contexts.insert(record);

    const stored: StoredContext = {
      contextId: record.contextId,
      details: describeCapture(data.repoID, data.ticketID),
    };
    if (data.contextLevel === 'ticket' && data.ticketID) {
      stored.userAlert = `AI agents are now aware of your ${data.ticketID} context`;
    }
    if (data.files && data.files.length > 0) {
      stored.file = { count: data.files.length, files: data.files };
    }
    return stored;
  }

  async getContext(contextId: string): Promise<ContextRecord> {
    const record = await this.stores.contexts.get(contextId);
    if (!record) throw new ContextNotFoundError(contextId);
    return record;
  }

  async getUserContexts(userId: string, limit = this.config.search.defaultLimit): Promise<ContextRecord[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > this.config.search.maxLimit) {
      throw new InvalidFilterError(`limit must be an integer between 1 and ${this.config.search.maxLimit}`);
    }
    const records = await this.stores.contexts.scan(record => record.userId === userId);
    return records.sort(compareByRecency).slice(0, limit);
  }
}

/**
 * Builds a SkillPlane over the JSON stores in `storage.dataDir` and the
 * configured embedding provider
 */
export function createSkillPlane(config: Config = loadConfig()): SkillPlane {
  return new SkillPlane({
    config,
    stores: createJsonStores(getDataDir(config)),
    provider: createEmbeddingProvider(config),
  });
}

let plane: SkillPlane | null = null;

export function getSkillPlane(): SkillPlane {
  if (!plane) {
    plane = createSkillPlane();
  }
  return plane;
}
