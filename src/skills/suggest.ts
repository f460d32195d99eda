import type { EmbeddingOutcome, EmbeddingProvider } from '../providers/embedding.js';
import type { CatalogSnapshot } from './catalog.js';
import type {
  DegradedReason,
  MatchMethod,
  RankedSkill,
  Skill,
  SuggestResponse,
  SuggestionResult,
} from './types.js';
import { rankBySimilarity } from './ranker.js';
import { matchByKeywords } from './keywords.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('suggest');

export interface SuggestionOptions {
  maxResults: number;
  threshold: number;          // embedding path
  fallbackThreshold: number;  // keyword path
  providerTimeoutMs: number;  // hard ceiling on the provider call
}

export const DEFAULT_SUGGESTION_OPTIONS: SuggestionOptions = {
  maxResults: 3,
  threshold: 0.5,
  fallbackThreshold: 0.3,
  providerTimeoutMs: 3000,
};

function roundConfidence(score: number): number {
  return Math.round(score * 100) / 100;
}

/**
 * Resolves to a timeout outcome if the provider has not answered in time,
 * whether or not it honours its own abort signal.
 */
async function embedWithDeadline(provider: EmbeddingProvider, text: string, timeoutMs: number): Promise<EmbeddingOutcome> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<EmbeddingOutcome>(resolve => {
    timer = setTimeout(
      () => resolve({ ok: false, reason: 'timeout', error: `No embedding within ${timeoutMs}ms` }),
      timeoutMs,
    );
  });

  const attempt = provider.embed(text).catch((err: unknown): EmbeddingOutcome => ({
    ok: false,
    reason: 'unavailable',
    error: err instanceof Error ? err.message : String(err),
  }));

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

interface RankedPath {
  method: MatchMethod;
  ranked: RankedSkill[];
  threshold: number;
  degradedReason?: DegradedReason;
}

/**
 * Ranks catalog skills against a task description: embeddings when the
 * provider answers, keyword overlap over the whole catalog when it does not.
 * A response never mixes the two.
 */
export class SkillSuggestionEngine {
  private readonly options: SuggestionOptions;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: Partial<SuggestionOptions> = {},
  ) {
    this.options = { ...DEFAULT_SUGGESTION_OPTIONS, ...options };
  }

  private fallback(taskDescription: string, snapshot: CatalogSnapshot, reason: DegradedReason): RankedPath {
    return {
      method: 'keyword fallback',
      ranked: matchByKeywords(taskDescription, snapshot.skills),
      threshold: this.options.fallbackThreshold,
      degradedReason: reason,
    };
  }

  private async rank(taskDescription: string, snapshot: CatalogSnapshot): Promise<RankedPath> {
    const embedded = snapshot.withEmbeddings();
    if (embedded.length === 0) {
      logger.info('No skill embeddings in catalog, using keyword fallback');
      return this.fallback(taskDescription, snapshot, 'no-embeddings');
    }

    const outcome = await embedWithDeadline(this.provider, taskDescription, this.options.providerTimeoutMs);
    if (!outcome.ok) {
      logger.warn('Embedding provider failed, using keyword fallback', { reason: outcome.reason }, outcome.error);
      return this.fallback(taskDescription, snapshot, outcome.reason);
    }

    const candidates = embedded.map(skill => ({ skillId: skill.skillId, vector: skill.embedding ?? [] }));
    return {
      method: 'embedding',
      ranked: rankBySimilarity(outcome.vector, candidates),
      threshold: this.options.threshold,
    };
  }

  async suggest(taskDescription: string, snapshot: CatalogSnapshot, installed: ReadonlySet<string>): Promise<SuggestResponse> {
    const path = await this.rank(taskDescription, snapshot);

    const suggestions: SuggestionResult[] = [];
    for (const entry of path.ranked) {
      if (suggestions.length >= this.options.maxResults) break;
      if (entry.score < path.threshold) break;

      const skill = snapshot.get(entry.skillId);
      if (!skill) continue;
      suggestions.push(this.toResult(skill, entry, path.method, installed));
    }

    return {
      suggestions,
      method: path.method,
      ...(path.degradedReason ? { degradedReason: path.degradedReason } : {}),
    };
  }

  private toResult(skill: Skill, entry: RankedSkill, method: MatchMethod, installed: ReadonlySet<string>): SuggestionResult {
    const score = entry.score.toFixed(2);
    const reasoning = method === 'embedding'
      ? `embedding similarity ${score}`
      : `keyword fallback overlap ${score}${entry.matchedTerms?.length ? ` (matched: ${entry.matchedTerms.join(', ')})` : ''}`;

    return {
      skillId: skill.skillId,
      confidence: roundConfidence(entry.score),
      score: entry.score,
      method,
      reasoning,
      skillMetadata: {
        name: skill.title,
        description: skill.description,
        category: skill.category,
        capabilities: [...skill.tags],
      },
      installed: installed.has(skill.skillId),
    };
  }
}
