import type { EmbeddingOutcome, EmbeddingProvider } from '../providers/embedding.js';
import type { Skill } from '../skills/types.js';
import type { ContextRecord } from '../contexts/types.js';

export function makeSkill(overrides: Partial<Skill> & Pick<Skill, 'skillId'>): Skill {
  return {
    title: overrides.skillId,
    description: '',
    category: 'general',
    tags: [],
    version: '1.0.0',
    embedding: null,
    visibilityScope: 'organization',
    usageCount: 0,
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeContext(overrides: Partial<ContextRecord> & Pick<ContextRecord, 'contextId'>): ContextRecord {
  return {
    userId: 'user-1',
    timestamp: new Date('2025-01-01T00:00:00.000Z'),
    data: {},
    ...overrides,
  };
}

/** Returns a fixed vector for every text and counts calls */
export class StubEmbeddingProvider implements EmbeddingProvider {
  calls: string[] = [];

  constructor(private readonly vector: number[]) {}

  async embed(text: string): Promise<EmbeddingOutcome> {
    this.calls.push(text);
    return { ok: true, vector: this.vector };
  }
}

/** Never answers, so only a deadline can end the call */
export class HangingEmbeddingProvider implements EmbeddingProvider {
  embed(): Promise<EmbeddingOutcome> {
    return new Promise<EmbeddingOutcome>(() => undefined);
  }
}

export class ThrowingEmbeddingProvider implements EmbeddingProvider {
  async embed(): Promise<EmbeddingOutcome> {
    throw new Error('connection refused');
  }
}
