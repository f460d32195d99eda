import { embed, type EmbeddingModel } from 'ai';
import type { Skill } from '../skills/types.js';

export type EmbeddingFailureReason = 'timeout' | 'unavailable';

export type EmbeddingOutcome =
  | { ok: true; vector: number[] }
  | { ok: false; reason: EmbeddingFailureReason; error: string };

/**
 * Turns text into a vector. Implementations never throw: failures come back
 * as `{ ok: false }` so callers can pick another path.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingOutcome>;
}

export interface AiEmbeddingOptions {
  timeoutMs: number;
  maxRetries: number;
}

// AbortSignal.timeout() rejects with a DOMException named TimeoutError
function isAbortError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'AbortError' || err.name === 'TimeoutError';
}

/**
 * EmbeddingProvider over the AI SDK's `embed`. The abort signal covers the
 * initial attempt and every retry.
 */
export class AiEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly model: EmbeddingModel<string>,
    private readonly options: AiEmbeddingOptions,
  ) {}

  async embed(text: string): Promise<EmbeddingOutcome> {
    try {
      const { embedding } = await embed({
        model: this.model,
        value: text,
        maxRetries: this.options.maxRetries,
        abortSignal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (embedding.length === 0) {
        return { ok: false, reason: 'unavailable', error: 'Provider returned an empty embedding' };
      }
      return { ok: true, vector: embedding };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, reason: isAbortError(err) ? 'timeout' : 'unavailable', error: message };
    }
  }
}

/**
 * Stands in when no embedding model could be built (missing key, unknown
 * provider). Every call takes the keyword path.
 */
export class UnavailableEmbeddingProvider implements EmbeddingProvider {
  constructor(private readonly reason: string) {}

  async embed(): Promise<EmbeddingOutcome> {
    return { ok: false, reason: 'unavailable', error: this.reason };
  }
}

/** Text a skill is embedded from: title, description, then tags */
export function skillEmbeddingText(skill: Pick<Skill, 'title' | 'description' | 'tags'>): string {
  const parts = [skill.title];
  if (skill.description) parts.push(skill.description);
  if (skill.tags.length > 0) parts.push(skill.tags.join(' '));
  return parts.join(' ');
}
