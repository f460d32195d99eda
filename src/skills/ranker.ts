import { cosineSimilarity } from 'ai';
import type { RankedSkill } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ranker');

export interface SkillVector {
  skillId: string;
  vector: number[];
}

function magnitude(vector: number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]. Zero-magnitude vectors and mismatched
 * dimensions score 0.
 */
export function similarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  if (magnitude(a) === 0 || magnitude(b) === 0) return 0;

  const score = cosineSimilarity(a, b);
  return Number.isFinite(score) ? score : 0;
}

/** Negative similarity means "no match"; float drift above 1 is clipped */
export function toConfidence(score: number): number {
  return Math.min(1, Math.max(0, score));
}

/** Score descending, then skillId ascending */
export function compareRanked(a: RankedSkill, b: RankedSkill): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.skillId < b.skillId ? -1 : a.skillId > b.skillId ? 1 : 0;
}

/**
 * Ranks skill vectors against a query vector by cosine similarity.
 */
export function rankBySimilarity(query: number[], candidates: SkillVector[]): RankedSkill[] {
  const ranked: RankedSkill[] = [];

  for (const { skillId, vector } of candidates) {
    if (vector.length !== query.length) {
      logger.warn('Embedding dimension mismatch, scoring 0', {
        skillId,
        expected: query.length,
        actual: vector.length,
      });
    }
    ranked.push({ skillId, score: toConfidence(similarity(query, vector)) });
  }

  return ranked.sort(compareRanked);
}
