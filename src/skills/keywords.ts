import type { RankedSkill, Skill } from './types.js';
import { compareRanked } from './ranker.js';

// Filler words in task descriptions ("help me ...", "can you ...")
const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'for', 'from',
  'help', 'how', 'i', 'in', 'is', 'it', 'me', 'my', 'of', 'on', 'or', 'please',
  'some', 'that', 'the', 'this', 'to', 'want', 'we', 'with', 'you', 'your',
]);

/** Reduces -ing, -ed and plural -s so "tests", "tested", "testing" meet "test" */
export function stem(word: string): string {
  if (word.length > 5 && word.endsWith('ing')) return word.slice(0, -3);
  if (word.length > 4 && word.endsWith('ed')) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const word of text.toLowerCase().split(/[^\p{L}\p{N}_]+/u)) {
    if (!word || STOP_WORDS.has(word)) continue;
    tokens.add(stem(word));
  }
  return tokens;
}

export function skillTokens(skill: Pick<Skill, 'title' | 'description' | 'tags'>): Set<string> {
  return tokenize(`${skill.title} ${skill.description} ${skill.tags.join(' ')}`);
}

/**
 * Share of query tokens found in the skill's title, description and tags.
 */
export function scoreKeywordOverlap(queryTokens: Set<string>, skill: Skill): RankedSkill {
  if (queryTokens.size === 0) {
    return { skillId: skill.skillId, score: 0, matchedTerms: [] };
  }

  const tokens = skillTokens(skill);
  const matchedTerms = [...queryTokens].filter(token => tokens.has(token));
  const score = Math.min(1, matchedTerms.length / queryTokens.size);

  return { skillId: skill.skillId, score, matchedTerms };
}

export function matchByKeywords(query: string, skills: readonly Skill[]): RankedSkill[] {
  const queryTokens = tokenize(query);
  return skills.map(skill => scoreKeywordOverlap(queryTokens, skill)).sort(compareRanked);
}
