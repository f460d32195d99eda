import { describe, it, expect, beforeAll } from 'vitest';
import { SkillSuggestionEngine } from '../skills/suggest.js';
import { CatalogSnapshot } from '../skills/catalog.js';
import { UnavailableEmbeddingProvider } from '../providers/embedding.js';
import { setLogLevel } from '../utils/logger.js';
import {
  HangingEmbeddingProvider,
  StubEmbeddingProvider,
  ThrowingEmbeddingProvider,
  makeSkill,
} from './helpers.js';

const QUERY = 'help me test my web application';
const NONE = new Set<string>();

const webTesting = makeSkill({
  skillId: 'webapp-testing',
  title: 'Web Application Testing',
  description: 'Drive a browser against a local web app',
  category: 'testing',
  tags: ['testing', 'playwright'],
  embedding: [0.73, Math.sqrt(1 - 0.73 * 0.73)],
});

const lucky = makeSkill({
  skillId: 'lucky-number',
  title: 'Lucky Number Generator',
  description: 'Generates a lucky number',
  tags: ['testing', 'random', 'demo', 'number', 'lucky'],
  embedding: [0, 1],
});

describe('SkillSuggestionEngine', () => {
  beforeAll(() => {
    setLogLevel('silent');
  });

  describe('embedding path', () => {
    it('returns the single matching skill with its cosine as confidence', async () => {
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]));
      const response = await engine.suggest(QUERY, new CatalogSnapshot([webTesting]), NONE);

      expect(response.method).toBe('embedding');
      expect(response.degradedReason).toBeUndefined();
      expect(response.suggestions).toHaveLength(1);

      const [suggestion] = response.suggestions;
      expect(suggestion.skillId).toBe('webapp-testing');
      expect(suggestion.confidence).toBe(0.73);
      expect(suggestion.score).toBeCloseTo(0.73, 10);
      expect(suggestion.method).toBe('embedding');
      expect(suggestion.reasoning).toBe('embedding similarity 0.73');
      expect(suggestion.skillMetadata).toEqual({
        name: 'Web Application Testing',
        description: 'Drive a browser against a local web app',
        category: 'testing',
        capabilities: ['testing', 'playwright'],
      });
    });

    it('drops skills below the threshold', async () => {
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]));
      const response = await engine.suggest(QUERY, new CatalogSnapshot([webTesting, lucky]), NONE);

      expect(response.suggestions.map(s => s.skillId)).toEqual(['webapp-testing']);
    });

    it('honours a configured threshold', async () => {
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]), { threshold: 0.8 });
      const response = await engine.suggest(QUERY, new CatalogSnapshot([webTesting]), NONE);

      expect(response.method).toBe('embedding');
      expect(response.suggestions).toEqual([]);
    });

    it('caps results at maxResults with non-increasing confidence in [0, 1]', async () => {
      const skills = [0.95, 0.6, 0.9, 0.7, 0.55].map((x, i) =>
        makeSkill({ skillId: `skill-${i}`, embedding: [x, Math.sqrt(1 - x * x)] }),
      );
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]));
      const { suggestions } = await engine.suggest(QUERY, new CatalogSnapshot(skills), NONE);

      expect(suggestions.map(s => s.skillId)).toEqual(['skill-0', 'skill-2', 'skill-3']);
      for (let i = 0; i < suggestions.length; i++) {
        expect(suggestions[i].confidence).toBeGreaterThanOrEqual(0);
        expect(suggestions[i].confidence).toBeLessThanOrEqual(1);
        if (i > 0) expect(suggestions[i].confidence).toBeLessThanOrEqual(suggestions[i - 1].confidence);
      }
    });

    it('flags installed skills', async () => {
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]));
      const { suggestions } = await engine.suggest(QUERY, new CatalogSnapshot([webTesting]), new Set(['webapp-testing']));

      expect(suggestions[0].installed).toBe(true);
    });

    it('returns an identical list for identical requests', async () => {
      const snapshot = new CatalogSnapshot([webTesting, lucky]);
      const engine = new SkillSuggestionEngine(new StubEmbeddingProvider([1, 0]));

      const first = await engine.suggest(QUERY, snapshot, NONE);
      const second = await engine.suggest(QUERY, snapshot, NONE);
      expect(second).toEqual(first);
    });
  });

  describe('keyword fallback', () => {
    it('answers with keyword overlap when the provider is unavailable', async () => {
      const engine = new SkillSuggestionEngine(new UnavailableEmbeddingProvider('no model'));
      const response = await engine.suggest(QUERY, new CatalogSnapshot([lucky]), NONE);

      expect(response.method).toBe('keyword fallback');
      expect(response.degradedReason).toBe('unavailable');
      expect(response.suggestions).toHaveLength(1);

      const [suggestion] = response.suggestions;
      expect(suggestion.skillId).toBe('lucky-number');
      expect(suggestion.method).toBe('keyword fallback');
      expect(suggestion.confidence).toBe(0.33);
      expect(suggestion.reasoning).toBe('keyword fallback overlap 0.33 (matched: test)');
    });

    it('falls back when the provider throws', async () => {
      const engine = new SkillSuggestionEngine(new ThrowingEmbeddingProvider());
      const response = await engine.suggest(QUERY, new CatalogSnapshot([lucky]), NONE);

      expect(response.method).toBe('keyword fallback');
      expect(response.degradedReason).toBe('unavailable');
    });

    it('falls back when the provider misses the deadline', async () => {
      const engine = new SkillSuggestionEngine(new HangingEmbeddingProvider(), { providerTimeoutMs: 20 });
      const response = await engine.suggest(QUERY, new CatalogSnapshot([lucky]), NONE);

      expect(response.method).toBe('keyword fallback');
      expect(response.degradedReason).toBe('timeout');
      expect(response.suggestions.map(s => s.skillId)).toEqual(['lucky-number']);
    });

    it('skips the provider when no skill has an embedding', async () => {
      const provider = new StubEmbeddingProvider([1, 0]);
      const engine = new SkillSuggestionEngine(provider);
      const response = await engine.suggest(QUERY, new CatalogSnapshot([{ ...lucky, embedding: null }]), NONE);

      expect(provider.calls).toEqual([]);
      expect(response.method).toBe('keyword fallback');
      expect(response.degradedReason).toBe('no-embeddings');
    });

    it('scores skills without embeddings too, never mixing methods', async () => {
      const engine = new SkillSuggestionEngine(new UnavailableEmbeddingProvider('no model'));
      const unembedded = makeSkill({ skillId: 'web-e2e', title: 'Web E2E Testing', tags: ['web', 'testing'] });
      const { suggestions } = await engine.suggest(QUERY, new CatalogSnapshot([lucky, unembedded]), NONE);

      expect(suggestions.map(s => s.skillId)).toEqual(['web-e2e', 'lucky-number']);
      expect(new Set(suggestions.map(s => s.method))).toEqual(new Set(['keyword fallback']));
    });

    it('returns an empty list when nothing overlaps', async () => {
      const engine = new SkillSuggestionEngine(new UnavailableEmbeddingProvider('no model'));
      const response = await engine.suggest('translate japanese poetry', new CatalogSnapshot([lucky]), NONE);

      expect(response.method).toBe('keyword fallback');
      expect(response.suggestions).toEqual([]);
    });
  });
});
