import { describe, it, expect, beforeAll } from 'vitest';
import { MockEmbeddingModelV1 } from 'ai/test';
import { AiEmbeddingProvider, UnavailableEmbeddingProvider, skillEmbeddingText } from '../providers/embedding.js';
import { createEmbeddingProvider } from '../providers/index.js';
import { mergeConfig } from '../config.js';
import { setLogLevel } from '../utils/logger.js';

const OPTIONS = { timeoutMs: 50, maxRetries: 0 };

describe('AiEmbeddingProvider', () => {
  it('returns the model vector', async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async () => ({ embeddings: [[0.1, 0.2, 0.3]] }),
    });

    expect(await new AiEmbeddingProvider(model, OPTIONS).embed('test my app')).toEqual({ ok: true, vector: [0.1, 0.2, 0.3] });
  });

  it('reports an empty vector as unavailable', async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async () => ({ embeddings: [[]] }),
    });

    const outcome = await new AiEmbeddingProvider(model, OPTIONS).embed('test my app');
    expect(outcome).toEqual({ ok: false, reason: 'unavailable', error: 'Provider returned an empty embedding' });
  });

  it('reports a model error as unavailable', async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async () => {
        throw new Error('model not found');
      },
    });

    const outcome = await new AiEmbeddingProvider(model, OPTIONS).embed('test my app');
    expect(outcome).toEqual({ ok: false, reason: 'unavailable', error: 'model not found' });
  });

  it('reports an aborted call as a timeout', async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: ({ abortSignal }) =>
        new Promise<never>((_, reject) => {
          abortSignal?.addEventListener('abort', () => reject(abortSignal.reason));
        }),
    });

    const outcome = await new AiEmbeddingProvider(model, OPTIONS).embed('test my app');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.reason).toBe('timeout');
  });
});

describe('UnavailableEmbeddingProvider', () => {
  it('always fails with its reason', async () => {
    expect(await new UnavailableEmbeddingProvider('no key').embed()).toEqual({ ok: false, reason: 'unavailable', error: 'no key' });
  });
});

describe('createEmbeddingProvider', () => {
  beforeAll(() => {
    setLogLevel('silent');
  });

  it('degrades to an unavailable provider when the OpenAI key is missing', async () => {
    const config = mergeConfig({
      embedding: { model: 'openai-small', timeoutMs: 1000, maxRetries: 0 },
    });

    const provider = createEmbeddingProvider(config);
    expect(provider).toBeInstanceOf(UnavailableEmbeddingProvider);
    const outcome = await provider.embed('anything');
    expect(outcome.ok).toBe(false);
  });

  it('builds an AI SDK provider for a local model without contacting it', () => {
    expect(createEmbeddingProvider(mergeConfig({}))).toBeInstanceOf(AiEmbeddingProvider);
  });
});

describe('skillEmbeddingText', () => {
  it('joins title, description and tags', () => {
    expect(skillEmbeddingText({ title: 'PDF Toolkit', description: 'Extract text', tags: ['pdf', 'forms'] })).toBe(
      'PDF Toolkit Extract text pdf forms',
    );
    expect(skillEmbeddingText({ title: 'Bare', description: '', tags: [] })).toBe('Bare');
  });
});
