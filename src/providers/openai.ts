import { createOpenAI } from '@ai-sdk/openai';
import type { Config } from '../types.js';
import { getApiKey, loadConfig } from '../config.js';

let openAIProvider: { key: string; provider: ReturnType<typeof createOpenAI> } | null = null;

/**
 * Gets or creates the OpenAI-compatible provider instance.
 * `openai.baseURL` may point at any endpoint that speaks the OpenAI embeddings API.
 */
export function getOpenAIProvider(config?: Config): ReturnType<typeof createOpenAI> {
  const cfg = config || loadConfig();
  const apiKey = getApiKey('openai', cfg);

  if (!apiKey) {
    throw new Error(
      'OPENAI_API_KEY not found. Set it in config.yaml or as an environment variable.'
    );
  }

  const key = `${cfg.openai.baseURL}|${apiKey}`;
  if (openAIProvider?.key === key) {
    return openAIProvider.provider;
  }

  const provider = createOpenAI({
    apiKey,
    baseURL: cfg.openai.baseURL,
  });
  openAIProvider = { key, provider };

  return provider;
}

/**
 * Gets an OpenAI embedding model by name (e.g., text-embedding-3-small)
 */
export function getOpenAIEmbeddingModel(modelName: string, config?: Config) {
  const provider = getOpenAIProvider(config);
  return provider.embedding(modelName);
}
