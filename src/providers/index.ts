import type { EmbeddingModel } from 'ai';
import type { Config, ModelConfig } from '../types.js';
import { getEmbeddingModelConfig } from '../config.js';
import { AiEmbeddingProvider, UnavailableEmbeddingProvider, type EmbeddingProvider } from './embedding.js';
import { createLogger } from '../utils/logger.js';
import { getOpenAIEmbeddingModel } from './openai.js';
import { getOllamaEmbeddingModel } from './ollama.js';

export { getOpenAIProvider, getOpenAIEmbeddingModel } from './openai.js';
export { getOllamaProvider, getOllamaEmbeddingModel, checkOllamaConnection } from './ollama.js';
export type { EmbeddingProvider, EmbeddingOutcome, EmbeddingFailureReason } from './embedding.js';
export { AiEmbeddingProvider, UnavailableEmbeddingProvider, skillEmbeddingText } from './embedding.js';

const logger = createLogger('providers');

/**
 * Gets an embedding model based on the model configuration
 */
export function getEmbeddingModel(modelConfig: ModelConfig, config?: Config): EmbeddingModel<string> {
  switch (modelConfig.provider) {
    case 'openai':
      return getOpenAIEmbeddingModel(modelConfig.model, config);

    case 'ollama':
      return getOllamaEmbeddingModel(modelConfig.model, config);

    default:
      throw new Error(`Unknown provider in ${JSON.stringify(modelConfig)}`);
  }
}

/**
 * Checks if a model configuration is for a local model
 */
export function isLocalModel(config: ModelConfig): boolean {
  return config.provider === 'ollama';
}

/**
 * Builds the configured embedding provider with its timeout and retry budget
 */
export function createEmbeddingProvider(config: Config): EmbeddingProvider {
  const modelConfig = getEmbeddingModelConfig(config);

  try {
    const model = getEmbeddingModel(modelConfig, config);
    return new AiEmbeddingProvider(model, {
      timeoutMs: config.embedding.timeoutMs,
      maxRetries: config.embedding.maxRetries,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Embedding model ${modelConfig.provider}/${modelConfig.model} unavailable, suggestions will use keyword matching`, {}, message);
    return new UnavailableEmbeddingProvider(message);
  }
}
