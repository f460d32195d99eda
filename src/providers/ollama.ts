import { createOllama } from 'ollama-ai-provider';
import type { Config } from '../types.js';
import { getOllamaHost } from '../config.js';

const ollamaProviders = new Map<string, ReturnType<typeof createOllama>>();

/**
 * Gets or creates the Ollama provider instance for the configured host
 */
export function getOllamaProvider(config?: Config): ReturnType<typeof createOllama> {
  const host = getOllamaHost(config);

  let provider = ollamaProviders.get(host);
  if (!provider) {
    provider = createOllama({
      baseURL: `${host}/api`,
    });
    ollamaProviders.set(host, provider);
  }

  return provider;
}

/**
 * Checks if Ollama is reachable
 */
export async function checkOllamaConnection(config?: Config): Promise<boolean> {
  const host = getOllamaHost(config);

  try {
    const response = await fetch(`${host}/api/tags`, { signal: AbortSignal.timeout(2000) });
    return response.ok;
  } catch {
    return false;
  }
}

/**
 * Gets an Ollama text embedding model by name (e.g., nomic-embed-text)
 */
export function getOllamaEmbeddingModel(modelName: string, config?: Config) {
  const provider = getOllamaProvider(config);
  return provider.textEmbeddingModel(modelName);
}
