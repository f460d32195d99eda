import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { join, resolve } from 'path';
import type { Config, ModelConfig } from './types.js';

export const DEFAULT_CONFIG: Config = {
  models: {
    embedding: {
      provider: 'ollama',
      model: 'nomic-embed-text',
    },
    'openai-small': {
      provider: 'openai',
      model: 'text-embedding-3-small',
    },
  },
  keys: {},
  ollama: {
    host: 'http://localhost:11434',
  },
  openai: {
    baseURL: 'https://api.openai.com/v1',
  },
  embedding: {
    model: 'embedding',
    timeoutMs: 3000,
    maxRetries: 1,
  },
  suggestions: {
    maxResults: 3,
    threshold: 0.5,
    fallbackThreshold: 0.3,
  },
  search: {
    defaultLimit: 10,
    maxLimit: 100,
  },
  catalog: {
    refreshIntervalMs: 60_000,
  },
  storage: {
    dataDir: 'data',
  },
  logging: {
    level: 'info',
  },
};

let cachedConfig: Config | null = null;

/**
 * Interpolates environment variables in a string
 * Supports ${VAR_NAME} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || '';
  });
}

/**
 * Recursively interpolates environment variables in a parsed YAML value
 */
function interpolateConfig(value: unknown): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(interpolateConfig);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateConfig(entry);
    }
    return result;
  }
  return value;
}

/**
 * Merges a parsed config file over the defaults, section by section
 */
export function mergeConfig(parsed: Partial<Config>): Config {
  return {
    models: { ...DEFAULT_CONFIG.models, ...parsed.models },
    keys: { ...DEFAULT_CONFIG.keys, ...parsed.keys },
    ollama: { ...DEFAULT_CONFIG.ollama, ...parsed.ollama },
    openai: { ...DEFAULT_CONFIG.openai, ...parsed.openai },
    embedding: { ...DEFAULT_CONFIG.embedding, ...parsed.embedding },
    suggestions: { ...DEFAULT_CONFIG.suggestions, ...parsed.suggestions },
    search: { ...DEFAULT_CONFIG.search, ...parsed.search },
    catalog: { ...DEFAULT_CONFIG.catalog, ...parsed.catalog },
    storage: { ...DEFAULT_CONFIG.storage, ...parsed.storage },
    logging: { ...DEFAULT_CONFIG.logging, ...parsed.logging },
  };
}

/**
 * Loads configuration from config.yaml
 * Falls back to defaults if file doesn't exist
 */
export function loadConfig(configPath?: string): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const path = configPath || process.env.SKILL_PLANE_CONFIG || join(process.cwd(), 'config.yaml');

  if (!existsSync(path)) {
    cachedConfig = DEFAULT_CONFIG;
    return cachedConfig;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const parsed = interpolateConfig(parse(content) ?? {}) as Partial<Config>;
    cachedConfig = mergeConfig(parsed);
    return cachedConfig;
  } catch (error) {
    console.error('Error loading config:', error);
    cachedConfig = DEFAULT_CONFIG;
    return cachedConfig;
  }
}

/**
 * Resolves a model configuration by name
 */
export function resolveModelConfig(modelRef: string, config: Config): ModelConfig {
  const resolved = config.models[modelRef];

  if (!resolved) {
    console.warn(`Model "${modelRef}" not found, falling back to embedding`);
    return config.models.embedding || DEFAULT_CONFIG.models.embedding;
  }

  return resolved;
}

/**
 * Gets the model config used to embed task descriptions and skills
 */
export function getEmbeddingModelConfig(config?: Config): ModelConfig {
  const cfg = config || loadConfig();
  return resolveModelConfig(cfg.embedding.model, cfg);
}

/**
 * Gets an API key by name
 */
export function getApiKey(keyName: 'openai', config?: Config): string | undefined {
  const cfg = config || loadConfig();
  return cfg.keys[keyName] || undefined;
}

/**
 * Gets the Ollama host
 */
export function getOllamaHost(config?: Config): string {
  const cfg = config || loadConfig();
  return cfg.ollama.host;
}

/**
 * Absolute path of the directory holding the JSON stores
 */
export function getDataDir(config?: Config): string {
  const cfg = config || loadConfig();
  return resolve(process.cwd(), cfg.storage.dataDir);
}

/**
 * Clears the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
