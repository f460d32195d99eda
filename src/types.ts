// Embedding model configuration
export interface ModelConfig {
  provider: 'openai' | 'ollama';
  model: string;
}

// Named model configurations from config.yaml
export interface ModelsConfig {
  [name: string]: ModelConfig;
}

export interface EmbeddingConfig {
  model: string; // Reference to a named model config
  timeoutMs: number;
  maxRetries: number;
}

export interface SuggestionsConfig {
  maxResults: number;
  threshold: number;
  fallbackThreshold: number;
}

export interface SearchConfig {
  defaultLimit: number;
  maxLimit: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// Full configuration structure
export interface Config {
  models: ModelsConfig;
  keys: {
    openai?: string;
  };
  ollama: {
    host: string;
  };
  openai: {
    baseURL: string;
  };
  embedding: EmbeddingConfig;
  suggestions: SuggestionsConfig;
  search: SearchConfig;
  catalog: {
    refreshIntervalMs: number;
  };
  storage: {
    dataDir: string;
  };
  logging: {
    level: LogLevel;
  };
}
