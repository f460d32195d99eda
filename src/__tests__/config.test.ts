import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  clearConfigCache,
  getApiKey,
  getEmbeddingModelConfig,
  loadConfig,
  mergeConfig,
  resolveModelConfig,
} from '../config.js';

describe('config', () => {
  const dirs: string[] = [];

  function writeConfig(yaml: string): string {
    const dir = mkdtempSync(join(tmpdir(), 'skill-plane-config-'));
    dirs.push(dir);
    const path = join(dir, 'config.yaml');
    writeFileSync(path, yaml);
    return path;
  }

  afterEach(() => {
    clearConfigCache();
    delete process.env.SKILL_PLANE_TEST_KEY;
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', () => {
    expect(loadConfig(join(tmpdir(), 'no-such-dir', 'config.yaml'))).toEqual(DEFAULT_CONFIG);
  });

  it('merges each section over the defaults', () => {
    const config = loadConfig(writeConfig('suggestions:\n  threshold: 0.6\nsearch:\n  maxLimit: 50\n'));

    expect(config.suggestions).toEqual({ maxResults: 3, threshold: 0.6, fallbackThreshold: 0.3 });
    expect(config.search).toEqual({ defaultLimit: 10, maxLimit: 50 });
    expect(config.embedding).toEqual(DEFAULT_CONFIG.embedding);
  });

  it('interpolates environment variables', () => {
    process.env.SKILL_PLANE_TEST_KEY = 'test-secret';
    const config = loadConfig(writeConfig('keys:\n  openai: ${SKILL_PLANE_TEST_KEY}\n'));

    expect(getApiKey('openai', config)).toBe('test-secret');
  });

  it('reads an unset variable as no key', () => {
    const config = loadConfig(writeConfig('keys:\n  openai: ${SKILL_PLANE_TEST_KEY}\n'));
    expect(getApiKey('openai', config)).toBeUndefined();
  });

  it('caches until cleared', () => {
    const first = loadConfig(writeConfig('logging:\n  level: warn\n'));
    expect(loadConfig(writeConfig('logging:\n  level: debug\n'))).toBe(first);

    clearConfigCache();
    expect(loadConfig(writeConfig('logging:\n  level: debug\n')).logging.level).toBe('debug');
  });

  it('resolves the embedding model by reference', () => {
    const config = mergeConfig({
      embedding: { model: 'openai-small', timeoutMs: 1000, maxRetries: 0 },
    });
    expect(getEmbeddingModelConfig(config)).toEqual({ provider: 'openai', model: 'text-embedding-3-small' });
  });

  it('falls back to the embedding model for an unknown reference', () => {
    const warn = console.warn;
    console.warn = () => undefined;
    try {
      expect(resolveModelConfig('missing', DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG.models.embedding);
    } finally {
      console.warn = warn;
    }
  });
});
