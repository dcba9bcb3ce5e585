import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config';
import { ConfigError } from '../src/types';

const cwd = path.join(path.sep, 'project');

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig({}, {}, cwd)).toEqual({
      enabled: false,
      provider: 'openai',
      apiKey: undefined,
      model: undefined,
      host: undefined,
      cacheFile: path.join(cwd, '.self-heal', 'healing_cache.json'),
      logFile: path.join(cwd, '.self-heal', 'healing_log.json'),
      visionCacheDir: path.join(cwd, '.self-heal', 'vision'),
      maxAiAttempts: 3,
      retryBaseDelayMs: 1000,
      timeout: 5000,
      vision: { enabled: false, baselineScreenshot: undefined, currentScreenshot: undefined, threshold: 0.85 },
    });
  });

  it('reads the environment', () => {
    const config = resolveConfig({}, {
      SELF_HEAL: '1',
      AI_PROVIDER: 'Claude',
      AI_API_KEY: 'test-secret',
      AI_MODEL: 'claude-test',
    }, cwd);
    expect(config).toMatchObject({ enabled: true, provider: 'claude', apiKey: 'test-secret', model: 'claude-test' });
  });

  it('accepts AI_SELF_HEAL=true', () => {
    expect(resolveConfig({}, { AI_SELF_HEAL: 'true', AI_API_KEY: 'test-secret' }, cwd).enabled).toBe(true);
  });

  it('lets explicit options win over the environment', () => {
    const config = resolveConfig(
      { enabled: false, provider: 'gemini', maxAiAttempts: 5 },
      { SELF_HEAL: '1', AI_PROVIDER: 'openai' },
      cwd
    );
    expect(config).toMatchObject({ enabled: false, provider: 'gemini', maxAiAttempts: 5 });
  });

  it('requires an API key for an enabled remote provider', () => {
    expect(() => resolveConfig({ enabled: true }, {}, cwd)).toThrow(ConfigError);
    expect(() => resolveConfig({ enabled: true }, {}, cwd)).toThrow('AI_API_KEY (or the apiKey option) is required for provider "openai"');
  });

  it('runs local models without a key', () => {
    const config = resolveConfig({ enabled: true, provider: 'ollama' }, { OLLAMA_HOST: 'http://gpu-box:11434' }, cwd);
    expect(config).toMatchObject({ provider: 'ollama', host: 'http://gpu-box:11434', apiKey: undefined });
  });

  it('ignores OLLAMA_HOST for remote providers', () => {
    const env = { OLLAMA_HOST: 'http://127.0.0.1:11434' };
    expect(resolveConfig({ enabled: true, provider: 'anthropic', apiKey: 'test-secret' }, env, cwd).host).toBeUndefined();
    expect(resolveConfig({ enabled: true, provider: 'groq', apiKey: 'test-secret' }, env, cwd).host).toBeUndefined();
  });

  it('takes an explicit host for OpenAI-compatible endpoints', () => {
    const config = resolveConfig({ enabled: true, provider: 'openai', apiKey: 'test-secret', host: 'https://llm.internal/v1' }, {}, cwd);
    expect(config.host).toBe('https://llm.internal/v1');
  });

  it('rejects an unknown provider', () => {
    expect(() => resolveConfig({ provider: 'mystery' }, {}, cwd)).toThrow('Unknown AI provider "mystery"');
  });

  it('reads vision settings from the environment', () => {
    const config = resolveConfig({}, {
      SELF_HEAL_VISION: '1',
      SELF_HEAL_BASELINE: 'baseline.png',
      SELF_HEAL_CURRENT: 'current.png',
      SELF_HEAL_VISION_THRESHOLD: '0.9',
    }, cwd);
    expect(config.vision).toEqual({
      enabled: true,
      baselineScreenshot: 'baseline.png',
      currentScreenshot: 'current.png',
      threshold: 0.9,
    });
  });

  it.each([
    [{ vision: { threshold: 1.5 } }, {}],
    [{ maxAiAttempts: 0 }, {}],
    [{ timeout: -1 }, {}],
    [{}, { SELF_HEAL_VISION_THRESHOLD: 'high' }],
    [{}, { AI_PROVIDER: 'ollama', OLLAMA_HOST: 'not a url' }],
  ])('rejects invalid settings %j %j', (options, env) => {
    expect(() => resolveConfig(options, env, cwd)).toThrow(ConfigError);
  });

  it('rejects unknown option keys', () => {
    const options = { enabled: false, cacheFiel: 'typo.json' };
    expect(() => resolveConfig(options, {}, cwd)).toThrow(/Invalid heal options/);
  });
});
