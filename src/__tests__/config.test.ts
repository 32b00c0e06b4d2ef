import path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError } from '../common/errors';
import { getConfig, requireApiKey } from '../config';

describe('getConfig', () => {
  it('applies defaults', () => {
    expect(getConfig({})).toEqual({
      apiKey: undefined,
      apiBaseUrl: 'https://openrouter.ai/api/v1',
      model: 'deepseek/deepseek-chat',
      maxAgeHours: 168,
      outputDir: path.resolve(process.cwd(), 'output'),
      sourcesFile: undefined,
      logLevel: 'info',
      allowInsecureTls: false,
      reportOnly: false,
      port: 3000,
    });
  });

  it('reads and normalises overrides', () => {
    const cfg = getConfig({
      OPENROUTER_API_KEY: ' test-secret ',
      OPENROUTER_MODEL: 'test/model',
      MAX_AGE_HOURS: '24',
      OUTPUT_DIR: 'reports',
      SOURCES_FILE: 'feeds.json',
      LOG_LEVEL: 'DEBUG',
      ALLOW_INSECURE_TLS: 'true',
      REPORT_ONLY: 'true',
      PORT: '8080',
    });
    expect(cfg).toMatchObject({
      apiKey: 'test-secret',
      model: 'test/model',
      maxAgeHours: 24,
      outputDir: path.resolve(process.cwd(), 'reports'),
      sourcesFile: 'feeds.json',
      logLevel: 'debug',
      allowInsecureTls: true,
      reportOnly: true,
      port: 8080,
    });
  });

  it('falls back on invalid values', () => {
    const cfg = getConfig({ MAX_AGE_HOURS: '-5', PORT: 'abc', LOG_LEVEL: 'verbose', ALLOW_INSECURE_TLS: 'yes' });
    expect(cfg.maxAgeHours).toBe(168);
    expect(cfg.port).toBe(3000);
    expect(cfg.logLevel).toBe('info');
    expect(cfg.allowInsecureTls).toBe(false);
  });
});

describe('requireApiKey', () => {
  it('returns a configured key', () => {
    expect(requireApiKey(getConfig({ OPENROUTER_API_KEY: 'test-secret' }))).toBe('test-secret');
  });

  it('rejects a missing or placeholder key', () => {
    expect(() => requireApiKey(getConfig({}))).toThrow(ConfigError);
    expect(() => requireApiKey(getConfig({ OPENROUTER_API_KEY: 'your_openrouter_api_key_here' }))).toThrow(
      /OPENROUTER_API_KEY/
    );
  });
});
