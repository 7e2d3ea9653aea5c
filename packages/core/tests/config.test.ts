import { describe, expect, test } from 'vitest';
import { loadConfig } from '../src/config/loader.js';
import { ConfigError } from '../src/errors.js';

const baseEnv = {
  AGENT_BASE_URL: 'https://agents.example.test/v1/',
  RAGWALLA_API_KEY: 'test-api-key',
};

describe('loadConfig', () => {
  test('applies defaults for optional values', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      agentBaseUrl: 'https://agents.example.test/v1',
      apiKey: 'test-api-key',
      host: '0.0.0.0',
      port: 8000,
      databasePath: 'agent_studio_chat.db',
      wsPath: '/ws',
      streamTimeoutMs: 30000,
      historyLimit: 50,
      corsOrigins: ['*'],
      logLevel: 'info',
      nodeEnv: 'development',
    });
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      HOST: '127.0.0.1',
      PORT: '9090',
      DATABASE_PATH: ':memory:',
      WS_PATH: '/chat',
      STREAM_TIMEOUT_MS: '5000',
      HISTORY_LIMIT: '20',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
    });

    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(9090);
    expect(config.databasePath).toBe(':memory:');
    expect(config.wsPath).toBe('/chat');
    expect(config.streamTimeoutMs).toBe(5000);
    expect(config.historyLimit).toBe(20);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.logLevel).toBe('debug');
    expect(config.nodeEnv).toBe('production');
  });

  test('treats empty strings as unset', () => {
    const config = loadConfig({ ...baseEnv, HOST: '', PORT: '  ' });

    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(8000);
  });

  test('throws ConfigError when the API key is missing', () => {
    expect(() => loadConfig({ AGENT_BASE_URL: baseEnv.AGENT_BASE_URL })).toThrow(ConfigError);
    expect(() => loadConfig({ AGENT_BASE_URL: baseEnv.AGENT_BASE_URL })).toThrow('RAGWALLA_API_KEY is required');
  });

  test('reports every invalid variable at once', () => {
    let error: unknown;
    try {
      loadConfig({ AGENT_BASE_URL: 'not a url', PORT: 'eighty' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe('AGENT_BASE_URL: AGENT_BASE_URL must be a URL');
    expect(issues[1]).toBe('RAGWALLA_API_KEY: RAGWALLA_API_KEY is required');
    expect(issues[2]).toMatch(/^PORT: /);
  });

  test('returns a frozen object', () => {
    const config = loadConfig(baseEnv);
    expect(Object.isFrozen(config)).toBe(true);
  });
});
