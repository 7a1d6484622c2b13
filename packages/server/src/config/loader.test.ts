import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { loadConfig } from './loader';

vi.mock('fs');

const VALID_YAML = `
redis:
  url: redis://localhost:6379
mongodb:
  uri: mongodb://localhost:27017/test
secrets:
  webhookKey: test-secret-0123456789
`;

beforeEach(() => {
  vi.mocked(fs.existsSync).mockReturnValue(true);
  vi.mocked(fs.readFileSync).mockReturnValue(VALID_YAML);
  // Clear env vars
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('HUBRELAY_')) {
      delete process.env[key];
    }
  }
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('should load and validate a YAML config file', () => {
    const config = loadConfig('/test/config.yaml');
    expect(config.redis.url).toBe('redis://localhost:6379');
    expect(config.mongodb.uri).toBe('mongodb://localhost:27017/test');
    expect(config.secrets.webhookKey).toBe('test-secret-0123456789');
  });

  it('should apply default values', () => {
    const config = loadConfig('/test/config.yaml');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 29316, maxBodyBytes: 5242880 });
    expect(config.outbox).toEqual({
      streamKey: 'hubrelay:notifications',
      maxStreamLength: 100000,
      dedupeTtlSeconds: 86400,
    });
    expect(config.aggregation.timeoutMs).toBe(1000);
    expect(config.logging.level).toBe('info');
    expect(config.health.enabled).toBe(true);
    expect(config.health.port).toBe(9090);
    expect(config.mongodb.collectionName).toBe('subscriptions');
  });

  it('should override values from environment variables', () => {
    process.env.HUBRELAY_REDIS_URL = 'redis://override:6380';
    process.env.HUBRELAY_OUTBOX_STREAM_KEY = 'custom:stream';
    process.env.HUBRELAY_AGGREGATION_TIMEOUT_MS = '-1';
    process.env.HUBRELAY_LOG_LEVEL = 'debug';
    process.env.HUBRELAY_HEALTH_ENABLED = 'false';
    process.env.HUBRELAY_SERVER_PORT = '8080';

    const config = loadConfig('/test/config.yaml');
    expect(config.redis.url).toBe('redis://override:6380');
    expect(config.outbox.streamKey).toBe('custom:stream');
    expect(config.aggregation.timeoutMs).toBe(-1);
    expect(config.logging.level).toBe('debug');
    expect(config.health.enabled).toBe(false);
    expect(config.server.port).toBe(8080);
  });

  it('should throw on invalid config (missing required fields)', () => {
    vi.mocked(fs.readFileSync).mockReturnValue('logging:\n  level: info\n');
    expect(() => loadConfig('/test/config.yaml')).toThrow();
  });

  it('should reject a short webhook key', () => {
    process.env.HUBRELAY_WEBHOOK_KEY = 'short';
    expect(() => loadConfig('/test/config.yaml')).toThrow();
  });

  it('should reject a timeout below -1', () => {
    process.env.HUBRELAY_AGGREGATION_TIMEOUT_MS = '-5';
    expect(() => loadConfig('/test/config.yaml')).toThrow();
  });

  it('should work with env vars only (no config file)', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    process.env.HUBRELAY_REDIS_URL = 'redis://env:6379';
    process.env.HUBRELAY_MONGODB_URI = 'mongodb://env:27017/test';
    process.env.HUBRELAY_WEBHOOK_KEY = 'test-secret-from-env';

    const config = loadConfig('/nonexistent.yaml');
    expect(config.redis.url).toBe('redis://env:6379');
    expect(config.mongodb.uri).toBe('mongodb://env:27017/test');
    expect(config.secrets.webhookKey).toBe('test-secret-from-env');
  });

  it('should replace a non-mapping section when an override targets it', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(`${VALID_YAML}health: yes\n`);
    process.env.HUBRELAY_HEALTH_PORT = '9191';
    expect(loadConfig('/test/config.yaml').health).toEqual({ enabled: true, port: 9191 });
  });
});
