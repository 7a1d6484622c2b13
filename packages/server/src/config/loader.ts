import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema } from './schema';
import type { ValidatedConfig } from './schema';

const ENV_PREFIX = 'HUBRELAY_';
const DEFAULT_CONFIG_PATH = '/etc/hubrelay/config.yaml';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The named sub-object of `config`, created when absent. */
function section(config: RawConfig, name: string): RawConfig {
  const existing = config[name];
  if (isRecord(existing)) return existing;
  const created: RawConfig = {};
  config[name] = created;
  return created;
}

function set(path: string, parse: (value: string) => unknown = (value) => value) {
  const [name, key] = path.split('.');
  return (config: RawConfig, value: string): void => {
    section(config, name)[key] = parse(value);
  };
}

const int = (value: string): number => parseInt(value, 10);
const bool = (value: string): boolean => value === 'true';

const ENV_MAP: Record<string, (config: RawConfig, value: string) => void> = {
  [`${ENV_PREFIX}SERVER_HOST`]: set('server.host'),
  [`${ENV_PREFIX}SERVER_PORT`]: set('server.port', int),
  [`${ENV_PREFIX}SERVER_MAX_BODY_BYTES`]: set('server.maxBodyBytes', int),
  [`${ENV_PREFIX}MONGODB_URI`]: set('mongodb.uri'),
  [`${ENV_PREFIX}MONGODB_COLLECTION`]: set('mongodb.collectionName'),
  [`${ENV_PREFIX}REDIS_URL`]: set('redis.url'),
  [`${ENV_PREFIX}OUTBOX_STREAM_KEY`]: set('outbox.streamKey'),
  [`${ENV_PREFIX}OUTBOX_MAX_STREAM_LENGTH`]: set('outbox.maxStreamLength', int),
  [`${ENV_PREFIX}OUTBOX_DEDUPE_TTL_SECONDS`]: set('outbox.dedupeTtlSeconds', int),
  [`${ENV_PREFIX}WEBHOOK_KEY`]: set('secrets.webhookKey'),
  [`${ENV_PREFIX}AGGREGATION_TIMEOUT_MS`]: set('aggregation.timeoutMs', int),
  [`${ENV_PREFIX}LOG_LEVEL`]: set('logging.level'),
  [`${ENV_PREFIX}HEALTH_ENABLED`]: set('health.enabled', bool),
  [`${ENV_PREFIX}HEALTH_PORT`]: set('health.port', int),
};

/**
 * Read the YAML config file (if it exists), apply `HUBRELAY_*` environment
 * overrides and validate the result.
 *
 * @throws {z.ZodError} When a required key is missing or a value is invalid
 */
export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  let raw: RawConfig = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    if (isRecord(parsed)) raw = parsed;
  }

  // Apply environment variable overrides
  for (const [envKey, setter] of Object.entries(ENV_MAP)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      setter(raw, value);
    }
  }

  return configSchema.parse(raw);
}
