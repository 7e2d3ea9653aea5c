import { ConfigError } from '../errors.js';
import { EnvSchema, type AppConfig } from './schema.js';

/**
 * Build the process-wide configuration from environment variables.
 *
 * Reads only the given environment record and performs no I/O, so a missing
 * credential is reported before anything touches the network.
 *
 * @throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const parsed = result.data;

  return Object.freeze({
    agentBaseUrl: parsed.AGENT_BASE_URL.replace(/\/+$/, ''),
    apiKey: parsed.RAGWALLA_API_KEY,
    host: parsed.HOST,
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    wsPath: parsed.WS_PATH,
    streamTimeoutMs: parsed.STREAM_TIMEOUT_MS,
    historyLimit: parsed.HISTORY_LIMIT,
    corsOrigins: parsed.CORS_ORIGINS,
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
  });
}
