import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

// ── Environment input ────────────────────────────────────────────────
// Every field arrives as an optional string; empty strings count as unset.

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const positiveInt = (fallback: number) =>
  optionalString.pipe(z.coerce.number().int().positive().optional()).transform((v) => v ?? fallback);

export const EnvSchema = z.object({
  AGENT_BASE_URL: optionalString.pipe(
    z.string({ required_error: 'AGENT_BASE_URL is required' }).url('AGENT_BASE_URL must be a URL'),
  ),
  RAGWALLA_API_KEY: optionalString.pipe(z.string({ required_error: 'RAGWALLA_API_KEY is required' })),
  HOST: optionalString.transform((v) => v ?? '0.0.0.0'),
  PORT: optionalString
    .pipe(z.coerce.number().int().min(0).max(65535).optional())
    .transform((v) => v ?? 8000),
  DATABASE_PATH: optionalString.transform((v) => v ?? 'agent_studio_chat.db'),
  WS_PATH: optionalString.pipe(z.string().startsWith('/').optional()).transform((v) => v ?? '/ws'),
  STREAM_TIMEOUT_MS: positiveInt(30_000),
  HISTORY_LIMIT: positiveInt(50),
  CORS_ORIGINS: optionalString.transform((v) =>
    (v ?? '*').split(',').map((o) => o.trim()).filter((o) => o.length > 0),
  ),
  LOG_LEVEL: optionalString.pipe(LogLevelSchema.optional()).transform((v) => v ?? 'info'),
  NODE_ENV: optionalString
    .pipe(z.enum(['development', 'production', 'test']).optional())
    .transform((v) => v ?? 'development'),
});

// ── Resolved application config ──────────────────────────────────────

export interface AppConfig {
  agentBaseUrl: string;
  apiKey: string;
  host: string;
  port: number;
  databasePath: string;
  wsPath: string;
  streamTimeoutMs: number;
  historyLimit: number;
  corsOrigins: string[];
  logLevel: z.infer<typeof LogLevelSchema>;
  nodeEnv: 'development' | 'production' | 'test';
}
