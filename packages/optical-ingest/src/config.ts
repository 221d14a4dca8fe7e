import { z } from 'zod';
import { IngestConfigError } from './errors';

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_FETCH_DELAY_MS = 1_500;
export const DEFAULT_MAX_FILES = 5_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 90_000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.coerce.number().int().positive().max(65_535).default(DEFAULT_SSH_PORT),
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  directory: z.string().min(1, 'directory is required'),
  fetchDelayMs: z.coerce.number().nonnegative().default(DEFAULT_FETCH_DELAY_MS),
  maxFiles: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_FILES),
  connectTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

export type IngestConfig = z.infer<typeof configSchema>;

export type IngestConfigOverrides = {
  [K in keyof IngestConfig]?: IngestConfig[K] | string;
};

type Env = Record<string, string | undefined>;

const readEnv = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const pick = <T>(override: T | undefined, fallback: string | undefined): T | string | undefined => {
  if (typeof override === 'string') {
    const trimmed = override.trim();
    return trimmed ? trimmed : fallback;
  }
  return override ?? fallback;
};

export const loadIngestConfig = (env: Env = process.env, overrides: IngestConfigOverrides = {}): IngestConfig => {
  const candidate = {
    host: pick(overrides.host, readEnv(env, 'OPTICAL_SSH_HOST')),
    port: pick(overrides.port, readEnv(env, 'OPTICAL_SSH_PORT')),
    username: pick(overrides.username, readEnv(env, 'OPTICAL_SSH_USER')),
    // Passwords may legitimately carry surrounding whitespace.
    password: overrides.password ?? env.OPTICAL_SSH_PASSWORD ?? '',
    directory: pick(overrides.directory, readEnv(env, 'OPTICAL_DATA_DIR')),
    fetchDelayMs: pick(overrides.fetchDelayMs, readEnv(env, 'OPTICAL_FETCH_DELAY_MS')),
    maxFiles: pick(overrides.maxFiles, readEnv(env, 'OPTICAL_MAX_FILES')),
    connectTimeoutMs: pick(overrides.connectTimeoutMs, readEnv(env, 'OPTICAL_CONNECT_TIMEOUT_MS')),
    logLevel: pick(overrides.logLevel, readEnv(env, 'OPTICAL_LOG_LEVEL'))
  };

  const parsed = configSchema.safeParse({
    ...candidate,
    host: candidate.host ?? '',
    username: candidate.username ?? '',
    directory: candidate.directory ?? ''
  });
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new IngestConfigError(`Invalid ingestion configuration (${fields.join('; ')})`, parsed.error.issues);
  }
  return parsed.data;
};
