import { resolve } from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.enum(['true', 'false']).default('false'),
  TRACKING_LOG_FILE: z.string().default('tracking_logs.jsonl'),
  IMG_READ_LOG_FILE: z.string().default('img_reads.jsonl'),
  UPLOAD_DIR: z.string().default('./uploads'),
  DEDUP_WINDOW_MINUTES: z.coerce.number().min(0).default(10),
  REMOTE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  REMOTE_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  EVENT_STORE: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_STREAM_PREFIX: z.string().default('mailbeacon'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export type StoreConfig =
  | { readonly kind: 'file'; readonly trackingLogFile: string; readonly imgReadLogFile: string }
  | { readonly kind: 'redis'; readonly url: string; readonly trackingStream: string; readonly imgReadStream: string };

/**
 * Resolved runtime configuration.
 *
 * File paths are absolute, resolved against the working directory
 * the process was started in.
 */
export interface TrackerConfig {
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly trustProxy: boolean;
  readonly uploadDir: string;
  readonly dedupWindowMinutes: number;
  readonly remoteFetchTimeoutMs: number;
  readonly remoteMaxBytes: number;
  readonly store: StoreConfig;
}

/**
 * Loads configuration from environment variables.
 *
 * Empty values count as unset and get the default. Invalid values throw,
 * naming every offending variable, so a bad deployment fails at startup.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): TrackerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;

  const store: StoreConfig = e.EVENT_STORE === 'redis'
    ? {
      kind: 'redis',
      url: e.REDIS_URL,
      trackingStream: `${e.REDIS_STREAM_PREFIX}:tracking_logs`,
      imgReadStream: `${e.REDIS_STREAM_PREFIX}:img_reads`,
    }
    : {
      kind: 'file',
      trackingLogFile: resolve(cwd, e.TRACKING_LOG_FILE),
      imgReadLogFile: resolve(cwd, e.IMG_READ_LOG_FILE),
    };

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    trustProxy: e.TRUST_PROXY === 'true',
    uploadDir: resolve(cwd, e.UPLOAD_DIR),
    dedupWindowMinutes: e.DEDUP_WINDOW_MINUTES,
    remoteFetchTimeoutMs: e.REMOTE_FETCH_TIMEOUT_MS,
    remoteMaxBytes: e.REMOTE_MAX_BYTES,
    store,
  };
}
