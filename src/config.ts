import { z } from 'zod';
import { ConfigError } from './errors.js';

const flag = (fallback: '0' | '1') =>
  z.enum(['0', '1']).default(fallback).transform((value) => value === '1');

const ms = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4500),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  REPO_KIND: z.enum(['memory', 'postgres']).default('memory'),
  DATABASE_URL: z.string().min(1).optional(),
  DB_MIGRATE: flag('1'),

  JOBS_API_KEY: z.string().min(1).optional(),
  RATE_LIMIT_ENABLED: flag('0'),
  ENQUEUE_BURST: z.coerce.number().int().min(1).default(60),
  ENQUEUE_SUSTAINED_PER_MIN: z.coerce.number().int().min(1).default(600),
  CORS_DEV: flag('0'),

  WORKER_EMBEDDED: flag('1'),
  WORKER_POLL_INTERVAL_MS: ms(1500),
  WORKER_STOP_GRACE_MS: ms(5000),

  EXECUTOR_KIND: z.enum(['preview', 'echo']).default('preview'),
  EXECUTOR_TIMEOUT_MS: ms(0),
  PREVIEW_DELAY_MS: ms(1000),
  PREVIEW_MAX_CHARS: z.coerce.number().int().min(1).default(400),

  SKILL_SEED_FILE: z.string().min(1).optional(),
}).superRefine((env, ctx) => {
  if (env.REPO_KIND === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'required when REPO_KIND=postgres',
    });
  }
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  server: { port: number; host: string; logLevel: Env['LOG_LEVEL']; corsDev: boolean };
  repo: { kind: Env['REPO_KIND']; databaseUrl?: string; migrate: boolean };
  auth: { apiKey?: string };
  rateLimit: { enabled: boolean; burst: number; sustainedPerMin: number };
  worker: { embedded: boolean; pollIntervalMs: number; executorTimeoutMs: number; stopGraceMs: number };
  executor: { kind: Env['EXECUTOR_KIND']; previewDelayMs: number; previewMaxChars: number };
  skills: { seedFile?: string };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    server: { port: e.PORT, host: e.HOST, logLevel: e.LOG_LEVEL, corsDev: e.CORS_DEV },
    repo: { kind: e.REPO_KIND, databaseUrl: e.DATABASE_URL, migrate: e.DB_MIGRATE },
    auth: { apiKey: e.JOBS_API_KEY },
    rateLimit: { enabled: e.RATE_LIMIT_ENABLED, burst: e.ENQUEUE_BURST, sustainedPerMin: e.ENQUEUE_SUSTAINED_PER_MIN },
    worker: {
      embedded: e.WORKER_EMBEDDED,
      pollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
      executorTimeoutMs: e.EXECUTOR_TIMEOUT_MS,
      stopGraceMs: e.WORKER_STOP_GRACE_MS,
    },
    executor: { kind: e.EXECUTOR_KIND, previewDelayMs: e.PREVIEW_DELAY_MS, previewMaxChars: e.PREVIEW_MAX_CHARS },
    skills: { seedFile: e.SKILL_SEED_FILE },
  };
}
