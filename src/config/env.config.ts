import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toBool = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'boolean') return v;
    const s = String(v).toLowerCase().trim();
    return ['1', 'true', 'yes', 'y', 'on'].includes(s);
  }, z.boolean());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  TIMEZONE: z.string().default('UTC'),
  TEMPLATES_DIR: z.string().min(1).default('templates'),
  MAX_INPUT_LENGTH: toNumber(10_000).pipe(z.number().int().positive()),

  USAGE_STATS_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  USAGE_STATS_TTL: toNumber(30 * 24 * 60 * 60),

  SELECTION_MIN_CONFIDENCE: toNumber(0.5).pipe(z.number().min(0).max(1)),
  VALIDATION_STRICT_MODE: toBool(false),
  VALIDATION_FAIL_ON_WARNINGS: toBool(false),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
