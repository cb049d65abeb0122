/**
 * Process environment
 *
 * Read once at startup (dotenv populates process.env first). Invalid values
 * are a ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from '../common/errors.js';

// Largest delay setTimeout honours; anything above fires after 1ms
const MAX_TIMER_MS = 2_147_483_647;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BRIGHTNESS_CONFIG_PATH: z.string().min(1).default('brightness_config.json'),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(5 * 60 * 1000),
  SOLAR_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(10_000),
  SOLAR_PREFETCH_CRON: z.string().min(1).default('5 0 * * *'),
  BRIGHTNESS_DRIVER: z.enum(['sysfs', 'dry-run']).default('sysfs'),
  BACKLIGHT_ROOT: z.string().min(1).default('/sys/class/backlight'),
  BACKLIGHT_DEVICE: z.string().min(1).optional(),
  TRANSITION_DURATION_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(3_000),
  TRANSITION_STEPS: z.coerce.number().int().positive().default(10),
  ADJUST_THRESHOLD: z.coerce.number().nonnegative().default(5),
});

export type Env = z.infer<typeof envSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
