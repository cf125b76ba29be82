// web/src/app/config.ts
import { z } from 'zod';
import { ConfigError } from './errors';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SUPABASE_URL: z.string().url(),
  SUPABASE_KEY: z.string().min(1),
  SESSION_SECRET: z.string().min(8),
  SESSION_TTL_HOURS: z.coerce.number().int().positive().default(24 * 7),
  COOKIE_SECURE: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),
});

export interface AppConfig {
  port: number;
  supabase: { url: string; key: string };
  session: { secret: string; ttlSeconds: number; secureCookie: boolean };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    supabase: { url: e.SUPABASE_URL, key: e.SUPABASE_KEY },
    session: { secret: e.SESSION_SECRET, ttlSeconds: e.SESSION_TTL_HOURS * 3600, secureCookie: e.COOKIE_SECURE },
  };
}
