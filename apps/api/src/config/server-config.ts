import { z } from 'zod';

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().optional(),
  RECORD_STORE: z.enum(['postgres', 'memory']).default('postgres'),
  GEOCODER_BASE_URL: z.string().url().optional(),
  NOTIFY_WEBHOOK_URL: z.string().url().optional(),
  RECONCILE_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  CORS_ORIGIN: z.string().default('*'),
});

export type ServerConfig = z.infer<typeof ServerEnvSchema>;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config = ServerEnvSchema.parse(env);
  if (config.RECORD_STORE === 'postgres' && !config.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when RECORD_STORE=postgres');
  }
  return config;
}
