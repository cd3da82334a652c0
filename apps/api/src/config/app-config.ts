/**
 * Runtime configuration, read from the environment (`.env` is loaded by
 * dotenv in app.ts).
 *
 * Record store selection: DATABASE_URL wins, then FLEET_SNAPSHOT_PATH (a JSON
 * file of records), otherwise an empty in-memory store.
 */

import { z } from 'zod';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  CORS_ORIGIN: z.string().trim().min(1).default('*'),
  DATABASE_URL: optionalText,
  FLEET_SNAPSHOT_PATH: optionalText,
  /** morgan format name or string; "off" disables access logs */
  LOG_FORMAT: z.string().trim().min(1).default('combined'),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  databaseUrl?: string;
  snapshotPath?: string;
  logFormat: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    ...(parsed.DATABASE_URL ? { databaseUrl: parsed.DATABASE_URL } : {}),
    ...(parsed.FLEET_SNAPSHOT_PATH ? { snapshotPath: parsed.FLEET_SNAPSHOT_PATH } : {}),
    logFormat: parsed.LOG_FORMAT === 'off' ? null : parsed.LOG_FORMAT,
  };
}
