// src/config/env.ts
import { z } from 'zod';

export const DB_DIALECTS = ['mysql', 'sqlite'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
  DB_DIALECT: z.enum(DB_DIALECTS).default('mysql'),
  DB_SYNC: z.enum(['true', 'false']).default('false').transform((value) => value === 'true')
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  databaseUrl: string;
  dialect: typeof DB_DIALECTS[number];
  syncSchema: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the process environment once. Call after dotenv has loaded `.env`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    nodeEnv: result.data.NODE_ENV,
    port: result.data.PORT,
    databaseUrl: result.data.DATABASE_URL,
    dialect: result.data.DB_DIALECT,
    syncSchema: result.data.DB_SYNC
  };
};
