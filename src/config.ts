/**
 * Runtime configuration. Values come from the environment (optionally via
 * a .env file in the working directory) and are validated once at startup.
 * This is the only module that reads process state; everything else gets
 * its settings passed in.
 */

import dotenv from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

export interface AppConfig {
  dataDir: string;
  port: number;
  logTiming: boolean;
  confirmDestructive: boolean;
  cacheSelects: boolean;
}

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(value => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const envSchema = z.object({
  JSONTABLE_DATA_DIR: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  JSONTABLE_LOG_TIMING: flag(false),
  JSONTABLE_CONFIRM: flag(true),
  JSONTABLE_CACHE: flag(true)
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    dataDir: resolve(cwd, values.JSONTABLE_DATA_DIR ?? 'data'),
    port: values.PORT,
    logTiming: values.JSONTABLE_LOG_TIMING,
    confirmDestructive: values.JSONTABLE_CONFIRM,
    cacheSelects: values.JSONTABLE_CACHE
  };
}

let config: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (config) return config;
  dotenv.config();
  config = parseConfig(process.env);
  return config;
}
