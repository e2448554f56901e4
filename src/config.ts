import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://webservices.volcano.si.edu/geoserver/GVP-VOTW/ows';
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_CACHE_DIRNAME = '.volcanoes_cache';

const envSchema = z.object({
  VOLCANOES_CACHE_DIR: z.string().trim().min(1).optional(),
  GVP_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  GVP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export interface CatalogConfig {
  cacheDir: string;
  baseUrl: string;
  timeout: number; // milliseconds
}

/**
 * Resolve configuration from the environment.
 *
 * Without an explicit env map, `.env` is loaded into `process.env` first.
 * The cache directory defaults to `.volcanoes_cache` under the working directory.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): CatalogConfig {
  if (!env) {
    dotenv.config();
  }
  const parsed = envSchema.parse(env ?? process.env);

  return {
    cacheDir: path.resolve(parsed.VOLCANOES_CACHE_DIR ?? path.join(process.cwd(), DEFAULT_CACHE_DIRNAME)),
    baseUrl: parsed.GVP_BASE_URL,
    timeout: parsed.GVP_TIMEOUT_MS,
  };
}
