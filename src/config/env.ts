import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from .env file
 *
 * This function should be called as early as possible in the application lifecycle,
 * before any configuration is read.
 */
export function loadEnv(projectRoot: string): void {
  // Guard: only load once
  if (process.env.__DEDUP_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    // Variables already present in the environment win over the file
    dotenvConfig({ path: envPath });
  }

  process.env.__DEDUP_ENV_LOADED = '1';
}
