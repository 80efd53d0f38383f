/**
 * Config File Resolution
 *
 * Resolves the analysis config file in order:
 * 1. INDICATORS_CONFIG environment variable
 * 2. ./indicators.config.json in the working directory (default)
 */

import { resolve } from 'node:path';

export const DEFAULT_CONFIG_FILE = 'indicators.config.json';

/**
 * Resolve the config file path. Does NOT check that the file exists —
 * readAnalysisConfig() treats a missing file as "no config".
 */
export function resolveConfigPath(): string {
  const envPath = process.env['INDICATORS_CONFIG'];
  if (envPath) {
    return resolve(envPath);
  }
  return resolve(process.cwd(), DEFAULT_CONFIG_FILE);
}
