import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load .env from a package root without dotenv writing its banner to stdout.
 * Variables already present in the environment win over the file.
 *
 * @param importMetaUrl - pass `import.meta.url` from the calling module
 * @param levelsUp - directories up from the calling file to the package root
 * @returns the path that was loaded, or undefined when no .env exists
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | undefined {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) return undefined;
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
