import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from the package root if present. dotenv runs quiet so nothing is
 * written to stdout, which carries protocol frames under the stdio transport.
 * An explicit `FATHOM_ENV_FILE` overrides the lookup.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to the package root (default: 1 for src/index.ts)
 * @returns the file that was loaded, or null
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): string | null {
  let envPath = process.env.FATHOM_ENV_FILE;
  if (!envPath) {
    let dir = dirname(fileURLToPath(importMetaUrl));
    for (let i = 0; i < levelsUp; i++) {
      dir = dirname(dir);
    }
    envPath = resolve(dir, '.env');
  }
  if (!existsSync(envPath)) {
    return null;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
