import * as dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

/**
 * Loads `.env` (and `.env.test` under Vitest) into process.env once.
 *
 * Import this module before anything that reads configuration. Values already
 * present in the process environment win over the file, so deployments can
 * inject secrets without shipping a `.env`.
 */
export function loadEnvOnce(repoRoot?: string): void {
  if (process.env.__ENV_LOADED === '1') {
    return;
  }

  const root = repoRoot ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
  const isTestEnv = process.env.VITEST === 'true';

  const files = [path.join(root, '.env')];
  if (isTestEnv) {
    files.unshift(path.join(root, '.env.test'));
  }

  // dotenv keeps the first value it sees, so .env.test must load before .env
  for (const file of files) {
    if (!existsSync(file)) continue;
    const result = dotenv.config({ path: file });
    if (result.error) {
      throw new Error(`Failed to load ${file}: ${result.error.message}`);
    }
  }

  process.env.__ENV_LOADED = '1';
}

loadEnvOnce();
