import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';

const currentDir = dirname(fileURLToPath(import.meta.url));
const repoRoot = resolve(currentDir, '../../../');

/**
 * Load `.env` then `.env.local` (which wins) from the repository root.
 */
export function loadEnvFiles(root = repoRoot): void {
  const envPath = resolve(root, '.env');
  const envLocalPath = resolve(root, '.env.local');

  if (existsSync(envPath)) {
    config({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    config({ path: envLocalPath, override: true });
  }
}
