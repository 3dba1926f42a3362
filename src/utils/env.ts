/**
 * .env loading
 *
 * Candidate locations, first found wins:
 * 1. DIRECTORY_SUMMARIZER_ENV_FILE env var (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @module utils/env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

/**
 * @returns the file that was loaded, or null when none exists
 */
export function loadEnvFile(): string | null {
  const envCandidates = [
    process.env.DIRECTORY_SUMMARIZER_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(packageRoot, '.env'),
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}
