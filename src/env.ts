/**
 * Environment variable loader
 *
 * Import this before any module that reads configuration from the environment.
 * Variables are loaded from the project root .env file; values already present
 * in the process environment take precedence.
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/ and dist/ both sit one level below the project root
const projectRoot = resolve(__dirname, '..');
const envPath = resolve(projectRoot, '.env');

let loadedFrom: string | null = null;

if (existsSync(envPath)) {
  const result = config({ path: envPath, override: false });
  if (result.parsed) {
    loadedFrom = envPath;
  }
}

if (process.env.NODE_ENV !== 'production' && loadedFrom) {
  console.log(`[env] Loaded environment variables from: ${loadedFrom}`);
}

export { loadedFrom };
