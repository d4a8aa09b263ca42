import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

function tryLoad(filePath: string): void {
  if (!fs.existsSync(filePath)) return;
  // Variables already present in the process environment always win.
  dotenv.config({ path: filePath, override: false });
}

/**
 * Loads `.env` / `.env.local` from the project root. Works both from sources
 * (backend/config) and from the compiled tree (dist/backend/config).
 */
export function loadDotenv(): void {
  const explicit = process.env.DOTENV_CONFIG_PATH;
  if (explicit) {
    tryLoad(explicit);
    return;
  }

  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const backendDir = path.resolve(thisDir, '..');
  const parent = path.resolve(backendDir, '..');
  const projectRoot = path.basename(parent) === 'dist' ? path.resolve(parent, '..') : parent;

  tryLoad(path.join(projectRoot, '.env'));
  tryLoad(path.join(projectRoot, '.env.local'));
}
