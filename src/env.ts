/**
 * Load .env before any other module reads process.env.
 * Must be the first import of every entry point.
 */
import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';

const projectRoot = join(dirname(fileURLToPath(import.meta.url)), '..');

// dotenv never overwrites a variable that is already set, so the working
// directory's file wins over the one next to the install.
for (const path of new Set([resolve('.env'), join(projectRoot, '.env')])) {
  if (existsSync(path)) config({ path });
}
