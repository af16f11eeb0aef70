import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

// Later files override earlier ones: `.env` holds defaults, `.env.local` the machine's overrides.
const ENV_FILES = ['.env', '.env.local'] as const;

export function loadEnvFiles(dir = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const [index, name] of ENV_FILES.entries()) {
    const file = path.join(dir, name);
    if (!fs.existsSync(file)) continue;
    dotenv.config({ path: file, override: index > 0 });
    loaded.push(name);
  }
  return loaded;
}

loadEnvFiles();
