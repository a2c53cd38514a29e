import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';

/*
 * Loads KEY=value pairs from .env or .env.local in the working directory.
 * Variables already present in the environment win.
 */
export function loadDotEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const candidates = ['.env', '.env.local'];
  for (const filename of candidates) {
    const full = path.resolve(cwd, filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || match[2] === undefined) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (env[key] === undefined) {
          env[key] = value;
        }
      }
      break; // stop after first found
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Loading .env file');
      warn(`Warning: ${err.message}`);
    }
  }
}
