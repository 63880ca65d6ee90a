import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

export interface EnvEntry {
  key: string;
  value: string;
}

/**
 * One `.env` line to a key/value pair. Blank lines, `#` comments and lines
 * without `=` give `undefined`. An `export ` prefix and one pair of matching
 * surrounding quotes are dropped.
 */
export function parseEnvLine(line: string): EnvEntry | undefined {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return undefined;

  const body = trimmed.startsWith('export ') ? trimmed.slice('export '.length).trimStart() : trimmed;
  const eq = body.indexOf('=');
  if (eq <= 0) return undefined;

  const key = body.slice(0, eq).trim();
  let value = body.slice(eq + 1).trim();
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    value = value.slice(1, -1);
  }
  return key ? { key, value } : undefined;
}

/**
 * Load dotenv files into `env`. Variables already
 * set win over file values, and earlier files win over later ones.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const line of readFileSync(filePath, 'utf8').split(/\r?\n/)) {
      const entry = parseEnvLine(line);
      if (entry && env[entry.key] === undefined) env[entry.key] = entry.value;
    }
    loaded.push(name);
  }

  return { loaded };
}
