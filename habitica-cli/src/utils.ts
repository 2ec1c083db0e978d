import fs from 'fs';
import os from 'os';
import path from 'path';

export type ParsedArgs = { _: string[] } & Record<string, string | boolean | string[] | undefined>;

const BOOLEAN_FLAGS = new Set(['help', 'h', 'version', 'verbose', 'debug']);

export function parseArgs(argv: string[]): ParsedArgs {
  const args = Array.isArray(argv) ? argv : [];
  const result: ParsedArgs = { _: [] };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    // "-" alone and negative-looking ranges are positional
    if (!token.startsWith('-') || token === '-' || /^-\d/.test(token)) {
      result._.push(token);
      continue;
    }
    if (token === '--') {
      result._.push(...args.slice(i + 1));
      break;
    }
    const isLong = token.startsWith('--');
    const key = isLong ? token.slice(2) : token.slice(1);
    if (!key) continue;
    const eq = key.indexOf('=');
    if (eq >= 0) {
      result[key.slice(0, eq)] = key.slice(eq + 1);
      continue;
    }
    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
      result[key] = next;
      i += 1;
    } else {
      result[key] = true;
    }
  }
  return result;
}

export function ensureDir(dirPath: string) {
  if (!dirPath) return;
  fs.mkdirSync(dirPath, { recursive: true });
}

export function trimmed(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function parseNumber(value: unknown): number | null {
  if (value === undefined || value === null || value === '' || typeof value === 'boolean') return null;
  const num = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(num)) return null;
  return num;
}

export function getHomeDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || os.homedir();
  return typeof home === 'string' && home.trim() ? home.trim() : os.homedir();
}

export function resolveConfigDir(override?: unknown): string {
  const fromArg = trimmed(override);
  if (fromArg) return path.resolve(fromArg);
  const fromEnv = trimmed(process.env.HABITICA_CONFIG_DIR);
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(getHomeDir(), '.config', 'habitica');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function plural(count: number, word: string): string {
  return count === 1 ? word : `${word}s`;
}
