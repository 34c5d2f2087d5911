import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so scripts pick up
 * settings whether they run from the repo root or a data directory.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

export function envNumber(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) {
    return defaultValue;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function envString(key: string, defaultValue: string): string {
  const raw = process.env[key];
  return raw && raw.trim() !== '' ? raw.trim() : defaultValue;
}

/** Reads `--flag value` or `--flag=value` from an argv list. */
export function parseArgValue(flag: string, argv: string[] = process.argv): string | undefined {
  const prefix = `${flag}=`;
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
    if (arg === flag) {
      const next = argv[index + 1];
      if (next && !next.startsWith('--')) {
        return next;
      }
    }
  }
  return undefined;
}

export function requireArg(flag: string, argv: string[] = process.argv): string {
  const value = parseArgValue(flag, argv);
  if (!value) {
    throw new Error(`Missing required argument ${flag}`);
  }
  return value;
}
