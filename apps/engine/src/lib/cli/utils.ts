import { readFile } from 'node:fs/promises';
import { ValidationError } from '../errors.js';

export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). All values are strings. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    if (!a.startsWith('--')) continue;
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a);
    if (!m) continue;
    const key = (m[1] ?? '').trim();
    const val = (m[2] ?? 'true').trim(); // bare --key => "true"
    if (key) flags[key] = val;
  }
  return flags;
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (typeof v !== 'string') return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

export function requireFlag(flags: Flags, key: string): string {
  const v = flagStr(flags, key);
  if (v === undefined) throw new ValidationError(`--${key} is required`, { flag: key });
  return v;
}

/** Get a boolean flag. Accepts true/false/1/0/yes/no/on/off (case-insensitive). */
export function flagBool(flags: Flags, key: string): boolean {
  const v = flagStr(flags, key);
  if (v == null) return false;
  return /^(?:1|true|t|yes|y|on)$/i.test(v);
}

/** Split comma/space-separated flag into array of non-empty tokens. */
export function flagCSV(flags: Flags, key: string): string[] {
  const s = flagStr(flags, key);
  if (!s) return [];
  return s
    .split(/[, \t\r\n]+/)
    .map((x) => x.trim())
    .filter(Boolean);
}

export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ValidationError(`Unable to read ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError(`${path} is not valid JSON`, { path });
  }
}

export function printJson(value: unknown, compact = false): void {
  console.log(compact ? JSON.stringify(value) : JSON.stringify(value, null, 2));
}
