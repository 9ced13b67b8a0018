import { RuleCatalogFileSchema } from '@dutystack/types';
import { readFile } from 'node:fs/promises';
import { DEFAULT_RULE_CATALOG_PATH } from '../../../lib/env.js';
import { CatalogError } from '../../../lib/errors.js';
import { buildRuleCatalog, type RuleCatalog } from './build-catalog.js';

/** Parse a catalog document ({ version, rules }) and build the frozen catalog from it. */
export function parseRuleCatalog(raw: string, source = 'inline'): RuleCatalog {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CatalogError(`Rule catalog ${source} is not valid JSON`, {
      source,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = RuleCatalogFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new CatalogError(`Invalid rule catalog ${source}`, parsed.error.issues);
  }

  return buildRuleCatalog(parsed.data.rules, { version: parsed.data.version });
}

export async function loadRuleCatalog(path: string = DEFAULT_RULE_CATALOG_PATH): Promise<RuleCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new CatalogError(`Unable to read rule catalog ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parseRuleCatalog(raw, path);
}
