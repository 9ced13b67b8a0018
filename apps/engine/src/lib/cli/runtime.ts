import type { RuleCatalog } from '../../modules/catalog/services/build-catalog.js';
import { loadRuleCatalog } from '../../modules/catalog/services/load-catalog.js';
import type { EngineEnv } from '../env.js';
import type { Logger } from '../logger.js';
import { type Flags, flagStr } from './utils.js';

export type CommandContext = {
  env: EngineEnv;
  log: Logger;
};

export type Command = (args: string[], ctx: CommandContext) => Promise<void>;

/** Loads the catalog named by --catalog, falling back to RULE_CATALOG_PATH / the bundled file. */
export async function openCatalog(flags: Flags, ctx: CommandContext): Promise<RuleCatalog> {
  const path = flagStr(flags, 'catalog') ?? ctx.env.ruleCatalogPath;
  const catalog = await loadRuleCatalog(path);
  ctx.log.info(
    { path, version: catalog.version, rules: catalog.rules.length },
    'rule catalog loaded'
  );
  return catalog;
}
