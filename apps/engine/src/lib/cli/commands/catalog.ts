import { requiredFacts } from '../../../modules/facts/services/required-facts.js';
import { type Command, openCatalog } from '../runtime.js';
import { flagBool, parseFlags, printJson, requireFlag } from '../utils.js';

/** catalog:check [--catalog=rules.json] */
export const catalogCheck: Command = async (args, ctx) => {
  const flags = parseFlags(args);
  const catalog = await openCatalog(flags, ctx);

  const families: Record<string, number> = {};
  for (const rule of catalog.rules) families[rule.family] = (families[rule.family] ?? 0) + 1;

  printJson(
    { ok: true, version: catalog.version, rules: catalog.rules.length, families },
    flagBool(flags, 'compact')
  );
};

/** catalog:lookup --hs=7208.10.00.00 --origin=CN --dest=US --date=2025-06-01 */
export const catalogLookup: Command = async (args, ctx) => {
  const flags = parseFlags(args);
  const hs = requireFlag(flags, 'hs');
  const origin = requireFlag(flags, 'origin');
  const dest = requireFlag(flags, 'dest');
  const date = requireFlag(flags, 'date');

  const catalog = await openCatalog(flags, ctx);
  const rules = catalog.lookup(hs, origin, dest, date).map((rule) => ({
    id: rule.id,
    displayName: rule.displayName,
    family: rule.family,
    precedenceLevel: rule.precedenceLevel,
    stackingMode: rule.stackingMode,
    valuePortion: rule.appliesToValuePortion,
  }));

  printJson({ hs, origin, dest, date, rules }, flagBool(flags, 'compact'));
};

/** catalog:facts --hs=8703.23.01 --origin=DE --dest=US --date=2025-06-01 */
export const catalogFacts: Command = async (args, ctx) => {
  const flags = parseFlags(args);
  const hs = requireFlag(flags, 'hs');
  const origin = requireFlag(flags, 'origin');
  const dest = requireFlag(flags, 'dest');
  const date = requireFlag(flags, 'date');

  const catalog = await openCatalog(flags, ctx);
  const rules = catalog.lookup(hs, origin, dest, date);
  const facts = requiredFacts(rules, origin);

  printJson(
    { hs, origin, dest, date, authorities: rules.map((r) => r.id), facts },
    flagBool(flags, 'compact')
  );
};
