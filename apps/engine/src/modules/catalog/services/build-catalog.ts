import { type AuthorityRule, AuthorityRuleSchema } from '@dutystack/types';
import { z } from 'zod/v4';
import { isWithinWindow } from '../../../lib/dates.js';
import { CatalogError } from '../../../lib/errors.js';
import { longestHsPrefixMatch, normalizeHsCode } from '../../../lib/hs-code.js';

export type RuleCatalog = {
  readonly version: string;
  readonly rules: readonly AuthorityRule[];
  get(id: string): AuthorityRule | undefined;
  /**
   * Rules applicable to a shipment, ordered by precedence then id.
   * Within one family only the longest matching HS prefix survives.
   */
  lookup(
    hsCode: string,
    originCountry: string,
    destinationCountry: string,
    entryDate: string
  ): AuthorityRule[];
};

const RuleListSchema = z.array(AuthorityRuleSchema);

export function compareByPrecedence(a: AuthorityRule, b: AuthorityRule): number {
  if (a.precedenceLevel !== b.precedenceLevel) return a.precedenceLevel - b.precedenceLevel;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** HS match length for a rule, or -1 when the shipment falls outside its applicability. */
export function applicabilityMatch(
  rule: AuthorityRule,
  hsCode: string,
  originCountry: string,
  destinationCountry: string,
  entryDate: string
): number {
  const { applicability: a } = rule;
  if (!a.destinationCountries.includes(destinationCountry)) return -1;
  if (a.originCountries?.length && !a.originCountries.includes(originCountry)) return -1;
  if (a.excludedOriginCountries?.includes(originCountry)) return -1;
  if (!isWithinWindow(entryDate, a.effectiveFrom, a.effectiveTo)) return -1;
  return longestHsPrefixMatch(hsCode, a.hsPrefixes);
}

export function buildRuleCatalog(input: unknown, opts: { version?: string } = {}): RuleCatalog {
  const parsed = RuleListSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogError('Invalid rule catalog', parsed.error.issues);
  }

  const byId = new Map<string, AuthorityRule>();
  for (const rule of parsed.data) {
    if (byId.has(rule.id)) throw new CatalogError(`Duplicate rule id: ${rule.id}`, { id: rule.id });
    byId.set(rule.id, deepFreeze(rule));
  }

  const rules = Object.freeze([...byId.values()].sort(compareByPrecedence));

  function lookup(
    hsCode: string,
    originCountry: string,
    destinationCountry: string,
    entryDate: string
  ): AuthorityRule[] {
    const hs = normalizeHsCode(hsCode);
    const origin = originCountry.trim().toUpperCase();
    const dest = destinationCountry.trim().toUpperCase();

    const bestByFamily = new Map<string, { length: number; rules: AuthorityRule[] }>();
    for (const rule of rules) {
      const length = applicabilityMatch(rule, hs, origin, dest, entryDate);
      if (length < 0) continue;

      const current = bestByFamily.get(rule.family);
      if (!current || length > current.length) {
        bestByFamily.set(rule.family, { length, rules: [rule] });
      } else if (length === current.length) {
        current.rules.push(rule);
      }
    }

    return [...bestByFamily.values()].flatMap((entry) => entry.rules).sort(compareByPrecedence);
  }

  return {
    version: opts.version ?? 'inline',
    rules,
    get: (id) => byId.get(id),
    lookup,
  };
}
