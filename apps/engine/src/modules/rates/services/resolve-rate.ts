import type { AuthorityRule, RateSpecificity, ShipmentDescriptor } from '@dutystack/types';
import { isWithinWindow } from '../../../lib/dates.js';
import { NoRateDefinedError, ValidationError } from '../../../lib/errors.js';
import { hsPrefixMatchLength, normalizeHsCode } from '../../../lib/hs-code.js';

export type ResolvedRate = {
  rate: number;
  specificity: RateSpecificity;
  matchedHsPrefix?: string;
  /** true when a floor top-up or rebate changed the table rate */
  adjusted: boolean;
};

type DatedEntry = { rate: number; effectiveFrom?: string; effectiveTo?: string };
type PrefixedEntry = DatedEntry & { hsPrefix: string };

function pickLongestPrefix<T extends PrefixedEntry>(
  entries: readonly T[],
  hsCode: string,
  entryDate: string
): T | undefined {
  let best: T | undefined;
  let bestLength = -1;
  for (const entry of entries) {
    if (!isWithinWindow(entryDate, entry.effectiveFrom, entry.effectiveTo)) continue;
    const length = hsPrefixMatchLength(hsCode, entry.hsPrefix);
    // strict > keeps the first entry on equal length
    if (length > bestLength) {
      best = entry;
      bestLength = length;
    }
  }
  return best;
}

const roundRate = (rate: number) => Math.round(rate * 1_000_000) / 1_000_000;

type RateLookup =
  | { found: true; resolved: ResolvedRate }
  | { found: false; missing: 'baseDutyRate' | 'rate' };

function tableRate(
  rule: AuthorityRule,
  descriptor: ShipmentDescriptor
): ResolvedRate | undefined {
  const hs = normalizeHsCode(descriptor.hsCode);
  const { originCountry: origin, entryDate } = descriptor;
  const table = rule.rateTable;

  const productAndCountry = pickLongestPrefix(
    table.byProductAndCountry.filter((e) => e.country === origin),
    hs,
    entryDate
  );
  if (productAndCountry) {
    return {
      rate: productAndCountry.rate,
      specificity: 'productAndCountry',
      matchedHsPrefix: productAndCountry.hsPrefix,
      adjusted: false,
    };
  }

  const product = pickLongestPrefix(table.byProduct, hs, entryDate);
  if (product) {
    return {
      rate: product.rate,
      specificity: 'product',
      matchedHsPrefix: product.hsPrefix,
      adjusted: false,
    };
  }

  const headline = table.byCountry.find(
    (e) => e.country === origin && isWithinWindow(entryDate, e.effectiveFrom, e.effectiveTo)
  );
  if (headline) return { rate: headline.rate, specificity: 'country', adjusted: false };

  const fallback = table.defaultRate;
  if (fallback && isWithinWindow(entryDate, fallback.effectiveFrom, fallback.effectiveTo)) {
    return { rate: fallback.rate, specificity: 'default', adjusted: false };
  }
  return undefined;
}

function lookup(rule: AuthorityRule, descriptor: ShipmentDescriptor): RateLookup {
  const adj = rule.rateAdjustment;

  if (adj?.kind === 'topUpToFloor' && adj.originCountries.includes(descriptor.originCountry)) {
    if (descriptor.baseDutyRate === undefined) return { found: false, missing: 'baseDutyRate' };
    return {
      found: true,
      resolved: {
        rate: roundRate(Math.max(0, adj.floorRate - descriptor.baseDutyRate)),
        specificity: 'country',
        adjusted: true,
      },
    };
  }

  const table = tableRate(rule, descriptor);
  if (!table) return { found: false, missing: 'rate' };

  if (adj?.kind === 'rebate') {
    return {
      found: true,
      resolved: {
        ...table,
        rate: roundRate(Math.max(0, table.rate - adj.rebateRate)),
        adjusted: true,
      },
    };
  }
  return { found: true, resolved: table };
}

/**
 * Most specific rate for the shipment:
 * (hs prefix, origin) → hs prefix → origin headline → default headline.
 * A floor top-up replaces the table rate for its origins; a rebate is taken off it.
 * A zero rate is a valid match; no match at all is a catalog fault.
 */
export function resolveRate(rule: AuthorityRule, descriptor: ShipmentDescriptor): ResolvedRate {
  const result = lookup(rule, descriptor);
  if (result.found) return result.resolved;

  if (result.missing === 'baseDutyRate') {
    throw new ValidationError(
      `baseDutyRate is required for authority ${rule.id} (origin ${descriptor.originCountry})`,
      { authorityId: rule.id, field: 'baseDutyRate' }
    );
  }
  throw new NoRateDefinedError(
    rule.id,
    normalizeHsCode(descriptor.hsCode),
    descriptor.originCountry
  );
}

/** Like resolveRate, but undefined where resolveRate would throw. */
export function lookupRate(
  rule: AuthorityRule,
  descriptor: ShipmentDescriptor
): ResolvedRate | undefined {
  const result = lookup(rule, descriptor);
  return result.found ? result.resolved : undefined;
}
