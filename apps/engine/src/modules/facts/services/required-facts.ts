import { type AuthorityRule, MATERIAL_KINDS, type MaterialKind } from '@dutystack/types';

/** Descriptor fields an authority's rate, value portion or exemptions depend on. */
export type FactField =
  | `composition.${MaterialKind | 'domesticContent'}`
  | `materialOrigin.${MaterialKind}`
  | 'tradeAgreementQualified'
  | 'baseDutyRate'
  | 'exclusionClaims'
  | 'productCategories'
  | 'entryType';

export type RequiredFact = {
  field: FactField;
  /** authorities that read the field, in input order */
  authorityIds: string[];
};

const FACT_ORDER: readonly FactField[] = [
  ...MATERIAL_KINDS.map((m) => `composition.${m}` as const),
  'composition.domesticContent',
  ...MATERIAL_KINDS.map((m) => `materialOrigin.${m}` as const),
  'tradeAgreementQualified',
  'baseDutyRate',
  'exclusionClaims',
  'productCategories',
  'entryType',
];

const allows = (list: readonly string[] | undefined, country: string) =>
  !list?.length || list.includes(country);

/** An unconditional origin exemption makes every other fact moot. */
function exemptByOrigin(rule: AuthorityRule, origin: string): boolean {
  return rule.exclusionRules.some(
    (r) => r.condition.kind === 'originCountry' && r.condition.countries.includes(origin)
  );
}

function factsFor(rule: AuthorityRule, origin: string): FactField[] {
  const facts: FactField[] = [];
  const portion = rule.appliesToValuePortion;

  if (portion.kind === 'materialPortion') facts.push(`composition.${portion.material}`);
  if (rule.domesticContentThreshold !== undefined) facts.push('composition.domesticContent');

  const adj = rule.rateAdjustment;
  if (adj?.kind === 'topUpToFloor' && adj.originCountries.includes(origin)) {
    facts.push('baseDutyRate');
  }

  for (const { condition: c } of rule.exclusionRules) {
    switch (c.kind) {
      case 'tradeAgreement':
        if (allows(c.originCountries, origin)) facts.push('tradeAgreementQualified');
        break;
      case 'tradeAgreementShare':
        if (c.originCountries.includes(origin)) facts.push('tradeAgreementQualified');
        break;
      case 'domesticProcessing':
        facts.push(`materialOrigin.${c.material}`);
        break;
      case 'claimedExclusion':
        if (allows(c.originCountries, origin)) facts.push('exclusionClaims');
        break;
      case 'productCategory':
        facts.push('productCategories');
        break;
      case 'entryType':
        facts.push('entryType');
        break;
      case 'originCountry':
        break;
    }
  }
  return facts;
}

/**
 * Shipment facts the given authorities need for an origin, so a caller can ask for
 * them before computing. Authorities the origin is blanket-exempt from need none.
 */
export function requiredFacts(rules: readonly AuthorityRule[], origin: string): RequiredFact[] {
  const country = origin.trim().toUpperCase();
  const byField = new Map<FactField, string[]>();

  for (const rule of rules) {
    if (exemptByOrigin(rule, country)) continue;
    for (const field of factsFor(rule, country)) {
      const ids = byField.get(field) ?? [];
      if (!ids.includes(rule.id)) ids.push(rule.id);
      byField.set(field, ids);
    }
  }

  return FACT_ORDER.flatMap((field) => {
    const authorityIds = byField.get(field);
    return authorityIds ? [{ field, authorityIds }] : [];
  });
}
