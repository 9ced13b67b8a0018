import type {
  AuthorityRule,
  ExclusionClaim,
  ExclusionRecord,
  ExclusionUsageSnapshot,
  ReasonCode,
  ShipmentDescriptor,
} from '@dutystack/types';
import { isWithinWindow } from '../../../lib/dates.js';

export type ExemptReasonCode = Extract<ReasonCode, `EXEMPT_${string}`>;
export type DenialReasonCode = Extract<ReasonCode, `EXCLUSION_DENIED_${string}`>;

export type ExclusionDenial = {
  code: string;
  reasonCode: DenialReasonCode;
};

export type ExemptionOutcome =
  | {
      exempt: true;
      code: string;
      reasonCode: ExemptReasonCode;
      /** set for granted quantity-capped exclusions */
      usage?: { exclusionCode: string; quantity: number };
      /** fraction of the duty relieved; absent means the whole duty */
      share?: number;
    }
  | {
      exempt: false;
      reasonCode: 'APPLIES' | DenialReasonCode;
      denial?: ExclusionDenial;
    };

type Granted = Extract<ExemptionOutcome, { exempt: true }>;

type StepContext = {
  rule: AuthorityRule;
  descriptor: ShipmentDescriptor;
  usage: ExclusionUsageSnapshot;
};

type StepResult = Granted | ExclusionDenial | undefined;

function recordsOfKind(
  rule: AuthorityRule,
  ...kinds: ExclusionRecord['condition']['kind'][]
): ExclusionRecord[] {
  return rule.exclusionRules.filter((r) => kinds.some((k) => k === r.condition.kind));
}

const inWindow = (record: ExclusionRecord, date: string) =>
  isWithinWindow(date, record.validFrom, record.validUntil);

const listAllows = (list: readonly string[] | undefined, country: string) =>
  !list?.length || list.includes(country);

/** Whole-duty agreement records win over partial-share ones. */
function tradeAgreementStep({ rule, descriptor }: StepContext): StepResult {
  if (!descriptor.tradeAgreementQualified) return undefined;
  const origin = descriptor.originCountry;

  for (const record of recordsOfKind(rule, 'tradeAgreement')) {
    const c = record.condition;
    if (c.kind !== 'tradeAgreement') continue;
    if (!listAllows(c.originCountries, origin)) continue;
    if (!inWindow(record, descriptor.entryDate)) continue;
    return { exempt: true, code: record.code, reasonCode: 'EXEMPT_TRADE_AGREEMENT' };
  }

  for (const record of recordsOfKind(rule, 'tradeAgreementShare')) {
    const c = record.condition;
    if (c.kind !== 'tradeAgreementShare' || !c.originCountries.includes(origin)) continue;
    if (!inWindow(record, descriptor.entryDate)) continue;
    return {
      exempt: true,
      code: record.code,
      reasonCode: 'EXEMPT_PARTIAL_TRADE_AGREEMENT',
      share: c.agreementShare * c.contentFactor,
    };
  }
  return undefined;
}

function domesticProcessingStep({ rule, descriptor }: StepContext): StepResult {
  const dest = descriptor.destinationCountry;
  for (const record of recordsOfKind(rule, 'domesticProcessing')) {
    const c = record.condition;
    if (c.kind !== 'domesticProcessing') continue;
    const origin = descriptor.materialOrigin[c.material];
    if (!origin || origin.sourcedIn !== dest) continue;
    if ((origin.processedIn ?? origin.sourcedIn) !== dest) continue;
    if (!inWindow(record, descriptor.entryDate)) continue;
    return { exempt: true, code: record.code, reasonCode: 'EXEMPT_DOMESTIC_PROCESSING' };
  }
  return undefined;
}

function checkClaim(
  record: ExclusionRecord,
  claim: ExclusionClaim,
  ctx: StepContext
): Granted | ExclusionDenial {
  const windowOk = inWindow(record, ctx.descriptor.entryDate);

  let capOk = true;
  let undeclared = false;
  if (record.quantityLimit !== undefined) {
    if (claim.quantity === undefined) {
      capOk = false;
      undeclared = true;
    } else {
      const used = ctx.usage[record.code] ?? record.cumulativeUsage ?? 0;
      capOk = used + claim.quantity <= record.quantityLimit;
    }
  }

  if (windowOk && capOk) {
    return {
      exempt: true,
      code: record.code,
      reasonCode: 'EXEMPT_CLAIMED_EXCLUSION',
      ...(record.quantityLimit !== undefined && claim.quantity !== undefined
        ? { usage: { exclusionCode: record.code, quantity: claim.quantity } }
        : {}),
    };
  }

  if (!windowOk && !capOk) {
    return { code: record.code, reasonCode: 'EXCLUSION_DENIED_WINDOW_AND_QUANTITY_CAP' };
  }
  if (!windowOk) return { code: record.code, reasonCode: 'EXCLUSION_DENIED_OUTSIDE_WINDOW' };
  return {
    code: record.code,
    reasonCode: undeclared
      ? 'EXCLUSION_DENIED_QUANTITY_UNDECLARED'
      : 'EXCLUSION_DENIED_QUANTITY_CAP',
  };
}

/** Window and cap are checked together; the first denial is kept while later claims are tried. */
function claimedExclusionStep(ctx: StepContext): StepResult {
  const { rule, descriptor } = ctx;
  let denial: ExclusionDenial | undefined;

  for (const claim of descriptor.exclusionClaims) {
    for (const record of recordsOfKind(rule, 'claimedExclusion')) {
      const c = record.condition;
      if (c.kind !== 'claimedExclusion' || record.code !== claim.code) continue;
      if (!listAllows(c.originCountries, descriptor.originCountry)) continue;

      const result = checkClaim(record, claim, ctx);
      if ('exempt' in result) return result;
      denial ??= result;
    }
  }
  return denial;
}

function blanketStep({ rule, descriptor }: StepContext): StepResult {
  for (const record of recordsOfKind(rule, 'productCategory', 'originCountry', 'entryType')) {
    if (!inWindow(record, descriptor.entryDate)) continue;
    const c = record.condition;
    const matches =
      (c.kind === 'productCategory' && descriptor.productCategories.includes(c.category)) ||
      (c.kind === 'originCountry' && c.countries.includes(descriptor.originCountry)) ||
      (c.kind === 'entryType' && c.entryTypes.includes(descriptor.entryType));
    if (matches) return { exempt: true, code: record.code, reasonCode: 'EXEMPT_BLANKET_CATEGORY' };
  }
  return undefined;
}

const STEPS = [tradeAgreementStep, domesticProcessingStep, claimedExclusionStep, blanketStep];

/**
 * Runs the exemption chain in fixed order and stops at the first exemption.
 * A denied claim is an outcome, reported only when no later step exempts.
 */
export function evaluateExemption(
  rule: AuthorityRule,
  descriptor: ShipmentDescriptor,
  usage: ExclusionUsageSnapshot = {}
): ExemptionOutcome {
  const ctx: StepContext = { rule, descriptor, usage };
  let denial: ExclusionDenial | undefined;

  for (const step of STEPS) {
    const result = step(ctx);
    if (!result) continue;
    if ('exempt' in result) return result;
    denial ??= result;
  }

  if (denial) return { exempt: false, reasonCode: denial.reasonCode, denial };
  return { exempt: false, reasonCode: 'APPLIES' };
}
