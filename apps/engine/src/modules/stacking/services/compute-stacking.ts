import {
  type AuthorityRule,
  type CalculationLine,
  type CalculationResult,
  type ExclusionUsageSnapshot,
  ExclusionUsageSnapshotSchema,
  type ReasonCode,
  type ShipmentDescriptor,
  ShipmentDescriptorSchema,
  type UsageConsumed,
} from '@dutystack/types';
import { ValidationError } from '../../../lib/errors.js';
import { type Logger, silentLogger } from '../../../lib/logger.js';
import { applyRate, fromCents, mulRatio, toBasisPoints } from '../../../lib/money.js';
import { compareByPrecedence } from '../../catalog/services/build-catalog.js';
import { evaluateExemption } from '../../exemptions/services/evaluate-exemption.js';
import { lookupRate, resolveRate } from '../../rates/services/resolve-rate.js';
import {
  domesticContentShareApplies,
  dutiableValueFor,
  grossDutiableValueFor,
  materialBasisPoints,
  splitValue,
  valuePortionLabel,
} from '../../value-split/services/split-value.js';

export type StackingOptions = {
  /** running totals for quantity-capped exclusions; read, never written */
  usage?: ExclusionUsageSnapshot;
  log?: Logger;
};

export function parseDescriptor(input: unknown): ShipmentDescriptor {
  const parsed = ShipmentDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid shipment descriptor', parsed.error.issues);
  }
  return parsed.data;
}

export function parseUsage(input: unknown): ExclusionUsageSnapshot {
  if (input === undefined) return {};
  const parsed = ExclusionUsageSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid exclusion usage snapshot', parsed.error.issues);
  }
  return parsed.data;
}

/** Content exactly at a rule's de-minimis threshold counts as de-minimis. */
export const DE_MINIMIS_THRESHOLD_INCLUSIVE = true;

function isDeMinimis(contentBp: number, thresholdBp: number): boolean {
  return DE_MINIMIS_THRESHOLD_INCLUSIVE ? contentBp <= thresholdBp : contentBp < thresholdBp;
}

/** Material authorities with no (or de-minimis) content in the shipment. */
function notApplicableReason(
  rule: AuthorityRule,
  descriptor: ShipmentDescriptor
): ReasonCode | undefined {
  const portion = rule.appliesToValuePortion;
  if (portion.kind !== 'materialPortion') return undefined;

  const contentBp = materialBasisPoints(descriptor, portion.material);
  if (contentBp === 0) return 'NOT_APPLICABLE_NO_MATERIAL_CONTENT';

  const threshold = rule.deMinimisContentThreshold;
  if (threshold !== undefined && isDeMinimis(contentBp, toBasisPoints(threshold))) {
    return 'NOT_APPLICABLE_BELOW_DE_MINIMIS_CONTENT';
  }
  return undefined;
}

function groupsLockedBy(rule: AuthorityRule): string[] {
  const own = rule.stackingMode.mode === 'exclusiveWithGroup' ? [rule.stackingMode.groupId] : [];
  return [...own, ...rule.locksGroups];
}

/** Stacks already-validated input. Callers outside this module go through computeStacking. */
export function stackRules(
  descriptor: ShipmentDescriptor,
  rules: readonly AuthorityRule[],
  usage: ExclusionUsageSnapshot,
  log: Logger
): CalculationResult {
  const split = splitValue(descriptor);
  const ordered = [...rules].sort(compareByPrecedence);

  const locks = new Map<string, string>();
  const consumed = new Map<string, number>();
  const lines: CalculationLine[] = [];
  let beforeCents = 0;
  let afterCents = 0;

  for (const rule of ordered) {
    const mode = rule.stackingMode;
    const lockedBy = mode.mode === 'exclusiveWithGroup' ? locks.get(mode.groupId) : undefined;
    const notApplicable = lockedBy === undefined ? notApplicableReason(rule, descriptor) : undefined;

    // Lines that never charge anything must not fail the shipment on a missing rate.
    const rate =
      lockedBy !== undefined || notApplicable !== undefined
        ? lookupRate(rule, descriptor)
        : resolveRate(rule, descriptor);
    const matchedRate = rate?.rate ?? 0;

    const gross = grossDutiableValueFor(rule, split);
    const carved =
      lockedBy === undefined &&
      notApplicable === undefined &&
      domesticContentShareApplies(rule, descriptor);
    const dutiable = carved ? dutiableValueFor(rule, split, descriptor) : gross;
    const grossAmount = notApplicable ? 0 : applyRate(gross, matchedRate);

    const base = {
      authorityId: rule.id,
      displayName: rule.displayName,
      family: rule.family,
      precedenceLevel: rule.precedenceLevel,
      matchedRate,
      ...(rate ? { rateSpecificity: rate.specificity } : {}),
      valuePortion: valuePortionLabel(rule.appliesToValuePortion),
      dutiableValue: fromCents(dutiable),
    };

    let line: CalculationLine;

    if (lockedBy !== undefined) {
      line = {
        ...base,
        computedAmount: 0,
        excluded: true,
        supersededBy: lockedBy,
        reasonCode: 'SUPERSEDED_BY_EXCLUSIVITY_GROUP',
      };
      beforeCents += grossAmount;
    } else if (notApplicable) {
      line = { ...base, computedAmount: 0, excluded: false, reasonCode: notApplicable };
    } else {
      for (const group of groupsLockedBy(rule)) {
        if (!locks.has(group)) locks.set(group, rule.id);
      }

      const outcome = evaluateExemption(rule, descriptor, usage);
      beforeCents += grossAmount;
      const payable = carved ? applyRate(dutiable, matchedRate) : grossAmount;

      if (outcome.exempt) {
        const share = outcome.share;
        const amount = share === undefined ? 0 : payable - mulRatio(payable, share);
        afterCents += amount;
        line = {
          ...base,
          computedAmount: fromCents(amount),
          excluded: share === undefined,
          exclusionCode: outcome.code,
          reasonCode: outcome.reasonCode,
        };
        if (outcome.usage && !consumed.has(outcome.usage.exclusionCode)) {
          consumed.set(outcome.usage.exclusionCode, outcome.usage.quantity);
        }
      } else {
        afterCents += payable;
        const contentCode = carved ? rule.domesticContentExclusionCode : undefined;
        line = {
          ...base,
          computedAmount: fromCents(payable),
          excluded: false,
          ...(contentCode !== undefined ? { exclusionCode: contentCode } : {}),
          ...(outcome.denial ? { deniedExclusionCode: outcome.denial.code } : {}),
          reasonCode: carved ? 'EXEMPT_DOMESTIC_CONTENT_SHARE' : outcome.reasonCode,
        };
      }
    }

    log.debug(
      {
        authorityId: line.authorityId,
        reasonCode: line.reasonCode,
        rate: line.matchedRate,
        dutiableValue: line.dutiableValue,
        computedAmount: line.computedAmount,
      },
      'stacking line'
    );
    lines.push(line);
  }

  const usageConsumed: UsageConsumed[] = [...consumed].map(([exclusionCode, quantity]) => ({
    exclusionCode,
    quantity,
  }));

  return {
    lines,
    totalBefore: fromCents(beforeCents),
    totalAfter: fromCents(afterCents),
    savings: fromCents(beforeCents - afterCents),
    usageConsumed,
  };
}

/**
 * Duty breakdown for one shipment against pre-filtered candidate rules.
 * Throws ValidationError on a bad descriptor and NoRateDefinedError on a catalog gap;
 * exclusions and supersessions are reported on the lines, never thrown.
 */
export function computeStacking(
  input: unknown,
  rules: readonly AuthorityRule[],
  opts: StackingOptions = {}
): CalculationResult {
  const descriptor = parseDescriptor(input);
  const usage = parseUsage(opts.usage);
  return stackRules(descriptor, rules, usage, opts.log ?? silentLogger);
}
