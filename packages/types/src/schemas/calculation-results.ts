import { z } from 'zod/v4';
import { AuthorityFamilySchema } from './authority-rules.js';

export const REASON_CODES = [
  'APPLIES',
  'EXEMPT_TRADE_AGREEMENT',
  'EXEMPT_PARTIAL_TRADE_AGREEMENT',
  'EXEMPT_DOMESTIC_PROCESSING',
  'EXEMPT_CLAIMED_EXCLUSION',
  'EXEMPT_BLANKET_CATEGORY',
  'EXEMPT_DOMESTIC_CONTENT_SHARE',
  'EXCLUSION_DENIED_OUTSIDE_WINDOW',
  'EXCLUSION_DENIED_QUANTITY_CAP',
  'EXCLUSION_DENIED_WINDOW_AND_QUANTITY_CAP',
  'EXCLUSION_DENIED_QUANTITY_UNDECLARED',
  'SUPERSEDED_BY_EXCLUSIVITY_GROUP',
  'NOT_APPLICABLE_NO_MATERIAL_CONTENT',
  'NOT_APPLICABLE_BELOW_DE_MINIMIS_CONTENT',
] as const;

export const ReasonCodeSchema = z.enum(REASON_CODES);

export const RATE_SPECIFICITIES = ['productAndCountry', 'product', 'country', 'default'] as const;
export const RateSpecificitySchema = z.enum(RATE_SPECIFICITIES);

export const CalculationLineSchema = z.object({
  authorityId: z.string(),
  displayName: z.string(),
  family: AuthorityFamilySchema,
  precedenceLevel: z.number().int(),
  matchedRate: z.number().nonnegative(),
  /** absent when a superseded or not-applicable authority has no resolvable rate */
  rateSpecificity: RateSpecificitySchema.optional(),
  /** `wholeValue`, `material:steel`, `nonMaterialResidual`, ... */
  valuePortion: z.string(),
  dutiableValue: z.number().nonnegative(),
  computedAmount: z.number().nonnegative(),
  excluded: z.boolean(),
  exclusionCode: z.string().optional(),
  deniedExclusionCode: z.string().optional(),
  supersededBy: z.string().optional(),
  reasonCode: ReasonCodeSchema,
});

export const UsageConsumedSchema = z.object({
  exclusionCode: z.string(),
  quantity: z.number().nonnegative(),
});

export const CalculationResultSchema = z.object({
  lines: z.array(CalculationLineSchema),
  totalBefore: z.number().nonnegative(),
  totalAfter: z.number().nonnegative(),
  savings: z.number().nonnegative(),
  usageConsumed: z.array(UsageConsumedSchema),
});
