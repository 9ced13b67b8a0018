import { z } from 'zod/v4';
import {
  CountryCodeSchema,
  EntryTypeSchema,
  HsPrefixSchema,
  IsoDateSchema,
  MaterialKindSchema,
  PercentSchema,
  RateSchema,
} from './common.js';
import { ProductCategorySchema } from './shipments.js';

export const AUTHORITY_FAMILIES = [
  'retaliatory',
  'emergency-powers-fentanyl',
  'emergency-powers-reciprocal',
  'national-security-automotive',
  'national-security-buses',
  'national-security-steel',
  'national-security-aluminum',
  'national-security-copper',
  'national-security-lumber',
  'safeguard',
] as const;

export const LEGAL_BASES = [
  'national-security',
  'retaliatory',
  'emergency-powers',
  'safeguard',
] as const;

export const AuthorityFamilySchema = z.enum(AUTHORITY_FAMILIES);
export const LegalBasisSchema = z.enum(LEGAL_BASES);

const DateWindowFields = {
  effectiveFrom: IsoDateSchema.optional(),
  effectiveTo: IsoDateSchema.optional(),
};

export const ApplicabilitySchema = z.object({
  hsPrefixes: z.array(HsPrefixSchema).min(1),
  /** absent or empty = every origin */
  originCountries: z.array(CountryCodeSchema).optional(),
  excludedOriginCountries: z.array(CountryCodeSchema).optional(),
  destinationCountries: z.array(CountryCodeSchema).min(1),
  ...DateWindowFields,
});

export const ProductCountryRateSchema = z.object({
  hsPrefix: HsPrefixSchema,
  country: CountryCodeSchema,
  rate: RateSchema,
  ...DateWindowFields,
});

export const ProductRateSchema = z.object({
  hsPrefix: HsPrefixSchema,
  rate: RateSchema,
  ...DateWindowFields,
});

export const CountryRateSchema = z.object({
  country: CountryCodeSchema,
  rate: RateSchema,
  ...DateWindowFields,
});

export const RateTableSchema = z.object({
  byProductAndCountry: z.array(ProductCountryRateSchema).default([]),
  byProduct: z.array(ProductRateSchema).default([]),
  byCountry: z.array(CountryRateSchema).default([]),
  /** headline rate for every origin without a byCountry entry */
  defaultRate: z.object({ rate: RateSchema, ...DateWindowFields }).optional(),
});

export const StackingModeSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('additive') }),
  z.object({ mode: z.literal('exclusiveWithGroup'), groupId: z.string().trim().min(1) }),
]);

export const ValuePortionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('wholeValue') }),
  z.object({ kind: z.literal('materialPortion'), material: MaterialKindSchema }),
  z.object({ kind: z.literal('nonMaterialResidual') }),
  z.object({ kind: z.literal('domesticContentResidual') }),
]);

export const RateAdjustmentSchema = z.discriminatedUnion('kind', [
  /** rate = max(0, floorRate - baseDutyRate) for the listed origins */
  z.object({
    kind: z.literal('topUpToFloor'),
    floorRate: RateSchema,
    originCountries: z.array(CountryCodeSchema).min(1),
  }),
  /** rate = max(0, tableRate - rebateRate), e.g. an assembly offset */
  z.object({ kind: z.literal('rebate'), rebateRate: RateSchema }),
]);

const FractionSchema = z.number().min(0).max(1);

export const ExclusionConditionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('tradeAgreement'),
    originCountries: z.array(CountryCodeSchema).optional(),
  }),
  /** qualified goods are relieved of agreementShare × contentFactor of the duty */
  z.object({
    kind: z.literal('tradeAgreementShare'),
    originCountries: z.array(CountryCodeSchema).min(1),
    agreementShare: FractionSchema,
    contentFactor: FractionSchema.default(1),
  }),
  z.object({ kind: z.literal('domesticProcessing'), material: MaterialKindSchema }),
  z.object({
    kind: z.literal('claimedExclusion'),
    originCountries: z.array(CountryCodeSchema).optional(),
  }),
  z.object({ kind: z.literal('productCategory'), category: ProductCategorySchema }),
  z.object({ kind: z.literal('originCountry'), countries: z.array(CountryCodeSchema).min(1) }),
  z.object({ kind: z.literal('entryType'), entryTypes: z.array(EntryTypeSchema).min(1) }),
]);

export const ExclusionRecordSchema = z
  .object({
    code: z.string().trim().min(1),
    description: z.string().optional(),
    condition: ExclusionConditionSchema,
    validFrom: IsoDateSchema.optional(),
    validUntil: IsoDateSchema.optional(),
    quantityLimit: z.number().nonnegative().optional(),
    cumulativeUsage: z.number().nonnegative().optional(),
  })
  .refine((r) => !r.validFrom || !r.validUntil || r.validFrom <= r.validUntil, {
    message: 'validFrom must not be after validUntil',
  });

export const AuthorityRuleSchema = z
  .object({
    id: z.string().trim().min(1),
    displayName: z.string().trim().min(1),
    family: AuthorityFamilySchema,
    legalBasis: LegalBasisSchema,
    precedenceLevel: z.number().int(),
    applicability: ApplicabilitySchema,
    rateTable: RateTableSchema,
    rateAdjustment: RateAdjustmentSchema.optional(),
    stackingMode: StackingModeSchema,
    locksGroups: z.array(z.string().trim().min(1)).default([]),
    appliesToValuePortion: ValuePortionSchema,
    domesticContentThreshold: PercentSchema.optional(),
    /** reported on lines whose domestic-content share was carved out */
    domesticContentExclusionCode: z.string().trim().min(1).optional(),
    deMinimisContentThreshold: PercentSchema.optional(),
    exclusionRules: z.array(ExclusionRecordSchema).default([]),
  })
  .refine(
    (r) =>
      r.deMinimisContentThreshold === undefined ||
      r.appliesToValuePortion.kind === 'materialPortion',
    { message: 'deMinimisContentThreshold only applies to materialPortion authorities' }
  )
  .refine(
    (r) =>
      r.domesticContentThreshold === undefined ||
      r.appliesToValuePortion.kind === 'nonMaterialResidual',
    { message: 'domesticContentThreshold only applies to nonMaterialResidual authorities' }
  )
  .refine(
    (r) => r.domesticContentExclusionCode === undefined || r.domesticContentThreshold !== undefined,
    { message: 'domesticContentExclusionCode requires domesticContentThreshold' }
  );

export const RuleCatalogFileSchema = z.object({
  version: z.string().min(1),
  rules: z.array(AuthorityRuleSchema),
});
