import { z } from 'zod/v4';
import {
  CountryCodeSchema,
  EntryTypeSchema,
  HsCodeSchema,
  IsoDateSchema,
  MATERIAL_KINDS,
  PercentSchema,
  RateSchema,
} from './common.js';

export const PRODUCT_CATEGORIES = ['informationalMaterials', 'humanitarianDonation'] as const;
export const ProductCategorySchema = z.enum(PRODUCT_CATEGORIES);

export const DeclaredValueSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(?:\.\d+)?$/, 'expected decimal amount')
      .transform(Number),
  ])
  .pipe(
    z
      .number()
      .nonnegative('declaredValue must not be negative')
      .refine((v) => Number.isFinite(v) && Math.abs(v * 100 - Math.round(v * 100)) < 1e-6, {
        message: 'declaredValue supports at most 2 fraction digits',
      })
  );

export const CompositionSchema = z
  .strictObject({
    steel: PercentSchema.optional(),
    aluminum: PercentSchema.optional(),
    copper: PercentSchema.optional(),
    lumber: PercentSchema.optional(),
    domesticContent: PercentSchema.optional(),
  })
  .refine(
    (c) => MATERIAL_KINDS.reduce((sum, kind) => sum + Math.round((c[kind] ?? 0) * 100), 0) <= 10_000,
    { message: 'material percentages must not sum above 100' }
  );

export const MaterialOriginSchema = z.object({
  sourcedIn: CountryCodeSchema,
  processedIn: CountryCodeSchema.optional(),
});

export const MaterialOriginMapSchema = z.strictObject({
  steel: MaterialOriginSchema.optional(),
  aluminum: MaterialOriginSchema.optional(),
  copper: MaterialOriginSchema.optional(),
  lumber: MaterialOriginSchema.optional(),
});

export const ExclusionClaimSchema = z.object({
  code: z.string().trim().min(1),
  exclusionId: z.string().trim().min(1).optional(),
  /** this shipment's quantity, compared against quantity-capped exclusions */
  quantity: z.number().nonnegative().optional(),
});

export const ShipmentDescriptorSchema = z.object({
  hsCode: HsCodeSchema,
  originCountry: CountryCodeSchema,
  destinationCountry: CountryCodeSchema,
  declaredValue: DeclaredValueSchema,
  entryDate: IsoDateSchema,
  entryType: EntryTypeSchema.default('standard'),
  composition: CompositionSchema.default({}),
  materialOrigin: MaterialOriginMapSchema.default({}),
  tradeAgreementQualified: z.boolean().default(false),
  exclusionClaims: z.array(ExclusionClaimSchema).default([]),
  productCategories: z.array(ProductCategorySchema).default([]),
  /** ordinary (MFN) duty rate as a fraction; needed by floor top-up authorities */
  baseDutyRate: RateSchema.optional(),
});

/** Caller-held running totals for quantity-capped exclusions, keyed by exclusion code. */
export const ExclusionUsageSnapshotSchema = z.record(z.string().min(1), z.number().nonnegative());
