import { z } from 'zod/v4';
import {
  CompositionSchema,
  EntryTypeSchema,
  ExclusionClaimSchema,
  ExclusionUsageSnapshotSchema,
  MaterialKindSchema,
  MaterialOriginSchema,
  ProductCategorySchema,
  ShipmentDescriptorSchema,
} from '../schemas/index.js';

export type MaterialKind = z.infer<typeof MaterialKindSchema>;
export type EntryType = z.infer<typeof EntryTypeSchema>;
export type ProductCategory = z.infer<typeof ProductCategorySchema>;
export type Composition = z.infer<typeof CompositionSchema>;
export type MaterialOrigin = z.infer<typeof MaterialOriginSchema>;
export type ExclusionClaim = z.infer<typeof ExclusionClaimSchema>;

/** Validated, normalized descriptor (defaults applied). */
export type ShipmentDescriptor = z.output<typeof ShipmentDescriptorSchema>;
/** Descriptor as accepted from callers, before defaults. */
export type ShipmentDescriptorInput = z.input<typeof ShipmentDescriptorSchema>;

export type ExclusionUsageSnapshot = z.infer<typeof ExclusionUsageSnapshotSchema>;
