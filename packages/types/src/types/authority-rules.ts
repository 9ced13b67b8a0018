import { z } from 'zod/v4';
import {
  ApplicabilitySchema,
  AuthorityFamilySchema,
  AuthorityRuleSchema,
  ExclusionConditionSchema,
  ExclusionRecordSchema,
  LegalBasisSchema,
  RateAdjustmentSchema,
  RateTableSchema,
  StackingModeSchema,
  ValuePortionSchema,
} from '../schemas/index.js';

export type AuthorityFamily = z.infer<typeof AuthorityFamilySchema>;
export type LegalBasis = z.infer<typeof LegalBasisSchema>;
export type Applicability = z.infer<typeof ApplicabilitySchema>;
export type RateTable = z.infer<typeof RateTableSchema>;
export type StackingMode = z.infer<typeof StackingModeSchema>;
export type ValuePortion = z.infer<typeof ValuePortionSchema>;
export type RateAdjustment = z.infer<typeof RateAdjustmentSchema>;
export type ExclusionCondition = z.infer<typeof ExclusionConditionSchema>;
export type ExclusionRecord = z.infer<typeof ExclusionRecordSchema>;

export type AuthorityRule = z.output<typeof AuthorityRuleSchema>;
export type AuthorityRuleInput = z.input<typeof AuthorityRuleSchema>;
