import { z } from 'zod/v4';
import {
  CalculationLineSchema,
  CalculationResultSchema,
  RateSpecificitySchema,
  ReasonCodeSchema,
  UsageConsumedSchema,
} from '../schemas/index.js';

export type ReasonCode = z.infer<typeof ReasonCodeSchema>;
export type RateSpecificity = z.infer<typeof RateSpecificitySchema>;
export type CalculationLine = z.infer<typeof CalculationLineSchema>;
export type UsageConsumed = z.infer<typeof UsageConsumedSchema>;
export type CalculationResult = z.infer<typeof CalculationResultSchema>;
