export {
  applicabilityMatch,
  buildRuleCatalog,
  compareByPrecedence,
  type RuleCatalog,
} from './modules/catalog/services/build-catalog.js';
export { loadRuleCatalog, parseRuleCatalog } from './modules/catalog/services/load-catalog.js';
export {
  lookupRate,
  resolveRate,
  type ResolvedRate,
} from './modules/rates/services/resolve-rate.js';
export {
  domesticContentShareApplies,
  dutiableValueFor,
  grossDutiableValueFor,
  splitValue,
  valuePortionLabel,
  type ValueSplit,
} from './modules/value-split/services/split-value.js';
export {
  evaluateExemption,
  type ExclusionDenial,
  type ExemptionOutcome,
} from './modules/exemptions/services/evaluate-exemption.js';
export {
  computeStacking,
  DE_MINIMIS_THRESHOLD_INCLUSIVE,
  type StackingOptions,
} from './modules/stacking/services/compute-stacking.js';
export { computeForCandidates } from './modules/stacking/services/compute-for-candidates.js';
export {
  requiredFacts,
  type FactField,
  type RequiredFact,
} from './modules/facts/services/required-facts.js';
export {
  CatalogError,
  EngineError,
  errorResponse,
  errorResponseFor,
  NoRateDefinedError,
  ValidationError,
} from './lib/errors.js';
export { createLogger, type Logger } from './lib/logger.js';
export { validateEngineEnv, type EngineEnv } from './lib/env.js';
