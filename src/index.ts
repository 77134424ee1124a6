export { TaxDatabase, type MemberOverlap } from "./domain/rulesets/database.js";
export { loadTaxDatabase, resolveRulesetPaths, type RulesetPaths } from "./domain/rulesets/loader.js";
export { isoRegionValidator, type RegionCodeValidator, type SubdivisionCheck } from "./domain/regions/validator.js";
export {
  aggregateRates,
  applyRates,
  resolveCatalogRegion,
  selectRateEntries,
  selectRateRegion
} from "./domain/tax/aggregator.js";
export { classifyJurisdiction, isAgreementMember } from "./domain/tax/classifier.js";
export {
  ConfigError,
  ProcessingError,
  TaxEngineError,
  ValidationError,
  type TaxEngineErrorCode
} from "./domain/tax/errors.js";
export { DEFAULT_CROSS_BORDER_RULES, resolvePolicy } from "./domain/tax/policy.js";
export { Region } from "./domain/tax/region.js";
export { TaxScenario, toRateLines } from "./domain/tax/scenario.js";
export type * from "./domain/tax/types.js";
