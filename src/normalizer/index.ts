export {
  Normalizer,
  type NormalizeOptions,
  type NormalizationResult,
  type RejectedFact,
} from "./normalizer.js";
export { readProviderLines, factPeriodStart, type ProviderLine } from "./providers.js";
export { mapService, UNMAPPED_SERVICE, type ServiceMapping } from "./catalog.js";
export { resolveTags, CANONICAL_TAGS, type CanonicalTag } from "./tags.js";
export { findRate } from "./currency.js";
