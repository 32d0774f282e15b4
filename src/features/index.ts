/**
 * Feature builders — barrel export.
 */

export type { IFeatureBuilder } from "./builders.js";
export {
  BUILT_IN_BUILDERS,
  educationBuilder,
  retailBuilder,
  travelBuilder,
  healthBuilder,
  financeBuilder,
  hospitalityBuilder,
  logisticsBuilder,
  manufacturingBuilder,
  agricultureBuilder,
  energyBuilder,
  securityBuilder,
  entertainmentBuilder,
} from "./builders.js";
export { FeatureBuilderRegistry, createDefaultFeatureBuilders } from "./registry.js";
export {
  composeVector,
  normalize,
  ratio,
  delta,
  normalizedCount,
  normalizedLength,
  keywordFeats,
  linearFeats,
  boolFlag,
  readNumber,
  readString,
  readText,
  collectionSize,
} from "./signals.js";
