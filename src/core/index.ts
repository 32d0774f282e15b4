/**
 * Core orchestration layer barrel export
 */

export { EventBus } from "./event-bus.js";
export type { IEventMap, EventName } from "./event-bus.js";

export { SkillRouter } from "./skill-router.js";
export type { ISkillRouterOptions } from "./skill-router.js";

export {
  DecisionEngine,
  HEALTH_DISCLAIMER,
  HEALTH_DISCLAIMER_EN,
  HEALTH_DISCLAIMER_ZH,
} from "./decision-engine.js";
export type {
  DecisionAction,
  DecisionMetadata,
  IComplianceDisclaimers,
  IDecisionOutcome,
  IDecisionRequest,
  IMetadataDecisionOutcome,
  IOutcomeMetadata,
} from "./decision-engine.js";

export { PostProcessor, asLocaleMap } from "./post-processor.js";
export type { ILocalizedSummary, SkillPostProcessor, SummaryMetadata } from "./post-processor.js";
