/**
 * Skill runtime shared types — barrel export
 */

export type {
  PayloadValue,
  PayloadKind,
  Payload,
  FeatureVector,
} from "./payload.js";

export { num, text, bool, list, toPayload } from "./payload.js";

export type {
  SkillId,
  SkillKind,
  Awaitable,
  ISkillRunner,
  ISkillDescriptor,
  AnySkillDescriptor,
  VectorSkillDescriptor,
  VectorSkillRunner,
  SkillGuard,
  ISkillRegistration,
  RunnerFactory,
  IRouteSuccess,
  IRouteFailure,
  RouteResult,
  ISkillDefinitionEntry,
  ISkillDefinitionDocument,
} from "./skill.js";

export type {
  ITelemetryConfig,
  IDecisionConfig,
  InferenceBackendName,
  IInferenceConfig,
  IUpdateConfig,
  IRuntimeConfig,
} from "./config.js";

export { DEFAULT_CONFIG, DEFAULT_FEATURE_DIM, DEFAULT_SIGMA_GATES } from "./config.js";

export type {
  TelemetryValue,
  TelemetryAttributes,
  TelemetryMetrics,
  ITelemetryEvent,
} from "./telemetry.js";

export type {
  ErrorCategory,
  IErrorContext,
  LookupError,
  ExecutionError,
  ManifestError,
  AnySkillRuntimeError,
} from "./errors.js";

export {
  SkillRuntimeError,
  SkillNotFoundError,
  SkillTypeMismatchError,
  FeatureBuilderNotFoundError,
  SkillExecutionError,
  FeatureShapeError,
  MalformedDefinitionError,
  ManifestVerificationError,
  MalformedManifestError,
  InvalidPublicKeyError,
  InvalidConfigError,
  categorizeError,
} from "./errors.js";
