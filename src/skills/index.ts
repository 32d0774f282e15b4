/**
 * Skills system — barrel export.
 */

export { SkillDefinitionLoader } from "./loader.js";
export { SkillRegistry, normalizeTrigger } from "./registry.js";
export type { IDefinitionLoadOptions, ISkillRegistryOptions } from "./registry.js";
export {
  EchoRunner,
  FeatureSkillDescriptor,
  PassThroughDescriptor,
  TextPipelineDescriptor,
  tokenize,
  hashToken,
  isVectorSkill,
  isTextSkill,
  isAnySkill,
} from "./descriptors.js";
