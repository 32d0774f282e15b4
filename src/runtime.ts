/**
 * Composition root — builds one runtime's object graph. Nothing here is a
 * module-level singleton; every caller owns what it creates.
 */

import { DEFAULT_CONFIG } from "./types/config.js";
import type { IRuntimeConfig } from "./types/config.js";
import { EventBus } from "./core/event-bus.js";
import { SkillRouter } from "./core/skill-router.js";
import { DecisionEngine } from "./core/decision-engine.js";
import { PostProcessor } from "./core/post-processor.js";
import { createDefaultFeatureBuilders } from "./features/registry.js";
import type { FeatureBuilderRegistry } from "./features/registry.js";
import { SkillRegistry } from "./skills/registry.js";
import { InferenceHub } from "./inference/hub.js";
import { createBackendFactory } from "./inference/backends.js";
import type { BackendFactory } from "./inference/backends.js";
import { TelemetrySink } from "./telemetry/telemetry-sink.js";
import { SamplingConfig } from "./telemetry/sampling.js";
import type { RandomSource } from "./telemetry/sampling.js";
import { ManifestVerifier } from "./updates/manifest-verifier.js";
import { UpdateApplier } from "./updates/update-applier.js";
import { logger } from "./utils/logger.js";

export interface ISkillRuntimeOptions {
  readonly config?: IRuntimeConfig | undefined;
  readonly backendFactory?: BackendFactory | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly random?: RandomSource | undefined;
}

export interface ISkillRuntime {
  readonly config: IRuntimeConfig;
  readonly events: EventBus;
  readonly featureBuilders: FeatureBuilderRegistry;
  readonly registry: SkillRegistry;
  readonly hub: InferenceHub;
  readonly router: SkillRouter;
  readonly decisions: DecisionEngine;
  readonly postProcessor: PostProcessor;
  readonly telemetry: TelemetrySink;
  /** Present only when a release public key is configured. */
  readonly updates: UpdateApplier | undefined;
  init(): Promise<void>;
}

export function createSkillRuntime(options: ISkillRuntimeOptions = {}): ISkillRuntime {
  const config = options.config ?? DEFAULT_CONFIG;
  const events = new EventBus();
  const featureBuilders = createDefaultFeatureBuilders();

  const registry = new SkillRegistry({
    featureBuilders,
    defaultInputDim: config.featureDim,
    events,
  });

  const hub = new InferenceHub({
    registry,
    backendFactory: options.backendFactory ?? createBackendFactory(config.inference.backend),
    outputDim: config.inference.outputDim,
    definitionPath: config.definitionPath,
  });

  const telemetry = new TelemetrySink({
    storageDir: config.telemetry.storageDir,
    enabled: config.telemetry.enabled,
    sampling: new SamplingConfig({
      defaultRate: config.telemetry.defaultRate,
      rules: config.telemetry.rules,
    }),
    clock: options.clock,
    random: options.random,
  });

  const releaseKey = config.updates.releasePublicKey;
  const updates =
    releaseKey !== undefined
      ? new UpdateApplier({
          verifier: new ManifestVerifier(releaseKey),
          registry,
          runnerFactory: hub.runnerFactory,
          definitionName: config.updates.definitionName,
        })
      : undefined;

  logger.debug(
    { backend: config.inference.backend, featureDim: config.featureDim, updates: updates !== undefined },
    "Skill runtime created",
  );

  return {
    config,
    events,
    featureBuilders,
    registry,
    hub,
    router: new SkillRouter({ registry, telemetry }),
    decisions: new DecisionEngine(config.decision),
    postProcessor: new PostProcessor(config.decision.healthPrefix),
    telemetry,
    updates,
    init: () => hub.init(),
  };
}
