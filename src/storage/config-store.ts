/**
 * Configuration store.
 * Loads/saves global and project config with Zod validation.
 * Merges project config over global config over built-in defaults.
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { getConfigPath, getProjectConfigPath, ensureDirectory } from "../utils/pathResolver.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { IRuntimeConfig } from "../types/config.js";
import { InvalidConfigError } from "../types/errors.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const RateSchema = z.number().min(0).max(1);

const TelemetryConfigSchema = z
  .object({
    enabled: z.boolean(),
    defaultRate: RateSchema,
    rules: z.record(z.string().min(1), RateSchema),
    storageDir: z.string().min(1),
  })
  .partial()
  .strict();

const DecisionConfigSchema = z
  .object({
    defaultGate: z.number(),
    healthPrefix: z.string().min(1),
    sigmaGates: z.record(z.string().min(1), z.number()),
  })
  .partial()
  .strict();

const InferenceConfigSchema = z
  .object({
    backend: z.enum(["echo", "offset"]),
    outputDim: z.number().int().positive(),
  })
  .partial()
  .strict();

const UpdateConfigSchema = z
  .object({
    releasePublicKey: z.string().min(1),
    definitionName: z.string().min(1),
  })
  .partial()
  .strict();

const ConfigOverlaySchema = z
  .object({
    version: z.string(),
    featureDim: z.number().int().positive(),
    definitionPath: z.string().min(1),
    telemetry: TelemetryConfigSchema,
    decision: DecisionConfigSchema,
    inference: InferenceConfigSchema,
    updates: UpdateConfigSchema,
  })
  .partial()
  .strict();

export type ConfigOverlay = z.infer<typeof ConfigOverlaySchema>;

// ── ConfigStore Class ────────────────────────────────────────────────────

export class ConfigStore {
  private readonly configPath: string;
  private globalOverlay: ConfigOverlay = {};
  private projectOverlay: ConfigOverlay | undefined;
  private mergedConfig: IRuntimeConfig = DEFAULT_CONFIG;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getConfigPath();
  }

  get config(): IRuntimeConfig {
    return this.mergedConfig;
  }

  get path(): string {
    return this.configPath;
  }

  loadGlobal(): IRuntimeConfig {
    this.globalOverlay = readOverlay(this.configPath, "Global") ?? {};
    this.rebuildMergedConfig();
    return this.mergedConfig;
  }

  loadProject(projectRoot: string): IRuntimeConfig {
    this.projectOverlay = readOverlay(getProjectConfigPath(projectRoot), "Project");
    this.rebuildMergedConfig();
    return this.mergedConfig;
  }

  saveGlobal(overlay?: ConfigOverlay): void {
    const toSave = overlay ?? this.globalOverlay;

    ensureDirectory(dirname(this.configPath));
    writeFileSync(this.configPath, JSON.stringify(toSave, null, 2), { encoding: "utf-8", mode: 0o600 });
    chmodSync(this.configPath, 0o600);
    logger.info({ path: this.configPath }, "Global config saved");

    this.globalOverlay = toSave;
    this.rebuildMergedConfig();
  }

  /**
   * Read a dotted key such as "telemetry.defaultRate" from the merged config.
   */
  get(key: string): unknown {
    let current: unknown = this.mergedConfig;
    for (const segment of key.split(".")) {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
    return current;
  }

  /**
   * Set a dotted key in the global config and persist it. The raw value is
   * parsed as JSON when possible, else kept as a string.
   */
  set(key: string, rawValue: string): IRuntimeConfig {
    const segments = key.split(".").filter((segment) => segment.length > 0);
    if (segments.length === 0) {
      throw new InvalidConfigError(key, "key is empty");
    }

    const candidate = withPath(this.globalOverlay, segments, parseValue(rawValue));
    const validated = ConfigOverlaySchema.safeParse(candidate);
    if (!validated.success) {
      throw new InvalidConfigError(key, validated.error.issues[0]?.message ?? "invalid value");
    }

    this.saveGlobal(validated.data);
    return this.mergedConfig;
  }

  private rebuildMergedConfig(): void {
    const withGlobal = mergeConfig(DEFAULT_CONFIG, this.globalOverlay);
    this.mergedConfig = this.projectOverlay ? mergeConfig(withGlobal, this.projectOverlay) : withGlobal;
  }
}

// ── Merging ──────────────────────────────────────────────────────────────

export function mergeConfig(base: IRuntimeConfig, overlay: ConfigOverlay): IRuntimeConfig {
  return {
    version: overlay.version ?? base.version,
    featureDim: overlay.featureDim ?? base.featureDim,
    definitionPath: overlay.definitionPath ?? base.definitionPath,
    telemetry: {
      enabled: overlay.telemetry?.enabled ?? base.telemetry.enabled,
      defaultRate: overlay.telemetry?.defaultRate ?? base.telemetry.defaultRate,
      rules: { ...base.telemetry.rules, ...overlay.telemetry?.rules },
      storageDir: overlay.telemetry?.storageDir ?? base.telemetry.storageDir,
    },
    decision: {
      defaultGate: overlay.decision?.defaultGate ?? base.decision.defaultGate,
      healthPrefix: overlay.decision?.healthPrefix ?? base.decision.healthPrefix,
      sigmaGates: { ...base.decision.sigmaGates, ...overlay.decision?.sigmaGates },
    },
    inference: {
      backend: overlay.inference?.backend ?? base.inference.backend,
      outputDim: overlay.inference?.outputDim ?? base.inference.outputDim,
    },
    updates: {
      releasePublicKey: overlay.updates?.releasePublicKey ?? base.updates.releasePublicKey,
      definitionName: overlay.updates?.definitionName ?? base.updates.definitionName,
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────────────────

function readOverlay(filePath: string, label: string): ConfigOverlay | undefined {
  if (!existsSync(filePath)) {
    logger.debug({ path: filePath }, `${label} config not found, using defaults`);
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ path: filePath, error: message }, `${label} config is not valid JSON, ignoring`);
    return undefined;
  }

  const validated = ConfigOverlaySchema.safeParse(parsed);
  if (!validated.success) {
    logger.warn({ path: filePath, errors: validated.error.issues }, `${label} config validation failed, ignoring`);
    return undefined;
  }

  logger.info({ path: filePath }, `${label} config loaded`);
  return validated.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withPath(target: Record<string, unknown>, segments: readonly string[], value: unknown): Record<string, unknown> {
  const [head, ...rest] = segments;
  if (head === undefined) return target;
  if (rest.length === 0) return { ...target, [head]: value };

  const child = target[head];
  return { ...target, [head]: withPath(isRecord(child) ? child : {}, rest, value) };
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
