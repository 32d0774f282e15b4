/**
 * Runtime configuration types.
 */

// ── Telemetry Configuration ──────────────────────────────────────────────

export interface ITelemetryConfig {
  readonly enabled: boolean;
  readonly defaultRate: number;
  readonly rules: Readonly<Record<string, number>>;
  readonly storageDir?: string | undefined;
}

// ── Decision Configuration ───────────────────────────────────────────────

export interface IDecisionConfig {
  readonly defaultGate: number;
  readonly healthPrefix: string;
  readonly sigmaGates: Readonly<Record<string, number>>;
}

// ── Inference Configuration ──────────────────────────────────────────────

export type InferenceBackendName = "echo" | "offset";

export interface IInferenceConfig {
  readonly backend: InferenceBackendName;
  readonly outputDim?: number | undefined;
}

// ── Update Configuration ─────────────────────────────────────────────────

export interface IUpdateConfig {
  readonly releasePublicKey?: string | undefined;
  readonly definitionName: string;
}

// ── Global Configuration ─────────────────────────────────────────────────

export interface IRuntimeConfig {
  readonly version: string;
  readonly featureDim: number;
  readonly definitionPath?: string | undefined;
  readonly telemetry: ITelemetryConfig;
  readonly decision: IDecisionConfig;
  readonly inference: IInferenceConfig;
  readonly updates: IUpdateConfig;
}

// ── Default Configuration ────────────────────────────────────────────────

export const DEFAULT_FEATURE_DIM = 64;

export const DEFAULT_SIGMA_GATES: Readonly<Record<string, number>> = {
  hc_gait_guard: 0.82,
  hc_med_sentinel: 0.88,
  hc_sun_hydro: 0.78,
};

export const DEFAULT_CONFIG: IRuntimeConfig = {
  version: "1.0.0",
  featureDim: DEFAULT_FEATURE_DIM,
  telemetry: {
    enabled: true,
    defaultRate: 1,
    rules: {},
  },
  decision: {
    defaultGate: 0.5,
    healthPrefix: "hc_",
    sigmaGates: DEFAULT_SIGMA_GATES,
  },
  inference: {
    backend: "echo",
  },
  updates: {
    definitionName: "skills.json",
  },
};
