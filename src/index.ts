/**
 * Skill runtime — public API surface for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

export * from "./types/index.js";

// ── Runtime ─────────────────────────────────────────────────────────────

export { createSkillRuntime } from "./runtime.js";
export type { ISkillRuntime, ISkillRuntimeOptions } from "./runtime.js";

// ── Features ────────────────────────────────────────────────────────────

export * from "./features/index.js";

// ── Skills ──────────────────────────────────────────────────────────────

export * from "./skills/index.js";

// ── Inference ───────────────────────────────────────────────────────────

export * from "./inference/index.js";

// ── Core ────────────────────────────────────────────────────────────────

export * from "./core/index.js";

// ── Telemetry ───────────────────────────────────────────────────────────

export * from "./telemetry/index.js";

// ── Updates ─────────────────────────────────────────────────────────────

export * from "./updates/index.js";

// ── Storage ─────────────────────────────────────────────────────────────

export { ConfigStore, mergeConfig } from "./storage/config-store.js";
export type { ConfigOverlay } from "./storage/config-store.js";
