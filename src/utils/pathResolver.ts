/**
 * Path layout for runtime state.
 * Everything lives under ~/.skillrt unless SKILLRT_HOME points elsewhere.
 */

import { homedir } from "node:os";
import { join, dirname } from "node:path";
import { existsSync, mkdirSync } from "node:fs";
import { fileURLToPath } from "node:url";

const SKILLRT_HOME = join(homedir(), ".skillrt");

export function getRuntimeHome(): string {
  return process.env["SKILLRT_HOME"] ?? SKILLRT_HOME;
}

export function getConfigPath(): string {
  return join(getRuntimeHome(), "config.json");
}

export function getLogDir(): string {
  return join(getRuntimeHome(), "logs");
}

export function getTelemetryDir(): string {
  return join(getRuntimeHome(), "telemetry");
}

// ── Project-level paths ──────────────────────────────────────────────────

export function getProjectConfigDir(projectRoot: string): string {
  return join(projectRoot, ".skillrt");
}

export function getProjectConfigPath(projectRoot: string): string {
  return join(getProjectConfigDir(projectRoot), "config.json");
}

// ── Bundled assets ───────────────────────────────────────────────────────

/**
 * Definition document shipped next to the skills module (src/ in tests, dist/ once built).
 */
export function getBuiltInDefinitionPath(): string {
  const currentFilePath = fileURLToPath(import.meta.url);
  return join(dirname(currentFilePath), "..", "skills", "built-in", "skills.json");
}

// ── Directory Initialization ─────────────────────────────────────────────

export function ensureDirectory(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: 0o755 });
  }
}
