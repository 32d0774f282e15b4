/**
 * TelemetrySink — sampled, append-only JSON-lines event log.
 */

import { appendFile, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import type {
  ITelemetryEvent,
  TelemetryAttributes,
  TelemetryMetrics,
  TelemetryValue,
} from "../types/telemetry.js";
import type { ErrorCategory } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { AsyncMutex } from "../utils/mutex.js";
import { ensureDirectory, getTelemetryDir } from "../utils/pathResolver.js";
import { SamplingConfig } from "./sampling.js";
import type { RandomSource } from "./sampling.js";

export const EVENTS_FILE_NAME = "events.jsonl";
export const SHARE_IN_EVENT = "share_in.funnel";
export const TTS_EVENT = "tts.performance";
export const ROUTER_SUCCESS_PREFIX = "router.success";
export const ROUTER_FAILURE_PREFIX = "router.failure";

export interface ITelemetrySinkOptions {
  readonly storageDir?: string | undefined;
  readonly sampling?: SamplingConfig | undefined;
  readonly enabled?: boolean | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly random?: RandomSource | undefined;
}

export class TelemetrySink {
  readonly storageDir: string;
  readonly filePath: string;
  readonly enabled: boolean;
  private readonly sampling: SamplingConfig;
  private readonly clock: () => Date;
  private readonly random: RandomSource;
  private readonly mutex = new AsyncMutex();

  constructor(options: ITelemetrySinkOptions = {}) {
    this.storageDir = options.storageDir ?? getTelemetryDir();
    this.filePath = join(this.storageDir, EVENTS_FILE_NAME);
    this.enabled = options.enabled ?? true;
    this.sampling = options.sampling ?? new SamplingConfig();
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  /**
   * Resolves true when the event was persisted, false when sampled out or disabled.
   */
  async record(
    event: string,
    attributes: TelemetryAttributes = {},
    metrics: TelemetryMetrics = {},
  ): Promise<boolean> {
    if (!this.enabled || !this.sampling.shouldSample(event, this.random)) {
      return false;
    }

    const record: ITelemetryEvent = {
      timestamp: this.clock().toISOString(),
      event,
      attributes,
      metrics,
    };
    const line = `${JSON.stringify(record)}\n`;

    await this.mutex.runExclusive(async () => {
      ensureDirectory(this.storageDir);
      await appendFile(this.filePath, line, "utf-8");
    });
    return true;
  }

  // ── Convenience Wrappers ─────────────────────────────────────────────

  recordShareInEvent(stage: string, attributes: TelemetryAttributes = {}): Promise<boolean> {
    return this.record(SHARE_IN_EVENT, { ...attributes, stage });
  }

  recordRouterSuccess(skillId: string, durationMs: number): Promise<boolean> {
    return this.record(
      `${ROUTER_SUCCESS_PREFIX}.${skillId}`,
      { skill: skillId, outcome: "success" },
      { "router.success": 1, "router.failure": 0, durationMs },
    );
  }

  recordRouterFailure(
    skillId: string,
    error: Error,
    category: ErrorCategory,
    durationMs: number,
  ): Promise<boolean> {
    return this.record(
      `${ROUTER_FAILURE_PREFIX}.${skillId}`,
      {
        skill: skillId,
        outcome: "failure",
        errorCategory: category,
        error: error.message.length > 0 ? error.message : error.name,
      },
      { "router.success": 0, "router.failure": 1, durationMs },
    );
  }

  recordTts(durationMs: number, characters: number, success: boolean): Promise<boolean> {
    return this.record(
      TTS_EVENT,
      { success },
      { "tts.ms": Math.max(0, durationMs), "tts.characters": Math.max(0, characters) },
    );
  }

  // ── Inspection ───────────────────────────────────────────────────────

  /**
   * Persisted events in insertion order. Lines that fail to parse are skipped.
   */
  async events(): Promise<readonly ITelemetryEvent[]> {
    return this.mutex.runExclusive(async () => {
      if (!existsSync(this.filePath)) {
        return [];
      }
      const raw = await readFile(this.filePath, "utf-8");
      const events: ITelemetryEvent[] = [];
      for (const line of raw.split("\n")) {
        if (line.trim().length === 0) continue;
        const parsed = parseEventLine(line);
        if (parsed) {
          events.push(parsed);
        } else {
          logger.warn({ file: this.filePath }, "Skipping unreadable telemetry line");
        }
      }
      return events;
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (existsSync(this.filePath)) {
        await writeFile(this.filePath, "", "utf-8");
      }
    });
  }
}

// ── Parsing ──────────────────────────────────────────────────────────────

function parseEventLine(line: string): ITelemetryEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(value)) return undefined;

  const { timestamp, event, attributes, metrics } = value;
  if (typeof timestamp !== "string" || typeof event !== "string") return undefined;

  return {
    timestamp,
    event,
    attributes: isRecord(attributes) ? pickValues(attributes, isTelemetryValue) : {},
    metrics: isRecord(metrics) ? pickValues(metrics, isNumber) : {},
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTelemetryValue(value: unknown): value is TelemetryValue {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

function pickValues<T>(source: Record<string, unknown>, guard: (value: unknown) => value is T): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(source)) {
    if (guard(value)) result[key] = value;
  }
  return result;
}
