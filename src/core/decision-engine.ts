/**
 * Decision engine — confidence gating against per-skill sigma gates, with
 * regulatory disclaimers for health skills.
 *
 * A confidence equal to the gate meets it. Confidence is not range-checked.
 */

import type { IDecisionConfig } from "../types/config.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { SkillId } from "../types/skill.js";

// ── Disclaimers ─────────────────────────────────────────────────────────

export const HEALTH_DISCLAIMER_EN =
  "This information is for general awareness only and does not constitute medical advice. " +
  "Please consult a healthcare professional for medical concerns.";

export const HEALTH_DISCLAIMER_ZH = "此信息仅供一般参考，不构成医疗建议。如有健康问题，请咨询专业医疗人员。";

export const HEALTH_DISCLAIMER = `${HEALTH_DISCLAIMER_EN}\n${HEALTH_DISCLAIMER_ZH}`;

export interface IComplianceDisclaimers {
  readonly "en-US": readonly string[];
  readonly "zh-CN": readonly string[];
}

const COMPLIANCE_DISCLAIMERS: IComplianceDisclaimers = {
  "en-US": [
    HEALTH_DISCLAIMER_EN,
    "Confidence is below the safety threshold; confirm before acting.",
  ],
  "zh-CN": [HEALTH_DISCLAIMER_ZH, "置信度低于安全阈值，请确认后再执行。"],
};

// ── Types ───────────────────────────────────────────────────────────────

export type DecisionAction = "ask" | "proceed";

export interface IDecisionOutcome {
  readonly action: DecisionAction;
  readonly message: string;
  readonly confidence: number;
  readonly sigmaGate: number;
}

export type DecisionMetadata = Readonly<Record<string, unknown>>;

export interface IDecisionRequest {
  readonly id: string;
  readonly skillId: SkillId;
  readonly confidence: number;
  readonly metadata?: DecisionMetadata | undefined;
}

export interface IOutcomeMetadata {
  readonly [key: string]: unknown;
  readonly sigmaGate: number;
  readonly complianceDisclaimers?: IComplianceDisclaimers | undefined;
}

export interface IMetadataDecisionOutcome {
  readonly id: string;
  readonly skillId: SkillId;
  /** "ask", or the skill id itself when the gate is met. */
  readonly action: string;
  readonly confidence: number;
  readonly sigmaGate: number;
  readonly metadata: IOutcomeMetadata;
}

// ── DecisionEngine Class ─────────────────────────────────────────────────

export class DecisionEngine {
  private readonly config: IDecisionConfig;

  constructor(config: IDecisionConfig = DEFAULT_CONFIG.decision) {
    this.config = config;
  }

  decide(skillId: SkillId, confidence: number, baseMessage = ""): IDecisionOutcome {
    const sigmaGate = this.sigmaGateFor(skillId);
    const action: DecisionAction = confidence < sigmaGate ? "ask" : "proceed";
    const message = this.isHealthSkill(skillId) ? appendDisclaimer(baseMessage) : baseMessage;
    return { action, message, confidence, sigmaGate };
  }

  /**
   * Gate precedence: override argument, then metadata.sigmaGate, then the
   * per-skill gate, then the default. Non-finite gates are skipped.
   */
  decideWithMetadata(request: IDecisionRequest, sigmaGateOverride?: number): IMetadataDecisionOutcome {
    const { complianceDisclaimers: _previous, ...metadata } = request.metadata ?? {};
    const sigmaGate =
      finiteGate(sigmaGateOverride) ?? finiteGate(metadata["sigmaGate"]) ?? this.sigmaGateFor(request.skillId);

    const belowGate = request.confidence < sigmaGate;
    const needsDisclaimers = belowGate && this.isHealthSkill(request.skillId);

    return {
      id: request.id,
      skillId: request.skillId,
      action: belowGate ? "ask" : request.skillId,
      confidence: request.confidence,
      sigmaGate,
      metadata: {
        ...metadata,
        sigmaGate,
        ...(needsDisclaimers ? { complianceDisclaimers: COMPLIANCE_DISCLAIMERS } : {}),
      },
    };
  }

  sigmaGateFor(skillId: SkillId): number {
    return this.config.sigmaGates[skillId] ?? this.config.defaultGate;
  }

  hasSigmaGate(skillId: SkillId): boolean {
    return Object.hasOwn(this.config.sigmaGates, skillId);
  }

  isHealthSkill(skillId: SkillId): boolean {
    return skillId.startsWith(this.config.healthPrefix);
  }
}

function appendDisclaimer(message: string): string {
  return message.length > 0 ? `${message}\n\n${HEALTH_DISCLAIMER}` : HEALTH_DISCLAIMER;
}

function finiteGate(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
