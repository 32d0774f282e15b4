/**
 * Post-processing — turns a raw skill output plus caller metadata into a short
 * English and Simplified Chinese summary.
 */

import type { FeatureVector } from "../types/payload.js";
import type { SkillId } from "../types/skill.js";

export interface ILocalizedSummary {
  readonly english: string;
  readonly zhCN: string;
}

export type SummaryMetadata = Readonly<Record<string, unknown>>;

export type SkillPostProcessor = (output: FeatureVector, metadata: SummaryMetadata) => ILocalizedSummary;

export function asLocaleMap(summary: ILocalizedSummary): Readonly<Record<"en-US" | "zh-CN", string>> {
  return { "en-US": summary.english, "zh-CN": summary.zhCN };
}

// ── Built-in Processors ─────────────────────────────────────────────────

const educationProcessor: SkillPostProcessor = (_output, metadata) => {
  const subject = textField(metadata, "subject") ?? "学习";
  return {
    english: `Personalized study guidance prepared for ${subject}`,
    zhCN: `已为${subject}准备个性化学习指导`,
  };
};

const retailProcessor: SkillPostProcessor = (output, metadata) => {
  const product = textField(metadata, "product") ?? "商品";
  const price = textField(metadata, "price");
  const score = topScore(output).toFixed(2);
  return {
    english: `Retail recommendation for ${product} (score ${score})` + (price ? `, priced at ${price}` : ""),
    zhCN: `推荐${product}，评分${score}` + (price ? `，价格${price}` : ""),
  };
};

const travelProcessor: SkillPostProcessor = (output, metadata) => {
  const destination = textField(metadata, "destination") ?? "旅程";
  const itinerary = textField(metadata, "itinerary");
  const percent = Math.round(clamp01(topScore(output)) * 100);
  return {
    english: `Itinerary generated for ${destination} with ${percent}% confidence` + (itinerary ? `: ${itinerary}` : ""),
    zhCN: `已为${destination}规划行程，置信度${percent}%` + (itinerary ? `：${itinerary}` : ""),
  };
};

function healthProcessor(skillId: SkillId): SkillPostProcessor {
  return (output, metadata) => {
    const label = textField(metadata, "label") ?? skillId;
    const signal = clamp01(topScore(output)).toFixed(2);
    return {
      english: `Health check ${label} finished (signal ${signal}). Not medical advice.`,
      zhCN: `健康检测${label}已完成（信号${signal}），不构成医疗建议`,
    };
  };
}

function defaultProcessor(skillId: SkillId): SkillPostProcessor {
  return (_output, metadata) => ({
    english: textField(metadata, "summary") ?? `Skill ${skillId} completed`,
    zhCN: textField(metadata, "summaryZh") ?? `技能${skillId}已完成`,
  });
}

// ── PostProcessor Class ──────────────────────────────────────────────────

export class PostProcessor {
  private readonly processors: Map<SkillId, SkillPostProcessor> = new Map([
    ["education_assistant", educationProcessor],
    ["retail_helper", retailProcessor],
    ["travel_planner", travelProcessor],
  ]);
  private readonly healthPrefix: string;

  constructor(healthPrefix = "hc_") {
    this.healthPrefix = healthPrefix;
  }

  register(skillId: SkillId, processor: SkillPostProcessor): void {
    this.processors.set(skillId, processor);
  }

  has(skillId: SkillId): boolean {
    return this.processors.has(skillId);
  }

  postProcess(skillId: SkillId, output: FeatureVector, metadata: SummaryMetadata = {}): ILocalizedSummary {
    const processor =
      this.processors.get(skillId) ??
      (skillId.startsWith(this.healthPrefix) ? healthProcessor(skillId) : defaultProcessor(skillId));
    return processor(output, metadata);
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────

function textField(metadata: SummaryMetadata, key: string): string | undefined {
  const value = metadata[key];
  if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
    return undefined;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

function topScore(output: FeatureVector): number {
  return output.length > 0 ? Math.max(...output) : 0;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
