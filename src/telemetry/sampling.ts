/**
 * Sampling rules — event-name prefix → retention probability.
 */

import { z } from "zod";
import { InvalidConfigError } from "../types/errors.js";

const rateSchema = z.number().min(0, "must be between 0 and 1").max(1, "must be between 0 and 1");

const samplingSchema = z.object({
  defaultRate: rateSchema.default(1),
  rules: z
    .record(z.string().trim().min(1, "Sampling rule names cannot be blank"), rateSchema)
    .default({}),
});

export type SamplingInput = z.input<typeof samplingSchema>;

export type RandomSource = () => number;

export class SamplingConfig {
  readonly defaultRate: number;
  readonly rules: Readonly<Record<string, number>>;

  constructor(input: SamplingInput = {}) {
    const result = samplingSchema.safeParse(input);
    if (!result.success) {
      const issue = result.error.issues[0];
      const key = issue && issue.path.length > 0 ? `telemetry.${issue.path.join(".")}` : "telemetry";
      throw new InvalidConfigError(key, issue?.message ?? "invalid sampling configuration");
    }
    this.defaultRate = result.data.defaultRate;
    this.rules = Object.freeze({ ...result.data.rules });
  }

  /**
   * Rate of the longest rule that prefixes the event name, else the default rate.
   */
  rateFor(event: string): number {
    let bestLength = -1;
    let bestRate: number | undefined;
    for (const [prefix, rate] of Object.entries(this.rules)) {
      if (event.startsWith(prefix) && prefix.length > bestLength) {
        bestLength = prefix.length;
        bestRate = rate;
      }
    }
    return bestRate ?? this.defaultRate;
  }

  shouldSample(event: string, random: RandomSource): boolean {
    const rate = this.rateFor(event);
    if (rate <= 0) return false;
    if (rate >= 1) return true;
    return random() < rate;
  }
}
