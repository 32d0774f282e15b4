/**
 * Route a payload to a skill by id or trigger phrase.
 */

import { Command } from "commander";
import pc from "picocolors";
import { toPayload } from "../../types/payload.js";
import type { Payload } from "../../types/payload.js";
import { SkillNotFoundError, SkillRuntimeError } from "../../types/errors.js";
import { EXIT_INTERNAL, EXIT_NOT_FOUND, errorMessage, openRuntime, resolveFlags } from "../flags.js";

interface IRouteOptions {
  readonly payload?: string;
  readonly trigger?: string;
  readonly summary?: string;
}

export function createRouteCommand(): Command {
  return new Command("route")
    .description("Route a JSON payload to a skill and print the output vector")
    .argument("[skillId]", "Skill to run")
    .option("-p, --payload <json>", "Payload as a JSON object", "{}")
    .option("-t, --trigger <phrase>", "Resolve the skill from a trigger phrase")
    .option("-s, --summary <json>", "Metadata for the localized summary, as a JSON object")
    .action(async (skillId: string | undefined, options: IRouteOptions, command: Command) => {
      if (!skillId && !options.trigger) {
        process.stderr.write(pc.red("Specify a skill id or --trigger <phrase>\n"));
        process.exitCode = EXIT_NOT_FOUND;
        return;
      }

      try {
        const payload = parsePayload(options.payload ?? "{}");
        const runtime = await openRuntime(resolveFlags(command));
        const result = skillId
          ? await runtime.router.routeSkill(skillId, payload)
          : await runtime.router.routeByTrigger(options.trigger ?? "", payload);

        if (!result.ok) {
          const cause = result.error;
          const message = cause instanceof SkillRuntimeError ? cause.userMessage : cause.message;
          process.stderr.write(pc.red(`${message}\n`));
          process.exitCode = cause instanceof SkillNotFoundError ? EXIT_NOT_FOUND : EXIT_INTERNAL;
          return;
        }

        process.stdout.write(pc.green(`${result.skillId} ok in ${result.durationMs.toFixed(1)}ms\n`));
        process.stdout.write(`${JSON.stringify(result.value)}\n`);

        const metadata = parseObject(options.summary ?? "{}", "--summary");
        const summary = runtime.postProcessor.postProcess(result.skillId, result.value, metadata);
        process.stdout.write(`${summary.english}\n${summary.zhCN}\n`);
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Route failed: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });
}

function parsePayload(raw: string): Payload {
  return toPayload(parseObject(raw, "--payload"));
}

function parseObject(raw: string, flag: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`${flag} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}
