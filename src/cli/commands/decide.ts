/**
 * Sigma-gated decision for a skill confidence.
 */

import { Command } from "commander";
import pc from "picocolors";
import { DecisionEngine } from "../../core/decision-engine.js";
import { EXIT_INTERNAL, errorMessage, loadConfigStore, resolveFlags } from "../flags.js";

interface IDecideOptions {
  readonly message?: string;
  readonly gate?: string;
}

export function createDecideCommand(): Command {
  return new Command("decide")
    .description("Decide whether to ask or proceed for a skill confidence")
    .argument("<skillId>", "Skill the confidence belongs to")
    .argument("<confidence>", "Confidence score")
    .option("-m, --message <text>", "Base message", "")
    .option("-g, --gate <value>", "Override the sigma gate")
    .action((skillId: string, confidenceArg: string, options: IDecideOptions, command: Command) => {
      try {
        const confidence = Number(confidenceArg);
        if (Number.isNaN(confidence)) {
          throw new Error(`confidence must be a number, got "${confidenceArg}"`);
        }

        const config = loadConfigStore(resolveFlags(command)).config;
        const engine = new DecisionEngine(config.decision);

        if (options.gate !== undefined) {
          const gate = Number(options.gate);
          if (Number.isNaN(gate)) {
            throw new Error(`gate must be a number, got "${options.gate}"`);
          }
          const outcome = engine.decideWithMetadata({ id: "cli", skillId, confidence }, gate);
          process.stdout.write(`${JSON.stringify(outcome, null, 2)}\n`);
          return;
        }

        const outcome = engine.decide(skillId, confidence, options.message ?? "");
        const color = outcome.action === "ask" ? pc.yellow : pc.green;
        process.stdout.write(`${color(outcome.action)} (confidence ${confidence}, gate ${outcome.sigmaGate})\n`);
        if (outcome.message.length > 0) {
          process.stdout.write(`${outcome.message}\n`);
        }
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Decision failed: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });
}
