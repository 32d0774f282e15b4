/**
 * Skill inventory commands.
 */

import { Command } from "commander";
import pc from "picocolors";
import { FeatureSkillDescriptor } from "../../skills/descriptors.js";
import { EXIT_INTERNAL, errorMessage, openRuntime, resolveFlags } from "../flags.js";

export function createSkillsCommand(): Command {
  const skills = new Command("skills").description("Inspect registered skills");

  skills
    .command("list")
    .description("List registered skills with their triggers")
    .action(async (_options: unknown, command: Command) => {
      try {
        const runtime = await openRuntime(resolveFlags(command));
        for (const registration of runtime.registry.registrations()) {
          const descriptor = registration.descriptor;
          const builder = descriptor instanceof FeatureSkillDescriptor ? descriptor.builderName : descriptor.kind;
          const gate = runtime.decisions.sigmaGateFor(registration.id);
          process.stdout.write(
            `${pc.bold(registration.id)}  ${pc.dim(builder)}  gate=${gate}  ${pc.cyan(registration.triggers.join(", "))}\n`,
          );
        }
        process.stdout.write(pc.dim(`${runtime.registry.size} skills\n`));
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Failed to list skills: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  skills
    .command("triggers")
    .description("List trigger phrases and the skills they resolve to")
    .action(async (_options: unknown, command: Command) => {
      try {
        const runtime = await openRuntime(resolveFlags(command));
        const triggers = [...runtime.registry.listTriggers()].sort();
        for (const trigger of triggers) {
          const ids = [...runtime.registry.findSkillIdsForTrigger(trigger)];
          process.stdout.write(`${pc.cyan(trigger)} → ${ids.join(", ")}\n`);
        }
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Failed to list triggers: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  return skills;
}
