#!/usr/bin/env node

/**
 * skillrt — CLI entry point. Commander setup with subcommand routing.
 */

import { Command } from "commander";
import pc from "picocolors";
import { createSkillsCommand } from "./commands/skills.js";
import { createRouteCommand } from "./commands/route.js";
import { createDecideCommand } from "./commands/decide.js";
import { createManifestCommand } from "./commands/manifest.js";
import { createTelemetryCommand } from "./commands/telemetry.js";
import { createConfigCommand } from "./commands/config.js";
import { EXIT_INTERNAL } from "./flags.js";
import { logger } from "../utils/logger.js";

const VERSION = "0.1.0";

function createProgram(): Command {
  const program = new Command()
    .name("skillrt")
    .description("On-device skill runtime: route payloads to skills, gate decisions, verify signed updates")
    .version(VERSION, "-v, --version")
    .option("--project-root <path>", "Directory holding .skillrt/config.json")
    .option("--definitions <path>", "Skill definition document to load instead of the configured one");

  program.addCommand(createSkillsCommand());
  program.addCommand(createRouteCommand());
  program.addCommand(createDecideCommand());
  program.addCommand(createManifestCommand());
  program.addCommand(createTelemetryCommand());
  program.addCommand(createConfigCommand());

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof Error) {
      logger.error({ error: error.message }, "CLI error");
      process.stderr.write(pc.red(`Error: ${error.message}\n`));
    }
    process.exitCode = EXIT_INTERNAL;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(pc.red(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`));
  process.exitCode = EXIT_INTERNAL;
});
