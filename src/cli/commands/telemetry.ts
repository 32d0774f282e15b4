/**
 * Telemetry log inspection.
 */

import { Command } from "commander";
import pc from "picocolors";
import { z } from "zod";
import { TelemetrySink } from "../../telemetry/telemetry-sink.js";
import { EXIT_INTERNAL, errorMessage, loadConfigStore, resolveFlags } from "../flags.js";

interface IShowOptions {
  readonly limit?: string;
}

const limitSchema = z.coerce
  .number({ invalid_type_error: "--limit must be a number" })
  .int("--limit must be a whole number")
  .positive("--limit must be at least 1");

/**
 * Parse the --limit flag; undefined means no limit.
 */
export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const result = limitSchema.safeParse(raw.trim() === "" ? Number.NaN : raw);
  if (!result.success) {
    throw new Error(result.error.issues[0]?.message ?? "--limit is invalid");
  }
  return result.data;
}

function openSink(command: Command): TelemetrySink {
  const config = loadConfigStore(resolveFlags(command)).config;
  return new TelemetrySink({ storageDir: config.telemetry.storageDir });
}

export function createTelemetryCommand(): Command {
  const telemetry = new Command("telemetry").description("Inspect recorded telemetry");

  telemetry
    .command("show")
    .description("Print recorded events, oldest first")
    .option("-n, --limit <count>", "Only the most recent events")
    .action(async (options: IShowOptions, command: Command) => {
      try {
        const limit = parseLimit(options.limit);
        const events = await openSink(command).events();
        const shown = limit !== undefined ? events.slice(-limit) : events;
        for (const event of shown) {
          process.stdout.write(`${pc.dim(event.timestamp)} ${pc.bold(event.event)} ${JSON.stringify(event.attributes)}\n`);
        }
        process.stdout.write(pc.dim(`${shown.length} of ${events.length} events\n`));
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Failed to read telemetry: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  telemetry
    .command("clear")
    .description("Delete all recorded events")
    .action(async (_options: unknown, command: Command) => {
      try {
        await openSink(command).clear();
        process.stdout.write(pc.green("Telemetry cleared\n"));
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Failed to clear telemetry: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  return telemetry;
}
