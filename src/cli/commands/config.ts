/**
 * Configuration management commands.
 */

import { Command } from "commander";
import pc from "picocolors";
import { InvalidConfigError } from "../../types/errors.js";
import { EXIT_INTERNAL, EXIT_NOT_FOUND, errorMessage, loadConfigStore, resolveFlags } from "../flags.js";

export function createConfigCommand(): Command {
  const config = new Command("config").description("Configuration management");

  config
    .command("get [key]")
    .description("Get configuration value (or all if no key)")
    .action((key: string | undefined, _options: unknown, command: Command) => {
      try {
        const store = loadConfigStore(resolveFlags(command));

        if (key) {
          const value = store.get(key);
          if (value === undefined) {
            process.stderr.write(pc.red(`Configuration key not found: ${key}\n`));
            process.exitCode = EXIT_NOT_FOUND;
            return;
          }
          process.stdout.write(`${key} = ${JSON.stringify(value, null, 2)}\n`);
        } else {
          process.stdout.write(JSON.stringify(store.config, null, 2) + "\n");
        }
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Failed to read config: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  config
    .command("set <key> <value>")
    .description("Set a configuration value in the global config")
    .action((key: string, value: string, _options: unknown, command: Command) => {
      try {
        const store = loadConfigStore(resolveFlags(command));
        store.set(key, value);
        process.stdout.write(pc.green(`Set ${key} = ${JSON.stringify(store.get(key))}\n`));
      } catch (error: unknown) {
        if (error instanceof InvalidConfigError) {
          process.stderr.write(pc.red(`${error.userMessage}\n`));
          process.exitCode = EXIT_NOT_FOUND;
          return;
        }
        process.stderr.write(pc.red(`Failed to set config: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  return config;
}
