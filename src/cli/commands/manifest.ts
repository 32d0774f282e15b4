/**
 * Signed manifest commands: verify a signature, apply an update directory.
 */

import { Command } from "commander";
import { readFile } from "node:fs/promises";
import pc from "picocolors";
import { SkillRuntimeError } from "../../types/errors.js";
import { ManifestVerifier } from "../../updates/manifest-verifier.js";
import { EXIT_INTERNAL, EXIT_NOT_FOUND, errorMessage, loadConfigStore, openRuntime, resolveFlags } from "../flags.js";

interface IKeyOptions {
  readonly key?: string;
}

export function createManifestCommand(): Command {
  const manifest = new Command("manifest").description("Verify and apply signed skill updates");

  manifest
    .command("verify <manifest> <signature>")
    .description("Check a detached base64 signature file against a manifest file")
    .option("-k, --key <base64>", "Release public key (defaults to updates.releasePublicKey)")
    .action(async (manifestPath: string, signaturePath: string, options: IKeyOptions, command: Command) => {
      try {
        const key = options.key ?? loadConfigStore(resolveFlags(command)).config.updates.releasePublicKey;
        if (!key) {
          process.stderr.write(pc.red("No release public key. Pass --key or set updates.releasePublicKey\n"));
          process.exitCode = EXIT_NOT_FOUND;
          return;
        }

        const verifier = new ManifestVerifier(key);
        const [bytes, signature] = await Promise.all([readFile(manifestPath), readFile(signaturePath, "utf-8")]);
        if (verifier.verify(bytes, signature)) {
          process.stdout.write(pc.green("Signature valid\n"));
        } else {
          process.stderr.write(pc.red("Signature invalid\n"));
          process.exitCode = EXIT_NOT_FOUND;
        }
      } catch (error: unknown) {
        process.stderr.write(pc.red(`Verification failed: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  manifest
    .command("apply <directory>")
    .description("Verify manifest.json, manifest.sig and the definition file, then register the skills")
    .action(async (directory: string, _options: unknown, command: Command) => {
      try {
        const runtime = await openRuntime(resolveFlags(command));
        if (!runtime.updates) {
          process.stderr.write(pc.red("Updates are disabled: set updates.releasePublicKey first\n"));
          process.exitCode = EXIT_NOT_FOUND;
          return;
        }

        const result = await runtime.updates.applyFromDirectory(directory);
        process.stdout.write(pc.green(`Applied ${result.version}: ${result.skillIds.join(", ")}\n`));
      } catch (error: unknown) {
        if (error instanceof SkillRuntimeError && error.category === "manifest") {
          process.stderr.write(pc.red(`${error.userMessage}\n`));
          process.exitCode = EXIT_NOT_FOUND;
          return;
        }
        process.stderr.write(pc.red(`Update failed: ${errorMessage(error)}\n`));
        process.exitCode = EXIT_INTERNAL;
      }
    });

  return manifest;
}
