/**
 * Global CLI flags and the runtime they produce.
 */

import type { Command } from "commander";
import { ConfigStore } from "../storage/config-store.js";
import { createSkillRuntime } from "../runtime.js";
import type { ISkillRuntime } from "../runtime.js";

export interface IGlobalFlags {
  readonly projectRoot: string;
  readonly definitions?: string | undefined;
}

/**
 * Exit codes: 0 ok, 1 not found or rejected, 3 internal error.
 */
export const EXIT_NOT_FOUND = 1;
export const EXIT_INTERNAL = 3;

export function resolveFlags(command: Command): IGlobalFlags {
  const options: Record<string, unknown> = command.optsWithGlobals();
  const projectRoot = options["projectRoot"];
  const definitions = options["definitions"];
  return {
    projectRoot: typeof projectRoot === "string" ? projectRoot : process.cwd(),
    definitions: typeof definitions === "string" ? definitions : undefined,
  };
}

export function loadConfigStore(flags: IGlobalFlags): ConfigStore {
  const store = new ConfigStore();
  store.loadGlobal();
  store.loadProject(flags.projectRoot);
  return store;
}

/**
 * Build and initialize a runtime from global plus project config.
 */
export async function openRuntime(flags: IGlobalFlags): Promise<ISkillRuntime> {
  const config = loadConfigStore(flags).config;
  const runtime = createSkillRuntime({
    config: flags.definitions ? { ...config, definitionPath: flags.definitions } : config,
  });
  await runtime.init();
  return runtime;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
