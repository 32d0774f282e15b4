/**
 * SkillDefinitionLoader — parses JSON or YAML skill definition documents with Zod validation.
 * A document that fails validation is rejected as a whole.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { MalformedDefinitionError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import type { ISkillDefinitionDocument, ISkillDefinitionEntry } from "../types/skill.js";

// ── Zod Schema ──────────────────────────────────────────────────────────

const skillEntrySchema = z.object({
  id: z.string().trim().min(1, "Skill id is required"),
  featureBuilder: z.string().trim().min(1, "Feature builder name is required"),
  triggers: z.array(z.string().trim().min(1, "Triggers cannot be blank")).default([]),
  inputDim: z.number().int().positive().optional(),
  description: z.string().optional(),
});

const definitionDocumentSchema = z.object({
  version: z.string().optional(),
  skills: z.array(skillEntrySchema),
});

// ── SkillDefinitionLoader Class ─────────────────────────────────────────

export class SkillDefinitionLoader {
  async loadFile(filePath: string): Promise<ISkillDefinitionDocument> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedDefinitionError(`cannot read ${filePath}: ${message}`, error);
    }

    logger.debug({ filePath }, "Loading skill definition file");
    return this.parse(raw);
  }

  /**
   * Parse a definition from raw text (JSON is valid YAML) or an already-decoded value.
   */
  parse(source: unknown): ISkillDefinitionDocument {
    let decoded: unknown = source;
    if (typeof source === "string") {
      try {
        decoded = parseYaml(source);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new MalformedDefinitionError(`unparseable document: ${message}`, error);
      }
    }

    const result = definitionDocumentSchema.safeParse(decoded);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join(".") : "document";
      throw new MalformedDefinitionError(`${where}: ${issue?.message ?? "invalid"}`, result.error);
    }

    const skills: ISkillDefinitionEntry[] = [];
    const seen = new Set<string>();
    for (const entry of result.data.skills) {
      if (seen.has(entry.id)) {
        throw new MalformedDefinitionError(`duplicate skill id "${entry.id}"`);
      }
      seen.add(entry.id);
      skills.push({
        id: entry.id,
        featureBuilder: entry.featureBuilder,
        triggers: entry.triggers,
        ...(entry.inputDim !== undefined ? { inputDim: entry.inputDim } : {}),
        ...(entry.description !== undefined ? { description: entry.description } : {}),
      });
    }

    return {
      ...(result.data.version !== undefined ? { version: result.data.version } : {}),
      skills,
    };
  }
}
