/**
 * Applies a signed skill update: signature → manifest → definition digest →
 * registry. Any failure leaves the registry as it was.
 */

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { ManifestVerificationError, MalformedManifestError } from "../types/errors.js";
import type { RunnerFactory, SkillId } from "../types/skill.js";
import { logger } from "../utils/logger.js";
import type { SkillRegistry } from "../skills/registry.js";
import { parseManifest } from "./manifest-verifier.js";
import type { IManifest, ManifestVerifier } from "./manifest-verifier.js";

export const MANIFEST_FILE_NAME = "manifest.json";
export const SIGNATURE_FILE_NAME = "manifest.sig";

export interface IUpdateBundle {
  readonly manifest: string | Uint8Array;
  readonly signatureBase64: string;
  readonly definition: string | Uint8Array;
  readonly definitionName?: string | undefined;
}

export interface IUpdateResult {
  readonly version: string;
  readonly skillIds: readonly SkillId[];
}

export interface IUpdateApplierOptions {
  readonly verifier: ManifestVerifier;
  readonly registry: SkillRegistry;
  readonly runnerFactory: RunnerFactory;
  readonly definitionName?: string | undefined;
}

export class UpdateApplier {
  private readonly verifier: ManifestVerifier;
  private readonly registry: SkillRegistry;
  private readonly runnerFactory: RunnerFactory;
  private readonly definitionName: string;

  constructor(options: IUpdateApplierOptions) {
    this.verifier = options.verifier;
    this.registry = options.registry;
    this.runnerFactory = options.runnerFactory;
    this.definitionName = options.definitionName ?? "skills.json";
  }

  apply(bundle: IUpdateBundle): IUpdateResult {
    try {
      return this.applyVerified(bundle);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ reason }, "Skill update rejected");
      this.registry.events.emit("update:rejected", { reason });
      throw error;
    }
  }

  /**
   * Read manifest.json, manifest.sig and the definition file from one directory.
   */
  async applyFromDirectory(directory: string): Promise<IUpdateResult> {
    const definitionName = this.definitionName;
    const [manifest, signature, definition] = await Promise.all([
      readBundleFile(join(directory, MANIFEST_FILE_NAME)),
      readBundleFile(join(directory, SIGNATURE_FILE_NAME)),
      readBundleFile(join(directory, definitionName)),
    ]);
    return this.apply({
      manifest,
      signatureBase64: signature.toString("utf-8"),
      definition,
      definitionName,
    });
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private applyVerified(bundle: IUpdateBundle): IUpdateResult {
    if (!this.verifier.verify(bundle.manifest, bundle.signatureBase64)) {
      throw new ManifestVerificationError("signature does not match manifest");
    }

    const manifest = parseSignedManifest(bundle.manifest);
    const definitionName = bundle.definitionName ?? this.definitionName;
    const listed = manifest.files.find(
      (file) => file.path === definitionName || basename(file.path) === definitionName,
    );
    if (!listed) {
      throw new ManifestVerificationError(`${definitionName} is not listed in manifest ${manifest.version}`);
    }

    const definitionBytes =
      typeof bundle.definition === "string" ? Buffer.from(bundle.definition, "utf-8") : bundle.definition;
    if (definitionBytes.byteLength !== listed.size) {
      throw new ManifestVerificationError(
        `${definitionName} size mismatch: expected ${listed.size} bytes, got ${definitionBytes.byteLength}`,
      );
    }
    const digest = createHash("sha256").update(definitionBytes).digest("hex");
    if (digest !== listed.sha256.toLowerCase()) {
      throw new ManifestVerificationError(`${definitionName} digest mismatch`);
    }

    const registrations = this.registry.initializeFromDefinition(
      Buffer.from(definitionBytes).toString("utf-8"),
      this.runnerFactory,
    );
    const skillIds = registrations.map((registration) => registration.id);

    logger.info({ version: manifest.version, skills: skillIds.length }, "Skill update applied");
    this.registry.events.emit("update:applied", { version: manifest.version, skillIds });
    return { version: manifest.version, skillIds };
  }
}

/**
 * Schema failures of an already signed manifest surface as verification failures.
 */
function parseSignedManifest(source: string | Uint8Array): IManifest {
  try {
    return parseManifest(source);
  } catch (error: unknown) {
    if (error instanceof MalformedManifestError) {
      throw new ManifestVerificationError(`signed manifest is unusable: ${error.message}`, error);
    }
    throw error;
  }
}

async function readBundleFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedManifestError(`cannot read ${filePath}: ${message}`, error);
  }
}
