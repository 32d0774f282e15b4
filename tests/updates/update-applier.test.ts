import { describe, it, expect, vi } from "vitest";
import { createHash } from "node:crypto";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ManifestVerifier } from "../../src/updates/manifest-verifier.js";
import { UpdateApplier } from "../../src/updates/update-applier.js";
import { SkillRegistry } from "../../src/skills/registry.js";
import { ManifestVerificationError, MalformedManifestError } from "../../src/types/errors.js";
import type { FeatureVector } from "../../src/types/payload.js";
import { createTestSigner } from "./helpers.js";

const DEFINITION = JSON.stringify({
  version: "2.0.0",
  skills: [
    { id: "travel_planner", featureBuilder: "travel", triggers: ["trip"] },
    { id: "energy_monitor", featureBuilder: "energy", triggers: ["grid"] },
  ],
});

const FORGED_DEFINITION = JSON.stringify({
  skills: [{ id: "hc_gait_guard", featureBuilder: "retail", triggers: ["anything"] }],
});

function fileEntry(content: string, path = "skills.json") {
  return {
    path,
    sha256: createHash("sha256").update(content, "utf-8").digest("hex"),
    size: Buffer.byteLength(content, "utf-8"),
  };
}

function setup() {
  const signer = createTestSigner();
  const registry = new SkillRegistry();
  const applier = new UpdateApplier({
    verifier: new ManifestVerifier(signer.publicKeyBytes),
    registry,
    runnerFactory: () => ({ runSkill: (features: FeatureVector) => features }),
  });
  return { signer, registry, applier };
}

describe("UpdateApplier.apply", () => {
  it("registers the skills of a signed definition", () => {
    const { signer, registry, applier } = setup();
    const applied = vi.fn();
    registry.events.on("update:applied", applied);
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION, "skills/skills.json")] });

    const result = applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: DEFINITION });

    expect(result).toEqual({ version: "2.0.0", skillIds: ["travel_planner", "energy_monitor"] });
    expect(registry.resolveTrigger("grid")).toBe("energy_monitor");
    expect(applied).toHaveBeenCalledWith({ version: "2.0.0", skillIds: ["travel_planner", "energy_monitor"] });
  });

  it("refuses a signed manifest that lists the definition without a digest", () => {
    const { signer, registry, applier } = setup();
    const manifest = JSON.stringify({ version: "2.0.0", files: ["skills.json"] });

    expect(() =>
      applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: FORGED_DEFINITION }),
    ).toThrow(ManifestVerificationError);
    expect(registry.isRegistered("hc_gait_guard")).toBe(false);
  });

  it("refuses a described entry that omits the digest", () => {
    const { signer, registry, applier } = setup();
    const { path, size } = fileEntry(FORGED_DEFINITION);
    const manifest = JSON.stringify({ version: "2.0.0", files: [{ path, size }] });

    expect(() =>
      applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: FORGED_DEFINITION }),
    ).toThrow("Manifest verification failed: signed manifest is unusable: Malformed manifest: files.0.sha256: Required");
    expect(registry.size).toBe(0);
  });

  it("leaves the registry untouched when the signature is bad", () => {
    const { signer, registry, applier } = setup();
    const rejected = vi.fn();
    registry.events.on("update:rejected", rejected);
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION)] });
    const forged = JSON.stringify({ version: "6.6.6", files: [fileEntry(DEFINITION)] });

    expect(() =>
      applier.apply({ manifest: forged, signatureBase64: signer.sign(manifest), definition: DEFINITION }),
    ).toThrow(ManifestVerificationError);
    expect(registry.size).toBe(0);
    expect(rejected).toHaveBeenCalledWith({
      reason: "Manifest verification failed: signature does not match manifest",
    });
  });

  it("rejects definition bytes that differ from the signed digest", () => {
    const { signer, registry, applier } = setup();
    // Same length as the signed definition, different content.
    const swapped = DEFINITION.replace("trip", "tour");
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION)] });

    expect(() =>
      applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: swapped }),
    ).toThrow("Manifest verification failed: skills.json digest mismatch");
    expect(registry.size).toBe(0);
  });

  it("rejects definition bytes whose size differs from the signed size", () => {
    const { signer, registry, applier } = setup();
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION)] });
    const grown = `${DEFINITION}\n`;

    expect(() => applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: grown })).toThrow(
      `Manifest verification failed: skills.json size mismatch: expected ${DEFINITION.length} bytes, got ${DEFINITION.length + 1}`,
    );
    expect(registry.size).toBe(0);
  });

  it("rejects a definition the manifest does not list", () => {
    const { signer, applier } = setup();
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry("# readme", "README.md")] });

    expect(() =>
      applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: DEFINITION }),
    ).toThrow("Manifest verification failed: skills.json is not listed in manifest 2.0.0");
  });

  it("replaces existing registrations of the same id", () => {
    const { signer, registry, applier } = setup();
    registry.initializeFromDefinition(
      { skills: [{ id: "travel_planner", featureBuilder: "travel", triggers: ["journey"] }] },
      () => ({ runSkill: (features: FeatureVector) => features }),
    );
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION)] });

    applier.apply({ manifest, signatureBase64: signer.sign(manifest), definition: DEFINITION });

    expect(registry.resolveTrigger("journey")).toBeUndefined();
    expect(registry.resolveTrigger("trip")).toBe("travel_planner");
  });
});

describe("UpdateApplier.applyFromDirectory", () => {
  it("reads the manifest, signature and definition from disk", async () => {
    const { signer, registry, applier } = setup();
    const directory = mkdtempSync(join(tmpdir(), "skillrt-update-"));
    const manifest = JSON.stringify({ version: "2.0.0", files: [fileEntry(DEFINITION)] });
    writeFileSync(join(directory, "manifest.json"), manifest);
    writeFileSync(join(directory, "manifest.sig"), `${signer.sign(manifest)}\n`);
    writeFileSync(join(directory, "skills.json"), DEFINITION);

    await expect(applier.applyFromDirectory(directory)).resolves.toEqual({
      version: "2.0.0",
      skillIds: ["travel_planner", "energy_monitor"],
    });
    expect(registry.isRegistered("energy_monitor")).toBe(true);
  });

  it("fails with MalformedManifestError when a file is missing", async () => {
    const { applier } = setup();
    const directory = mkdtempSync(join(tmpdir(), "skillrt-update-"));

    await expect(applier.applyFromDirectory(directory)).rejects.toBeInstanceOf(MalformedManifestError);
  });
});
