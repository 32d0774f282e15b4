/**
 * Release manifest verification — detached Ed25519 signatures over the exact
 * manifest bytes, checked against a fixed release public key.
 */

import { createPublicKey, verify as verifySignature } from "node:crypto";
import type { KeyObject } from "node:crypto";
import { z } from "zod";
import { InvalidPublicKeyError, MalformedManifestError } from "../types/errors.js";
import { logger } from "../utils/logger.js";

export const PUBLIC_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

// ── Manifest Schema ─────────────────────────────────────────────────────

const fileEntrySchema = z.object({
  path: z.string().trim().min(1, "File path cannot be blank"),
  sha256: z.string().regex(/^[0-9a-fA-F]{64}$/, "sha256 must be 64 hex characters"),
  size: z.number().int().nonnegative(),
});

const manifestSchema = z.object({
  version: z.string().trim().min(1, "Manifest version is required"),
  files: z.array(fileEntrySchema),
});

export type IManifestFile = z.infer<typeof fileEntrySchema>;
export type IManifest = z.infer<typeof manifestSchema>;

/**
 * Every file entry carries a digest and a byte size; bare paths are rejected.
 */
export function parseManifest(source: string | Uint8Array): IManifest {
  const text = typeof source === "string" ? source : Buffer.from(source).toString("utf-8");

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedManifestError(`not valid JSON: ${message}`, error);
  }

  const result = manifestSchema.safeParse(decoded);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "manifest";
    throw new MalformedManifestError(`${where}: ${issue?.message ?? "invalid"}`, result.error);
  }
  return result.data;
}

/**
 * UTF-8 JSON with `version` first and `files` second. Signers sign these bytes.
 */
export function canonicalManifestBytes(manifest: IManifest): Uint8Array {
  return Buffer.from(JSON.stringify({ version: manifest.version, files: manifest.files }), "utf-8");
}

// ── ManifestVerifier Class ───────────────────────────────────────────────

export class ManifestVerifier {
  private readonly publicKey: KeyObject;

  /**
   * @param releasePublicKey - 32 raw key bytes, or their base64 encoding
   */
  constructor(releasePublicKey: Uint8Array | string) {
    const raw =
      typeof releasePublicKey === "string" ? decodeBase64Strict(releasePublicKey.trim()) : releasePublicKey;
    const length = raw?.length ?? 0;
    if (!raw || length !== PUBLIC_KEY_BYTES) {
      throw new InvalidPublicKeyError(length);
    }

    this.publicKey = createPublicKey({
      key: { kty: "OKP", crv: "Ed25519", x: Buffer.from(raw).toString("base64url") },
      format: "jwk",
    });
  }

  /**
   * False for malformed base64, a signature of the wrong length, or any mismatch.
   */
  verify(manifest: string | Uint8Array, signatureBase64: string): boolean {
    const signature = decodeBase64Strict(signatureBase64.trim());
    if (!signature || signature.length !== SIGNATURE_BYTES) {
      return false;
    }

    const bytes = typeof manifest === "string" ? Buffer.from(manifest, "utf-8") : manifest;
    try {
      return verifySignature(null, bytes, this.publicKey, signature);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ error: message }, "Signature check raised");
      return false;
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Buffer.from(…, "base64") skips invalid characters; reject them instead. */
export function decodeBase64Strict(value: string): Buffer | undefined {
  if (!BASE64_PATTERN.test(value)) {
    return undefined;
  }
  return Buffer.from(value, "base64");
}
