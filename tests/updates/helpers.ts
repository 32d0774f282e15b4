import { generateKeyPairSync, sign } from "node:crypto";
import type { KeyObject } from "node:crypto";

export interface ITestSigner {
  readonly publicKeyBytes: Buffer;
  readonly privateKey: KeyObject;
  sign(message: string | Uint8Array): string;
}

export function createTestSigner(): ITestSigner {
  const { publicKey, privateKey } = generateKeyPairSync("ed25519");
  const { x } = publicKey.export({ format: "jwk" });
  if (typeof x !== "string") {
    throw new Error("Ed25519 JWK export has no x coordinate");
  }

  return {
    publicKeyBytes: Buffer.from(x, "base64url"),
    privateKey,
    sign(message) {
      const bytes = typeof message === "string" ? Buffer.from(message, "utf-8") : message;
      return sign(null, bytes, privateKey).toString("base64");
    },
  };
}
