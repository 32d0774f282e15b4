export {
  ManifestVerifier,
  parseManifest,
  canonicalManifestBytes,
  decodeBase64Strict,
  PUBLIC_KEY_BYTES,
  SIGNATURE_BYTES,
} from "./manifest-verifier.js";
export type { IManifest, IManifestFile } from "./manifest-verifier.js";
export { UpdateApplier, MANIFEST_FILE_NAME, SIGNATURE_FILE_NAME } from "./update-applier.js";
export type { IUpdateBundle, IUpdateResult, IUpdateApplierOptions } from "./update-applier.js";
