/**
 * Skill runtime typed error hierarchy.
 * Every error carries a stable code, a user-facing message and a telemetry category.
 */

export type ErrorCategory =
  | "not_found"
  | "type_mismatch"
  | "execution"
  | "feature_shape"
  | "definition"
  | "manifest"
  | "config";

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly cause?: unknown;
}

export abstract class SkillRuntimeError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  abstract readonly category: ErrorCategory;
  diagnosticMessage?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
  }
}

// ── Lookup Errors ────────────────────────────────────────────────────────

export class SkillNotFoundError extends SkillRuntimeError {
  readonly code = "SKILLRT_LOOKUP_SKILL_001" as const;
  readonly category = "not_found" as const;
  readonly userMessage: string;
  readonly skillId: string;

  constructor(skillId: string) {
    super(`Skill not found: ${skillId}`);
    this.skillId = skillId;
    this.userMessage = `Skill "${skillId}" is not registered. Use "skillrt skills list" to see available skills.`;
  }
}

export class SkillTypeMismatchError extends SkillRuntimeError {
  readonly code = "SKILLRT_LOOKUP_TYPE_001" as const;
  readonly category = "type_mismatch" as const;
  readonly userMessage: string;

  constructor(skillId: string, actualKind: string) {
    super(`Skill ${skillId} is registered as a "${actualKind}" skill and cannot serve this request`);
    this.userMessage = `Skill "${skillId}" does not accept this kind of payload.`;
  }
}

export class FeatureBuilderNotFoundError extends SkillRuntimeError {
  readonly code = "SKILLRT_LOOKUP_BUILDER_001" as const;
  readonly category = "not_found" as const;
  readonly userMessage: string;

  constructor(builderName: string) {
    super(`Feature builder not found: ${builderName}`);
    this.userMessage = `Unknown feature builder "${builderName}".`;
  }
}

// ── Execution Errors ─────────────────────────────────────────────────────

export class SkillExecutionError extends SkillRuntimeError {
  readonly code = "SKILLRT_EXEC_RUN_001" as const;
  readonly category = "execution" as const;
  readonly userMessage: string;

  constructor(skillId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Skill ${skillId} failed: ${reason}`, { cause });
    this.userMessage = `Skill "${skillId}" failed to run: ${reason}`;
  }
}

export class FeatureShapeError extends SkillRuntimeError {
  readonly code = "SKILLRT_EXEC_SHAPE_001" as const;
  readonly category = "feature_shape" as const;
  readonly userMessage: string;

  constructor(message: string) {
    super(message);
    this.userMessage = `Invalid feature vector shape: ${message}`;
  }
}

// ── Definition Errors ────────────────────────────────────────────────────

export class MalformedDefinitionError extends SkillRuntimeError {
  readonly code = "SKILLRT_DEF_INVALID_001" as const;
  readonly category = "definition" as const;
  readonly userMessage: string;

  constructor(reason: string, cause?: unknown) {
    super(`Malformed skill definition: ${reason}`, { cause });
    this.userMessage = `The skill definition document is invalid: ${reason}`;
  }
}

// ── Manifest Errors ──────────────────────────────────────────────────────

export class ManifestVerificationError extends SkillRuntimeError {
  readonly code = "SKILLRT_MANIFEST_SIG_001" as const;
  readonly category = "manifest" as const;
  readonly userMessage: string;

  constructor(reason: string, cause?: unknown) {
    super(`Manifest verification failed: ${reason}`, { cause });
    this.userMessage = `Skill update rejected: ${reason}`;
  }
}

export class MalformedManifestError extends SkillRuntimeError {
  readonly code = "SKILLRT_MANIFEST_INVALID_001" as const;
  readonly category = "manifest" as const;
  readonly userMessage: string;

  constructor(reason: string, cause?: unknown) {
    super(`Malformed manifest: ${reason}`, { cause });
    this.userMessage = `The skill update manifest is invalid: ${reason}`;
  }
}

export class InvalidPublicKeyError extends SkillRuntimeError {
  readonly code = "SKILLRT_MANIFEST_KEY_001" as const;
  readonly category = "manifest" as const;
  readonly userMessage: string;

  constructor(actualLength: number) {
    super(`Release public key must be 32 bytes for Ed25519, got ${actualLength}`);
    this.userMessage = "The configured release public key is not a valid Ed25519 key.";
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class InvalidConfigError extends SkillRuntimeError {
  readonly code = "SKILLRT_CONFIG_INVALID_001" as const;
  readonly category = "config" as const;
  readonly userMessage: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.userMessage = `Invalid configuration "${key}": ${reason}`;
  }
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type LookupError =
  | SkillNotFoundError
  | SkillTypeMismatchError
  | FeatureBuilderNotFoundError;

export type ExecutionError =
  | SkillExecutionError
  | FeatureShapeError;

export type ManifestError =
  | ManifestVerificationError
  | MalformedManifestError
  | InvalidPublicKeyError;

export type AnySkillRuntimeError =
  | LookupError
  | ExecutionError
  | MalformedDefinitionError
  | ManifestError
  | InvalidConfigError;

/**
 * Telemetry category for any thrown value.
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof SkillRuntimeError) {
    return error.category;
  }
  return "execution";
}
