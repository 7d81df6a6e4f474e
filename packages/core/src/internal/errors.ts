import type { ChangeRecord } from "../policy/types.js";
import type { StageId } from "../pipeline/handler.js";

export type VerificationErrorKind =
  | "CONFIGURATION"
  | "INFRASTRUCTURE"
  | "PERMISSION_MISMATCH"
  | "PROTOCOL";

export interface VerificationErrorOptions {
  kind: VerificationErrorKind;
  code: string;
  message?: string;
  /** Dotted path of the offending configuration field, when there is one. */
  field?: string;
  details?: unknown;
  cause?: unknown;
}

export class VerificationError extends Error {
  readonly kind: VerificationErrorKind;
  readonly code: string;
  readonly field?: string;
  readonly details?: unknown;

  constructor(opts: VerificationErrorOptions) {
    super(opts.message ?? opts.code, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "VerificationError";
    this.kind = opts.kind;
    this.code = opts.code;
    this.field = opts.field;
    this.details = opts.details;
  }

  static configuration(code: string, message?: string, field?: string) {
    return new VerificationError({ kind: "CONFIGURATION", code, message, field });
  }

  static infrastructure(code: string, message?: string, cause?: unknown) {
    return new VerificationError({ kind: "INFRASTRUCTURE", code, message, cause });
  }

  static protocol(code: string, message?: string, details?: unknown) {
    return new VerificationError({ kind: "PROTOCOL", code, message, details });
  }
}

export interface PermissionMismatchOptions {
  code: string;
  message?: string;
  changelog?: readonly ChangeRecord[];
  missing?: readonly string[];
}

/**
 * Observed permissions do not satisfy the expected ones. Carries either the
 * filtered changelog (document comparison) or the missing permission names
 * (set containment).
 */
export class PermissionMismatchError extends VerificationError {
  readonly changelog: readonly ChangeRecord[];
  readonly missing: readonly string[];

  constructor(opts: PermissionMismatchOptions) {
    const changelog = opts.changelog ?? [];
    const missing = opts.missing ?? [];
    super({
      kind: "PERMISSION_MISMATCH",
      code: opts.code,
      message: opts.message,
      details: { changelog, missing },
    });
    this.name = "PermissionMismatchError";
    this.changelog = changelog;
    this.missing = missing;
  }

  static changelog(code: string, changelog: readonly ChangeRecord[], message?: string) {
    return new PermissionMismatchError({ code, changelog, message });
  }

  static missing(code: string, missing: readonly string[], message?: string) {
    return new PermissionMismatchError({
      code,
      missing,
      message: message ?? `missing permissions: ${missing.join(", ")}`,
    });
  }
}

/** Labels a failure with the pipeline stage it came from. */
export class StageError extends Error {
  readonly stage: StageId;

  constructor(stage: StageId, cause: unknown) {
    super(`${stage}: ${errorMessage(cause)}`, { cause });
    this.name = "StageError";
    this.stage = stage;
  }
}

/** A stage received inputs it was not wired to receive. */
export class ContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractError";
  }
}

export interface CleanupFailure {
  resource: string;
  error: unknown;
}

export class CleanupError extends Error {
  readonly failures: readonly CleanupFailure[];

  constructor(failures: readonly CleanupFailure[]) {
    super(
      `cleanup failed for ${failures.length} resource(s): ` +
        failures.map((f) => `${f.resource} (${errorMessage(f.error)})`).join("; "),
    );
    this.name = "CleanupError";
    this.failures = failures;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isVerificationError(
  err: unknown,
  kind?: VerificationErrorKind,
): err is VerificationError {
  return err instanceof VerificationError && (kind === undefined || err.kind === kind);
}

/** Innermost stage of a (possibly nested) StageError chain. */
export function failedStage(err: unknown): StageId | undefined {
  let stage: StageId | undefined;
  let current: unknown = err;
  while (current instanceof StageError) {
    stage = current.stage;
    current = current.cause;
  }
  return stage;
}

/** First error in the cause chain that is not a StageError. */
export function rootCause(err: unknown): unknown {
  let current: unknown = err;
  while (current instanceof StageError) current = current.cause;
  return current;
}
