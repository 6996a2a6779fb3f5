import type { RestorePhase } from "./restore-session.js";

export type RestoreFailureKind =
  | "ValidationFailed"
  | "NotFound"
  | "MissingIdentity"
  | "ExternalCallFailed"
  | "TransformApplyFailed"
  | "ActionCreateFailed"
  | "RestoreActionFailed"
  | "TimeoutExceeded"
  | "VerificationFailed";

export interface RestoreErrorOptions {
  readonly objectName?: string;
  /** Aggregated validation errors. */
  readonly errors?: readonly string[];
  /** Full dump of the external object involved. */
  readonly diagnostics?: string;
  readonly cause?: unknown;
}

export class RestoreError extends Error {
  readonly kind: RestoreFailureKind;
  readonly phase: RestorePhase;
  readonly objectName?: string;
  readonly errors: readonly string[];
  readonly diagnostics?: string;

  constructor(
    kind: RestoreFailureKind,
    phase: RestorePhase,
    message: string,
    options: RestoreErrorOptions = {},
  ) {
    super(`[${phase}] ${message}`, { cause: options.cause });
    this.name = "RestoreError";
    this.kind = kind;
    this.phase = phase;
    this.objectName = options.objectName;
    this.errors = options.errors ?? [];
    this.diagnostics = options.diagnostics;
  }
}

export class RestoreOptionsError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid restore options: ${issues.join("; ")}`);
    this.name = "RestoreOptionsError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
