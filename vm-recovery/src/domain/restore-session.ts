export type RestorePhase =
  | "Init"
  | "ContextResolved"
  | "Validated"
  | "NamesComputed"
  | "ConflictCheck"
  | "ForcedCleanup"
  | "NamespaceCreated"
  | "TransformsReady"
  | "TransformsApplied"
  | "ActionCreated"
  | "Monitoring"
  | "PostActions"
  | "Verified"
  | "Succeeded"
  | "Failed"
  | "DryRunExit"
  | "ValidateOnlyExit"
  | "Cancelled";

export const TERMINAL_PHASES: ReadonlySet<RestorePhase> = new Set([
  "Succeeded",
  "Failed",
  "DryRunExit",
  "ValidateOnlyExit",
  "Cancelled",
]);

export interface ResolvedNames {
  readonly transformSetName: string;
  readonly restoreActionName: string;
  readonly finalVMName: string;
}

export interface RestoreSession {
  readonly phase: RestorePhase;
  readonly restorePoint: string;
  readonly vmName: string | null;
  readonly sourceNamespace: string | null;
  readonly targetNamespace: string | null;
  readonly k10Namespace: string | null;
  readonly names: ResolvedNames | null;
  readonly transformFile: string | null;
  readonly transformSetName: string | null;
  readonly lastObservedState: string | null;
  readonly warnings: readonly string[];
  readonly errors: readonly string[];
  readonly history: readonly RestorePhase[];
  readonly startedAt: Date;
  readonly updatedAt: Date;
}

export type RestoreSessionChanges = Partial<
  Omit<RestoreSession, "phase" | "restorePoint" | "history" | "startedAt" | "updatedAt">
>;

export function createRestoreSession(restorePoint: string, now: Date): RestoreSession {
  return {
    phase: "Init",
    restorePoint,
    vmName: null,
    sourceNamespace: null,
    targetNamespace: null,
    k10Namespace: null,
    names: null,
    transformFile: null,
    transformSetName: null,
    lastObservedState: null,
    warnings: [],
    errors: [],
    history: ["Init"],
    startedAt: now,
    updatedAt: now,
  };
}

export function advanceSession(
  session: RestoreSession,
  phase: RestorePhase,
  changes: RestoreSessionChanges,
  now: Date,
): RestoreSession {
  if (TERMINAL_PHASES.has(session.phase)) {
    throw new Error(
      `restore session already finished in ${session.phase}, cannot move to ${phase}`,
    );
  }

  return {
    ...session,
    ...changes,
    phase,
    history: [...session.history, phase],
    updatedAt: now,
  };
}

export function updateSession(
  session: RestoreSession,
  changes: RestoreSessionChanges,
  now: Date,
): RestoreSession {
  return {
    ...session,
    ...changes,
    updatedAt: now,
  };
}
