import {
  CREATED_AT_LABEL,
  CREATED_BY_LABEL,
  buildRestoreActionManifest,
} from "../domain/restore-action.js";
import {
  RestoreError,
  describeError,
  type RestoreFailureKind,
} from "../domain/errors.js";
import type { RestoreOptions } from "../domain/restore-options.js";
import {
  APP_NAMESPACE_LABEL,
  APP_NAME_LABEL,
  labelValue,
  parseRestorePoint,
  type RestorePointModel,
} from "../domain/restore-point.js";
import {
  advanceSession,
  createRestoreSession,
  updateSession,
  type ResolvedNames,
  type RestorePhase,
  type RestoreSession,
  type RestoreSessionChanges,
} from "../domain/restore-session.js";
import type { Logger } from "../observability/logger.js";
import type { Clock } from "../ports/clock.js";
import type {
  ClusterInspector,
  NamespaceManager,
  RestoreActionClient,
  RestorePointReader,
  TransformApplier,
  TransformSetClient,
  VirtualMachineClient,
} from "../ports/cluster.js";
import type { Confirmer } from "../ports/confirmer.js";
import type { TransformDocumentStore } from "../ports/transform-store.js";
import {
  computeRestoreNames,
  resolveCloneName,
} from "./name-resolver.js";
import { done, pending, pollUntil } from "./poller.js";
import { runPreflight, type PreflightReport } from "./preflight.js";
import {
  buildRestorePlan,
  type ConflictResolution,
  type RestorePlan,
} from "./restore-plan.js";
import { renderTransformSet } from "./transform-document.js";
import { synthesizeTransforms } from "./transform-synthesizer.js";

const COMPLETE_STATE = "Complete";
const FAILED_STATE = "Failed";
const DATA_VOLUME_READY_PHASE = "Succeeded";
const CLAIM_READY_PHASE = "Bound";

export interface RestoreTiming {
  readonly pollIntervalMs: number;
  readonly restoreTimeoutMs: number;
  readonly vmWaitTimeoutMs: number;
  readonly settleDelayMs: number;
}

export interface RestoreOrchestratorDeps {
  readonly restorePoints: RestorePointReader;
  readonly inspector: ClusterInspector;
  readonly namespaces: NamespaceManager;
  readonly transformSets: TransformSetClient;
  readonly transformApplier: TransformApplier;
  readonly restoreActions: RestoreActionClient;
  readonly virtualMachines: VirtualMachineClient;
  readonly transformStore: TransformDocumentStore;
  readonly confirmer: Confirmer;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly timing: RestoreTiming;
  /** Called once the plan is known, before anything is confirmed or changed. */
  readonly onPlan?: (plan: RestorePlan) => void;
}

export type RestoreOutcomeKind =
  | "Success"
  | "DryRun"
  | "ValidateOnly"
  | "Cancelled"
  | RestoreFailureKind;

export interface VolumeCheck {
  readonly name: string;
  readonly phase: string | null;
}

export interface VerificationReport {
  readonly vmName: string;
  readonly namespace: string;
  readonly state: "Running" | "Stopped";
  readonly dataVolumes: readonly VolumeCheck[];
  readonly claims: readonly VolumeCheck[];
}

export interface RestoreOutcome {
  readonly kind: RestoreOutcomeKind;
  readonly ok: boolean;
  readonly session: RestoreSession;
  readonly plan: RestorePlan | null;
  readonly verification: VerificationReport | null;
  readonly error?: RestoreError;
}

interface RestoreContext {
  readonly options: RestoreOptions;
  readonly model: RestorePointModel;
  readonly vmName: string;
  readonly sourceNamespace: string;
  readonly targetNamespace: string;
}

class SessionTracker {
  plan: RestorePlan | null = null;
  verification: VerificationReport | null = null;
  private current: RestoreSession;

  constructor(
    restorePoint: string,
    private readonly clock: Clock,
    readonly logger: Logger,
  ) {
    this.current = createRestoreSession(restorePoint, clock.now());
  }

  get session(): RestoreSession {
    return this.current;
  }

  advance(phase: RestorePhase, changes: RestoreSessionChanges = {}): void {
    this.current = advanceSession(this.current, phase, changes, this.clock.now());
    this.logger.info("restore phase reached", {
      phase,
      vmName: this.current.names?.finalVMName ?? this.current.vmName ?? undefined,
    });
  }

  update(changes: RestoreSessionChanges): void {
    this.current = updateSession(this.current, changes, this.clock.now());
  }

  warn(message: string): void {
    this.update({ warnings: [...this.current.warnings, message] });
    this.logger.warn(message, { phase: this.current.phase });
  }

  outcome(kind: RestoreOutcomeKind, error?: RestoreError): RestoreOutcome {
    return {
      kind,
      ok: error === undefined,
      session: this.current,
      plan: this.plan,
      verification: this.verification,
      ...(error ? { error } : {}),
    };
  }
}

/**
 * Drives one restore from a RestorePointContent to a verified VirtualMachine.
 * Mutating calls are never retried; only state observation is polled.
 */
export class RestoreOrchestrator {
  constructor(private readonly deps: RestoreOrchestratorDeps) {}

  async run(options: RestoreOptions): Promise<RestoreOutcome> {
    const logger = this.deps.logger.child({
      component: "restore-orchestrator",
      restorePoint: options.restorePoint,
    });
    const tracker = new SessionTracker(options.restorePoint, this.deps.clock, logger);

    try {
      return await this.execute(options, tracker, logger);
    } catch (error) {
      const failure =
        error instanceof RestoreError
          ? error
          : new RestoreError(
              "ExternalCallFailed",
              tracker.session.phase,
              describeError(error),
              { cause: error },
            );
      tracker.advance("Failed", {
        errors: [...tracker.session.errors, failure.message, ...failure.errors],
      });
      logger.error(failure.message, {
        kind: failure.kind,
        objectName: failure.objectName,
        errors: failure.errors.length > 0 ? failure.errors : undefined,
      });
      return tracker.outcome(failure.kind, failure);
    } finally {
      await this.disposeTransformDocuments(logger);
    }
  }

  private async disposeTransformDocuments(logger: Logger): Promise<void> {
    try {
      await this.deps.transformStore.dispose();
    } catch (error) {
      logger.warn(`could not remove generated transform documents: ${describeError(error)}`);
    }
  }

  private async execute(
    options: RestoreOptions,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<RestoreOutcome> {
    const context = await this.resolveContext(options, tracker);

    const preflight = await runPreflight(
      { model: context.model, options, targetNamespace: context.targetNamespace },
      { cluster: this.deps.inspector, transformStore: this.deps.transformStore },
    );
    for (const notice of preflight.notices) {
      logger.info(notice);
    }
    if (preflight.errors.length > 0) {
      throw new RestoreError(
        "ValidationFailed",
        "ContextResolved",
        `validation failed with ${preflight.errors.length} error(s)`,
        { objectName: options.restorePoint, errors: preflight.errors },
      );
    }
    tracker.advance("Validated", {
      warnings: [...tracker.session.warnings, ...preflight.warnings],
    });
    for (const warning of preflight.warnings) {
      logger.warn(warning);
    }

    let names = computeRestoreNames(context.vmName, options.restorePoint);
    const k10Namespace = await this.external(
      "NamesComputed",
      "K10 namespace",
      () => this.deps.inspector.resolveK10Namespace(),
    );
    tracker.advance("NamesComputed", {
      names,
      k10Namespace,
      transformFile: options.transformFile ?? null,
      transformSetName: preflight.customTransformSetName ?? names.transformSetName,
    });

    if (options.validateOnly) {
      this.publishPlan(tracker, context, preflight, names, k10Namespace, "unchecked");
      tracker.advance("ValidateOnlyExit");
      return tracker.outcome("ValidateOnly");
    }

    const conflict = await this.checkConflict(context, names, tracker);
    names = conflict.names;
    tracker.advance("ConflictCheck", {
      names,
      transformSetName: preflight.customTransformSetName ?? names.transformSetName,
    });
    this.publishPlan(tracker, context, preflight, names, k10Namespace, conflict.resolution);

    if (options.dryRun) {
      logger.info("dry-run mode: no changes were made");
      tracker.advance("DryRunExit");
      return tracker.outcome("DryRun");
    }

    if (!options.autoConfirm) {
      const confirmed = await this.deps.confirmer.confirm(
        `Proceed with restore of ${names.finalVMName} into ${context.targetNamespace}?`,
      );
      if (!confirmed) {
        logger.info("restore cancelled by user");
        tracker.advance("Cancelled");
        return tracker.outcome("Cancelled");
      }
    }

    if (conflict.resolution === "verify-only") {
      logger.info(
        `VM ${names.finalVMName} already exists in ${context.targetNamespace}; skipping restore and verifying`,
      );
      await this.verify(names.finalVMName, context.targetNamespace, tracker);
      tracker.advance("Succeeded");
      return tracker.outcome("Success");
    }

    if (options.force) {
      await this.forceCleanup(options, names, k10Namespace, context.targetNamespace, tracker, logger);
    }

    if (!preflight.targetNamespaceExists && options.createNamespace) {
      await this.createTargetNamespace(context.targetNamespace, tracker, logger);
    }

    const transformSetName = await this.prepareTransforms(
      context,
      names,
      k10Namespace,
      preflight,
      tracker,
    );

    const transformFile = tracker.session.transformFile;
    if (!transformFile) {
      throw new RestoreError(
        "TransformApplyFailed",
        "TransformsReady",
        "no transform document to apply",
        { objectName: transformSetName },
      );
    }
    try {
      await this.deps.transformApplier.applyFile(transformFile);
    } catch (error) {
      throw new RestoreError(
        "TransformApplyFailed",
        "TransformsReady",
        `failed to apply TransformSet ${transformSetName}: ${describeError(error)}`,
        { objectName: transformSetName, cause: error },
      );
    }
    tracker.advance("TransformsApplied");

    await this.submitRestoreAction(
      context,
      names,
      transformSetName,
      k10Namespace,
      tracker,
      logger,
    );
    await this.monitor(options, names.restoreActionName, context.targetNamespace, tracker, logger);
    await this.postActions(options, names.finalVMName, context.targetNamespace, tracker, logger);
    await this.verify(names.finalVMName, context.targetNamespace, tracker);

    tracker.advance("Succeeded");
    logger.info("VM restore completed", {
      vmName: names.finalVMName,
      namespace: context.targetNamespace,
    });
    return tracker.outcome("Success");
  }

  private async resolveContext(
    options: RestoreOptions,
    tracker: SessionTracker,
  ): Promise<RestoreContext> {
    const raw = await this.external("Init", options.restorePoint, () =>
      this.deps.restorePoints.getRestorePoint(options.restorePoint),
    );
    if (raw === null) {
      throw new RestoreError(
        "NotFound",
        "Init",
        `restore point not found: ${options.restorePoint}`,
        { objectName: options.restorePoint },
      );
    }

    const model = parseRestorePoint(raw);
    const vmName = options.vmName ?? labelValue(model, APP_NAME_LABEL);
    if (!vmName) {
      throw new RestoreError(
        "MissingIdentity",
        "Init",
        "could not determine the VM name from the restore point; pass it explicitly",
        { objectName: options.restorePoint },
      );
    }
    const sourceNamespace = options.namespace ?? labelValue(model, APP_NAMESPACE_LABEL);
    if (!sourceNamespace) {
      throw new RestoreError(
        "MissingIdentity",
        "Init",
        "could not determine the source namespace from the restore point; pass it explicitly",
        { objectName: options.restorePoint },
      );
    }
    const targetNamespace = options.targetNamespace ?? sourceNamespace;

    tracker.advance("ContextResolved", { vmName, sourceNamespace, targetNamespace });
    return { options, model, vmName, sourceNamespace, targetNamespace };
  }

  private async checkConflict(
    context: RestoreContext,
    names: ResolvedNames,
    tracker: SessionTracker,
  ): Promise<{ resolution: ConflictResolution; names: ResolvedNames }> {
    const vms = this.deps.virtualMachines;
    const exists = await this.external("NamesComputed", names.finalVMName, () =>
      vms.virtualMachineExists(names.finalVMName, context.targetNamespace),
    );
    if (!exists) {
      return { resolution: "none", names };
    }
    if (!context.options.cloneOnConflict) {
      return { resolution: "verify-only", names };
    }

    const cloneName = await this.external("NamesComputed", names.finalVMName, () =>
      resolveCloneName(
        context.vmName,
        context.targetNamespace,
        (name, namespace) => vms.virtualMachineExists(name, namespace),
        () => this.deps.clock.now(),
      ),
    );
    tracker.logger.info(`target VM exists; cloning restore to VM name: ${cloneName}`);
    return {
      resolution: "clone",
      names: computeRestoreNames(cloneName, context.options.restorePoint),
    };
  }

  private publishPlan(
    tracker: SessionTracker,
    context: RestoreContext,
    preflight: PreflightReport,
    names: ResolvedNames,
    k10Namespace: string,
    conflict: ConflictResolution,
  ): void {
    tracker.plan = buildRestorePlan({
      model: context.model,
      options: context.options,
      sourceVMName: context.vmName,
      sourceNamespace: context.sourceNamespace,
      targetNamespace: context.targetNamespace,
      k10Namespace,
      names,
      conflict,
      targetNamespaceExists: preflight.targetNamespaceExists,
      customTransformSetName: preflight.customTransformSetName,
      quotas: preflight.quotas,
    });
    this.deps.onPlan?.(tracker.plan);
  }

  private async forceCleanup(
    options: RestoreOptions,
    names: ResolvedNames,
    k10Namespace: string,
    targetNamespace: string,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<void> {
    if (!options.autoConfirm) {
      const confirmed = await this.deps.confirmer.confirm(
        `Delete existing TransformSet ${names.transformSetName} and RestoreAction ${names.restoreActionName} before restoring?`,
      );
      if (!confirmed) {
        logger.info("force cleanup cancelled by user");
        return;
      }
    }

    tracker.advance("ForcedCleanup");
    if (options.transformFile) {
      logger.info("custom transform file supplied; TransformSet left in place");
    } else {
      await this.external("ForcedCleanup", names.transformSetName, () =>
        this.deps.transformSets.deleteTransformSet(names.transformSetName, k10Namespace),
      );
    }
    await this.external("ForcedCleanup", names.restoreActionName, () =>
      this.deps.restoreActions.deleteRestoreAction(names.restoreActionName, targetNamespace),
    );
  }

  private async createTargetNamespace(
    namespace: string,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<void> {
    logger.info(`creating namespace ${namespace}`);
    await this.external("NamespaceCreated", namespace, () =>
      this.deps.namespaces.createNamespace(namespace, {
        [CREATED_BY_LABEL]: "vm-recovery",
        [CREATED_AT_LABEL]: formatLabelTimestamp(this.deps.clock.now()),
      }),
    );
    tracker.advance("NamespaceCreated");
  }

  private async prepareTransforms(
    context: RestoreContext,
    names: ResolvedNames,
    k10Namespace: string,
    preflight: PreflightReport,
    tracker: SessionTracker,
  ): Promise<string> {
    const { options, model } = context;

    if (options.transformFile && preflight.customTransformSetName) {
      tracker.advance("TransformsReady", {
        transformFile: options.transformFile,
        transformSetName: preflight.customTransformSetName,
      });
      return preflight.customTransformSetName;
    }

    const transformInput = {
      regenerateMac: options.regenerateMac,
      newStorageClass: options.newStorageClass,
      vmNameOverride:
        names.finalVMName !== model.sourceVMName ? names.finalVMName : undefined,
      sourceNamespace: context.sourceNamespace,
      targetNamespace: context.targetNamespace,
      resizeDisks: options.resizeDisks,
    };
    const content = renderTransformSet({
      name: names.transformSetName,
      namespace: k10Namespace,
      restorePoint: options.restorePoint,
      sourceVMName: context.vmName,
      sourceNamespace: context.sourceNamespace,
      rules: synthesizeTransforms(model, transformInput),
      options: transformInput,
      generatedAt: this.deps.clock.now(),
      generatedBy: "vm-recovery-restore",
    });
    const filePath = await this.external("TransformsReady", names.transformSetName, () =>
      this.deps.transformStore.persist(names.transformSetName, content),
    );

    tracker.advance("TransformsReady", {
      transformFile: filePath,
      transformSetName: names.transformSetName,
    });
    return names.transformSetName;
  }

  private async submitRestoreAction(
    context: RestoreContext,
    names: ResolvedNames,
    transformSetName: string,
    k10Namespace: string,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<void> {
    const actions = this.deps.restoreActions;
    const exists = await this.external("TransformsApplied", names.restoreActionName, () =>
      actions.restoreActionExists(names.restoreActionName, context.targetNamespace),
    );

    if (exists) {
      logger.info(
        `RestoreAction already exists: ${names.restoreActionName}; skipping creation`,
      );
    } else {
      const manifest = buildRestoreActionManifest({
        name: names.restoreActionName,
        targetNamespace: context.targetNamespace,
        vmName: names.finalVMName,
        restorePoint: context.options.restorePoint,
        transformSetName,
        transformSetNamespace: k10Namespace,
        createdAt: this.deps.clock.now(),
      });
      try {
        await actions.createRestoreAction(manifest);
      } catch (error) {
        throw new RestoreError(
          "ActionCreateFailed",
          "TransformsApplied",
          `failed to create RestoreAction ${names.restoreActionName}: ${describeError(error)}`,
          { objectName: names.restoreActionName, cause: error },
        );
      }
      logger.info(`created RestoreAction ${names.restoreActionName}`);
    }

    tracker.advance("ActionCreated");
  }

  private async monitor(
    options: RestoreOptions,
    actionName: string,
    namespace: string,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<void> {
    tracker.advance("Monitoring");
    const { pollIntervalMs } = this.deps.timing;
    const timeoutMs = options.restoreTimeoutMs ?? this.deps.timing.restoreTimeoutMs;
    logger.info(`monitoring restore progress (timeout: ${seconds(timeoutMs)}s)`);

    let polls = 0;
    const result = await pollUntil(
      async () => {
        const elapsed = seconds(polls * pollIntervalMs);
        polls += 1;

        let state: string | null;
        try {
          state = await this.deps.restoreActions.getRestoreActionState(actionName, namespace);
        } catch (error) {
          tracker.warn(
            `could not read state of RestoreAction ${actionName}: ${describeError(error)}`,
          );
          return pending;
        }

        tracker.update({ lastObservedState: state });
        if (state === COMPLETE_STATE || state === FAILED_STATE) {
          return done(state);
        }
        logger.info(
          state
            ? `restore state: ${state} (${elapsed}s elapsed)`
            : `waiting for restore to start (${elapsed}s elapsed)`,
        );
        return pending;
      },
      { intervalMs: pollIntervalMs, timeoutMs, clock: this.deps.clock },
    );

    if (result.status === "timeout") {
      throw new RestoreError(
        "TimeoutExceeded",
        "Monitoring",
        `timed out after ${seconds(timeoutMs)}s waiting for RestoreAction ${actionName} to complete`,
        { objectName: actionName },
      );
    }

    if (result.value === FAILED_STATE) {
      let diagnostics: string;
      try {
        diagnostics = await this.deps.restoreActions.describeRestoreAction(
          actionName,
          namespace,
        );
      } catch (error) {
        diagnostics = `could not describe RestoreAction: ${describeError(error)}`;
      }
      throw new RestoreError(
        "RestoreActionFailed",
        "Monitoring",
        `RestoreAction ${actionName} failed`,
        { objectName: actionName, diagnostics },
      );
    }

    logger.info(`RestoreAction ${actionName} completed`);
  }

  private async postActions(
    options: RestoreOptions,
    vmName: string,
    namespace: string,
    tracker: SessionTracker,
    logger: Logger,
  ): Promise<void> {
    tracker.advance("PostActions");
    const vms = this.deps.virtualMachines;

    const vmAppeared = await this.waitFor(
      () => vms.virtualMachineExists(vmName, namespace),
      `VirtualMachine ${vmName}`,
      logger,
    );
    if (!vmAppeared) {
      tracker.warn(`VirtualMachine ${vmName} not created within timeout`);
      return;
    }

    if (options.noStart) {
      logger.info("ensuring VM is stopped");
      try {
        await vms.setVirtualMachineRunning(vmName, namespace, false);
      } catch (error) {
        tracker.warn(`could not stop VirtualMachine ${vmName}: ${describeError(error)}`);
      }
      return;
    }

    logger.info("VM will start automatically");
    await this.deps.clock.sleep(this.deps.timing.settleDelayMs);
    const instanceUp = await this.waitFor(
      () => vms.virtualMachineInstanceExists(vmName, namespace),
      `VirtualMachineInstance ${vmName}`,
      logger,
    );
    if (!instanceUp) {
      tracker.warn(
        `VirtualMachineInstance ${vmName} not running yet (may take time to boot)`,
      );
    }
  }

  private async verify(
    vmName: string,
    namespace: string,
    tracker: SessionTracker,
  ): Promise<void> {
    const vms = this.deps.virtualMachines;
    const vm = await this.external(tracker.session.phase, vmName, () =>
      vms.getVirtualMachine(vmName, namespace),
    );
    if (!vm) {
      throw new RestoreError(
        "VerificationFailed",
        tracker.session.phase,
        `VM not found: ${namespace}/${vmName}`,
        { objectName: vmName },
      );
    }

    const dataVolumes: VolumeCheck[] = [];
    const claims: VolumeCheck[] = [];
    for (const dataVolumeName of vm.dataVolumeNames) {
      let claimName = dataVolumeName;
      try {
        const status = await vms.getDataVolume(dataVolumeName, namespace);
        dataVolumes.push({ name: dataVolumeName, phase: status?.phase ?? null });
        claimName = status?.claimName ?? dataVolumeName;
        if (status?.phase !== DATA_VOLUME_READY_PHASE) {
          tracker.warn(`DataVolume ${dataVolumeName}: ${status?.phase ?? "NotFound"}`);
        }
      } catch (error) {
        dataVolumes.push({ name: dataVolumeName, phase: null });
        tracker.warn(`could not read DataVolume ${dataVolumeName}: ${describeError(error)}`);
      }

      try {
        const phase = await vms.getPersistentVolumeClaimPhase(claimName, namespace);
        claims.push({ name: claimName, phase });
        if (phase !== CLAIM_READY_PHASE) {
          tracker.warn(`PVC ${claimName}: ${phase ?? "NotFound"}`);
        }
      } catch (error) {
        claims.push({ name: claimName, phase: null });
        tracker.warn(`could not read PVC ${claimName}: ${describeError(error)}`);
      }
    }

    tracker.verification = {
      vmName,
      namespace,
      state: vm.running ? "Running" : "Stopped",
      dataVolumes,
      claims,
    };
    tracker.logger.info(`VM state: ${tracker.verification.state}`, {
      vmName,
      namespace,
    });
    tracker.advance("Verified");
  }

  private async waitFor(
    probe: () => Promise<boolean>,
    label: string,
    logger: Logger,
  ): Promise<boolean> {
    const result = await pollUntil(
      async () => {
        try {
          return (await probe()) ? done(true) : pending;
        } catch (error) {
          logger.warn(`could not check ${label}: ${describeError(error)}`);
          return pending;
        }
      },
      {
        intervalMs: this.deps.timing.pollIntervalMs,
        timeoutMs: this.deps.timing.vmWaitTimeoutMs,
        clock: this.deps.clock,
      },
    );
    return result.status === "done";
  }

  private async external<T>(
    phase: RestorePhase,
    objectName: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof RestoreError) {
        throw error;
      }
      throw new RestoreError(
        "ExternalCallFailed",
        phase,
        `call for ${objectName} failed: ${describeError(error)}`,
        { objectName, cause: error },
      );
    }
  }
}

/** Label-safe UTC timestamp, e.g. 20261019T083000Z. */
export function formatLabelTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace(/[-:]/g, "")}Z`;
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}
