import type { RestoreOptions } from "../domain/restore-options.js";
import type { RestorePointModel } from "../domain/restore-point.js";
import type { ResolvedNames } from "../domain/restore-session.js";
import type { ResourceQuotaSummary } from "../ports/cluster.js";

export type ConflictResolution = "unchecked" | "none" | "clone" | "verify-only";

export type TransformSource =
  | { readonly kind: "generated"; readonly transformSetName: string }
  | { readonly kind: "custom"; readonly file: string; readonly transformSetName: string };

export interface PlannedDisk {
  readonly name: string;
  readonly size: string;
  readonly resizeTo: string | null;
}

export interface RestorePlan {
  readonly restorePoint: string;
  readonly sourceVMName: string;
  readonly sourceNamespace: string;
  readonly targetNamespace: string;
  readonly k10Namespace: string;
  readonly names: ResolvedNames;
  readonly conflict: ConflictResolution;
  readonly createNamespace: boolean;
  readonly transforms: TransformSource;
  readonly disks: readonly PlannedDisk[];
  readonly startAfterRestore: boolean;
  readonly regenerateMac: boolean;
  readonly newStorageClass: string | null;
  /** Quotas of an existing target namespace. */
  readonly quotas: readonly ResourceQuotaSummary[];
}

export interface RestorePlanInput {
  readonly model: RestorePointModel;
  readonly options: RestoreOptions;
  readonly sourceVMName: string;
  readonly sourceNamespace: string;
  readonly targetNamespace: string;
  readonly k10Namespace: string;
  readonly names: ResolvedNames;
  readonly conflict: ConflictResolution;
  readonly targetNamespaceExists: boolean;
  /** Name declared by a custom transform file, when one is used. */
  readonly customTransformSetName: string | null;
  readonly quotas?: readonly ResourceQuotaSummary[];
}

export function buildRestorePlan(input: RestorePlanInput): RestorePlan {
  const { options } = input;

  const transforms: TransformSource =
    options.transformFile && input.customTransformSetName
      ? {
          kind: "custom",
          file: options.transformFile,
          transformSetName: input.customTransformSetName,
        }
      : { kind: "generated", transformSetName: input.names.transformSetName };

  return {
    restorePoint: options.restorePoint,
    sourceVMName: input.sourceVMName,
    sourceNamespace: input.sourceNamespace,
    targetNamespace: input.targetNamespace,
    k10Namespace: input.k10Namespace,
    names: input.names,
    conflict: input.conflict,
    createNamespace: options.createNamespace && !input.targetNamespaceExists,
    transforms,
    disks: input.model.disks.map((disk) => ({
      name: disk.name,
      size: disk.requestedSize,
      resizeTo: options.resizeDisks[disk.name] ?? null,
    })),
    startAfterRestore: !options.noStart,
    regenerateMac: options.regenerateMac,
    newStorageClass: options.newStorageClass ?? null,
    quotas: input.quotas ?? [],
  };
}

export function formatRestorePlan(plan: RestorePlan): string[] {
  const lines = [
    "RESTORE PLAN",
    `Restore point: ${plan.restorePoint}`,
    `Source: ${plan.sourceNamespace}/${plan.sourceVMName}`,
    `Target: ${plan.targetNamespace}/${plan.names.finalVMName}`,
  ];

  if (plan.conflict === "verify-only") {
    lines.push(
      `VM ${plan.names.finalVMName} already exists in ${plan.targetNamespace}; restore is skipped and only verification runs`,
    );
    return lines;
  }
  if (plan.conflict === "clone") {
    lines.push(`Target VM exists; restoring as clone: ${plan.names.finalVMName}`);
  }

  lines.push("", "1. Prepare target environment:");
  if (plan.createNamespace) {
    lines.push(`   - Create namespace: ${plan.targetNamespace}`);
  }
  if (plan.transforms.kind === "custom") {
    lines.push(`   - Apply custom transforms from: ${plan.transforms.file}`);
  } else {
    lines.push("   - Generate and apply VM-specific transforms");
  }
  lines.push(
    `   - TransformSet: ${plan.transforms.transformSetName} (namespace ${plan.k10Namespace})`,
  );

  lines.push("", "2. Restore resources:");
  for (const disk of plan.disks) {
    lines.push(`   - DataVolume: ${disk.name} (${disk.size})`);
  }
  lines.push(`   - VirtualMachine: ${plan.names.finalVMName}`);
  lines.push(`   - RestoreAction: ${plan.names.restoreActionName}`);

  lines.push("", "3. Post-restore actions:");
  lines.push(
    plan.startAfterRestore
      ? "   - VM will start automatically"
      : "   - VM will remain stopped (--no-start)",
  );

  if (plan.quotas.length > 0) {
    lines.push("", `Resource quotas in ${plan.targetNamespace} (used/hard):`);
    for (const quota of plan.quotas) {
      lines.push(...formatQuotaUsage(quota).map((line) => `   - ${line}`));
    }
  }

  lines.push("", "Transform settings:");
  lines.push(`   - New MAC addresses: ${plan.regenerateMac}`);
  if (plan.newStorageClass) {
    lines.push(`   - Storage class: ${plan.newStorageClass}`);
  }
  for (const disk of plan.disks) {
    if (disk.resizeTo) {
      lines.push(`   - Resize disk: ${disk.name}=${disk.resizeTo}`);
    }
  }

  return lines;
}

export function formatQuotaUsage(quota: ResourceQuotaSummary): string[] {
  return Object.entries(quota.hard).map(
    ([resource, hard]) => `${quota.name}: ${resource} ${quota.used[resource] ?? "0"}/${hard}`,
  );
}
