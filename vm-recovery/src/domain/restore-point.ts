import { z } from "zod";

export const APP_NAME_LABEL = "k10.kasten.io/appName";
export const APP_NAMESPACE_LABEL = "k10.kasten.io/appNamespace";
export const FREEZE_ANNOTATION = "k10.kasten.io/freezeVM";

export const DATA_VOLUME_RESOURCE = {
  group: "cdi.kubevirt.io",
  kind: "datavolumes",
} as const;

export const VIRTUAL_MACHINE_RESOURCE = {
  group: "kubevirt.io",
  kind: "virtualmachines",
} as const;

export const UNKNOWN = "unknown";
export const UNKNOWN_SIZE = "Unknown";
export const NOT_AVAILABLE = "N/A";

export type RestoreMethod = "Snapshot" | "Export";

export interface RestorePointArtifact {
  readonly resourceGroup: string;
  readonly resourceKind: string;
  readonly resourceName: string;
  readonly specSnapshot: Readonly<Record<string, unknown>>;
  readonly volumeSnapshotPresence: boolean;
}

export interface DiskInfo {
  readonly name: string;
  readonly requestedSize: string;
  readonly hasSnapshotArtifact: boolean;
}

export interface VmResources {
  readonly cpuCores: string;
  readonly memory: string;
}

export interface RestorePointModel {
  readonly name: string;
  readonly sourceVMName: string;
  readonly sourceNamespace: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly disks: readonly DiskInfo[];
  readonly vmRunningAtBackup: boolean;
  readonly vmResources: VmResources;
  readonly macAddresses: readonly string[];
  /** Interface positions that carry a MAC, aligned with `macAddresses`. */
  readonly macInterfaceIndexes: readonly number[];
  readonly freezeAnnotationPresent: boolean;
  readonly restoreMethodsAvailable: ReadonlySet<RestoreMethod>;
  readonly exportEnabled: boolean;
  readonly hasVirtualMachineArtifact: boolean;
  readonly artifacts: readonly RestorePointArtifact[];
}

const artifactEntrySchema = z.object({
  resource: z
    .object({
      group: z.string().catch(""),
      resource: z.string().catch(""),
      name: z.string().catch(""),
    })
    .catch({ group: "", resource: "", name: "" }),
  artifact: z.record(z.unknown()).catch({}),
  volumeSnapshot: z.unknown(),
});

const EMPTY_DETAILS = { artifacts: [], exportData: { enabled: false } };

const restorePointSchema = z
  .object({
    metadata: z
      .object({
        name: z.string().catch(""),
        labels: z.record(z.string()).catch({}),
      })
      .catch({ name: "", labels: {} }),
    status: z
      .object({
        restorePointContentDetails: z
          .object({
            artifacts: z.array(z.unknown()).catch([]),
            exportData: z
              .object({ enabled: z.boolean().catch(false) })
              .catch({ enabled: false }),
          })
          .catch(EMPTY_DETAILS),
      })
      .catch({ restorePointContentDetails: EMPTY_DETAILS }),
  })
  .catch({
    metadata: { name: "", labels: {} },
    status: { restorePointContentDetails: EMPTY_DETAILS },
  });

/**
 * Builds the typed view of a RestorePointContent document. Never throws:
 * anything missing or malformed degrades to its documented default.
 */
export function parseRestorePoint(raw: unknown): RestorePointModel {
  const document = restorePointSchema.parse(raw);
  const details = document.status.restorePointContentDetails;
  const labels = document.metadata.labels;

  const artifacts: RestorePointArtifact[] = [];
  for (const entry of details.artifacts) {
    const parsed = artifactEntrySchema.safeParse(entry);
    if (!parsed.success) {
      continue;
    }
    artifacts.push({
      resourceGroup: parsed.data.resource.group,
      resourceKind: parsed.data.resource.resource,
      resourceName: parsed.data.resource.name,
      specSnapshot: parsed.data.artifact,
      volumeSnapshotPresence:
        isPresent(parsed.data.volumeSnapshot) ||
        isPresent(parsed.data.artifact.volumeSnapshot),
    });
  }

  const disks = artifacts
    .filter((artifact) => matches(artifact, DATA_VOLUME_RESOURCE))
    .map(toDisk);
  const vmArtifact = artifacts.find((artifact) =>
    matches(artifact, VIRTUAL_MACHINE_RESOURCE),
  );
  const vmSpec = vmArtifact?.specSnapshot;
  const interfaces = extractInterfaceMacs(vmSpec);

  const exportEnabled = details.exportData.enabled === true;
  const restoreMethodsAvailable = new Set<RestoreMethod>();
  if (disks.some((disk) => disk.hasSnapshotArtifact)) {
    restoreMethodsAvailable.add("Snapshot");
  }
  if (exportEnabled) {
    restoreMethodsAvailable.add("Export");
  }

  return {
    name: document.metadata.name,
    sourceVMName: nonEmpty(labels[APP_NAME_LABEL]) ?? UNKNOWN,
    sourceNamespace: nonEmpty(labels[APP_NAMESPACE_LABEL]) ?? UNKNOWN,
    labels,
    disks,
    vmRunningAtBackup: valueAt(vmSpec, ["spec", "running"]) === true,
    vmResources: {
      cpuCores:
        scalarAt(vmSpec, ["spec", "template", "spec", "domain", "cpu", "cores"]) ??
        NOT_AVAILABLE,
      memory:
        scalarAt(vmSpec, [
          "spec",
          "template",
          "spec",
          "domain",
          "resources",
          "requests",
          "memory",
        ]) ?? NOT_AVAILABLE,
    },
    macAddresses: interfaces.map((item) => item.macAddress),
    macInterfaceIndexes: interfaces.map((item) => item.index),
    freezeAnnotationPresent:
      valueAt(vmSpec, ["metadata", "annotations", FREEZE_ANNOTATION]) === "true",
    restoreMethodsAvailable,
    exportEnabled,
    hasVirtualMachineArtifact: vmArtifact !== undefined,
    artifacts,
  };
}

/** Label value, or null when the label is absent or blank. */
export function labelValue(
  model: RestorePointModel,
  label: string,
): string | null {
  return nonEmpty(model.labels[label]) ?? null;
}

function toDisk(artifact: RestorePointArtifact): DiskInfo {
  const storagePath = ["pvc", "resources", "requests", "storage"];
  const size =
    scalarAt(artifact.specSnapshot, ["spec", ...storagePath]) ??
    scalarAt(artifact.specSnapshot, ["metadata", "spec", ...storagePath]) ??
    UNKNOWN_SIZE;

  return {
    name: artifact.resourceName,
    requestedSize: size,
    hasSnapshotArtifact: artifact.volumeSnapshotPresence,
  };
}

function extractInterfaceMacs(
  vmSpec: Readonly<Record<string, unknown>> | undefined,
): { index: number; macAddress: string }[] {
  const interfaces = valueAt(vmSpec, [
    "spec",
    "template",
    "spec",
    "domain",
    "devices",
    "interfaces",
  ]);
  if (!Array.isArray(interfaces)) {
    return [];
  }

  const result: { index: number; macAddress: string }[] = [];
  interfaces.forEach((item: unknown, index) => {
    const mac = nonEmpty(valueAt(asRecord(item), ["macAddress"]));
    if (mac) {
      result.push({ index, macAddress: mac });
    }
  });
  return result;
}

function matches(
  artifact: RestorePointArtifact,
  target: { readonly group: string; readonly kind: string },
): boolean {
  return (
    artifact.resourceGroup === target.group &&
    artifact.resourceKind === target.kind
  );
}

function valueAt(
  root: Readonly<Record<string, unknown>> | undefined,
  path: readonly string[],
): unknown {
  let current: unknown = root;
  for (const segment of path) {
    const record = asRecord(current);
    if (!record) {
      return undefined;
    }
    current = record[segment];
  }
  return current;
}

function scalarAt(
  root: Readonly<Record<string, unknown>> | undefined,
  path: readonly string[],
): string | undefined {
  const value = valueAt(root, path);
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return nonEmpty(value);
}

function asRecord(value: unknown): Readonly<Record<string, unknown>> | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  return value.trim().length > 0 ? value : undefined;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}
