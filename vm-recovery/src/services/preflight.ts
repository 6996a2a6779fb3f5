import { describeError } from "../domain/errors.js";
import type { RestoreOptions } from "../domain/restore-options.js";
import type { RestorePointModel } from "../domain/restore-point.js";
import type { ClusterInspector, ResourceQuotaSummary } from "../ports/cluster.js";
import type { TransformDocumentStore } from "../ports/transform-store.js";
import { readTransformSetName } from "./transform-document.js";

export const REQUIRED_CRDS = [
  { name: "restorepointcontents.apps.kio.kasten.io", product: "Kasten K10" },
  { name: "virtualmachines.kubevirt.io", product: "OpenShift Virtualization" },
  { name: "datavolumes.cdi.kubevirt.io", product: "CDI (Containerized Data Importer)" },
] as const;

export interface PreflightInput {
  readonly model: RestorePointModel;
  readonly options: RestoreOptions;
  readonly targetNamespace: string;
}

export interface PreflightDeps {
  readonly cluster: ClusterInspector;
  readonly transformStore: TransformDocumentStore;
}

export interface PreflightReport {
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  /** Informational lines; never block. */
  readonly notices: readonly string[];
  readonly targetNamespaceExists: boolean;
  readonly quotas: readonly ResourceQuotaSummary[];
  /** TransformSet name read from a custom transform file. */
  readonly customTransformSetName: string | null;
}

/**
 * Runs every precondition check and collects the results; nothing short of
 * the whole list is reported.
 */
export async function runPreflight(
  input: PreflightInput,
  deps: PreflightDeps,
): Promise<PreflightReport> {
  const { model, options, targetNamespace } = input;
  const { cluster } = deps;
  const errors: string[] = [];
  const warnings: string[] = [];
  const notices: string[] = [];

  for (const crd of REQUIRED_CRDS) {
    try {
      if (!(await cluster.crdExists(crd.name))) {
        errors.push(`${crd.product} not installed (CRD ${crd.name} not found)`);
      }
    } catch (error) {
      errors.push(`could not check CRD ${crd.name}: ${describeError(error)}`);
    }
  }

  if (model.disks.length === 0) {
    errors.push("no DataVolumes found in restore point");
  } else {
    notices.push(`found ${model.disks.length} DataVolume(s) in restore point`);
  }

  const knownDisks = new Set(model.disks.map((disk) => disk.name));
  for (const disk of Object.keys(options.resizeDisks)) {
    if (!knownDisks.has(disk)) {
      errors.push(`resize target ${disk} is not a disk of this restore point`);
    }
  }

  if (options.newStorageClass) {
    try {
      if (!(await cluster.storageClassExists(options.newStorageClass))) {
        warnings.push(`StorageClass ${options.newStorageClass} not found`);
      }
    } catch (error) {
      warnings.push(
        `could not check StorageClass ${options.newStorageClass}: ${describeError(error)}`,
      );
    }
  }

  let targetNamespaceExists = false;
  try {
    targetNamespaceExists = await cluster.namespaceExists(targetNamespace);
    if (!targetNamespaceExists && options.createNamespace) {
      notices.push(`target namespace ${targetNamespace} will be created`);
    } else if (!targetNamespaceExists) {
      errors.push(
        `target namespace ${targetNamespace} does not exist (use --create-namespace)`,
      );
    }
  } catch (error) {
    errors.push(`could not check namespace ${targetNamespace}: ${describeError(error)}`);
  }

  try {
    if (!(await cluster.hasK10SnapshotClass())) {
      warnings.push(
        "no VolumeSnapshotClass labeled k10.kasten.io/is-snapshot-class=true found",
      );
    }
  } catch (error) {
    warnings.push(`could not check VolumeSnapshotClass: ${describeError(error)}`);
  }

  let quotas: readonly ResourceQuotaSummary[] = [];
  if (targetNamespaceExists) {
    try {
      quotas = await cluster.listResourceQuotas(targetNamespace);
      notices.push(
        quotas.length > 0
          ? `resource quotas exist in namespace ${targetNamespace}`
          : `no resource quotas defined in namespace ${targetNamespace}`,
      );
    } catch (error) {
      notices.push(`could not list resource quotas: ${describeError(error)}`);
    }
  }

  let customTransformSetName: string | null = null;
  if (options.transformFile) {
    try {
      const content = await deps.transformStore.read(options.transformFile);
      customTransformSetName = readTransformSetName(content);
      if (!customTransformSetName) {
        errors.push(
          `transform file ${options.transformFile} does not define a TransformSet name`,
        );
      }
    } catch (error) {
      errors.push(
        `transform file ${options.transformFile} is not readable: ${describeError(error)}`,
      );
    }
  }

  return {
    errors,
    warnings,
    notices,
    targetNamespaceExists,
    quotas,
    customTransformSetName,
  };
}
