import {
  APP_NAMESPACE_LABEL,
  APP_NAME_LABEL,
  FREEZE_ANNOTATION,
  labelValue,
  parseRestorePoint,
  type RestorePointModel,
} from "../domain/restore-point.js";
import type { Logger } from "../observability/logger.js";
import type {
  RestorePointFilter,
  RestorePointReader,
  VirtualMachineClient,
  VirtualMachineRef,
} from "../ports/cluster.js";

export interface ClassifyOptions {
  readonly vmOnly?: boolean;
  readonly deletedOnly?: boolean;
}

export interface ClassifiedRestorePoint {
  readonly model: RestorePointModel;
  /** Whether the labeled VM is currently present in the cluster. */
  readonly active: boolean;
}

export interface DiscoveredDisk {
  readonly name: string;
  readonly size: string;
  readonly type: "CSI Snapshot" | "Export";
}

export interface DiscoveredRestorePoint {
  readonly name: string;
  readonly vm: string;
  readonly namespace: string;
  readonly state: "Running" | "Stopped";
  readonly resources: string;
  readonly disks: readonly DiscoveredDisk[];
  readonly macPreserved: string;
  readonly freezeAnnotation: string;
  readonly restoreMethods: string;
}

export function vmKey(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

export function buildActiveVmIndex(vms: readonly VirtualMachineRef[]): ReadonlySet<string> {
  return new Set(vms.map((vm) => vmKey(vm.namespace, vm.name)));
}

/** Filters restore points against the active VM index, keeping input order. */
export function classifyRestorePoints(
  docs: readonly unknown[],
  activeVms: ReadonlySet<string>,
  options: ClassifyOptions = {},
): ClassifiedRestorePoint[] {
  const vmOnly = options.vmOnly ?? true;
  const result: ClassifiedRestorePoint[] = [];

  for (const doc of docs) {
    const model = parseRestorePoint(doc);
    const name = labelValue(model, APP_NAME_LABEL);
    const namespace = labelValue(model, APP_NAMESPACE_LABEL);
    const active = name !== null && namespace !== null && activeVms.has(vmKey(namespace, name));

    if (vmOnly && !model.hasVirtualMachineArtifact && !active) {
      continue;
    }
    if (options.deletedOnly && active) {
      continue;
    }
    result.push({ model, active });
  }

  return result;
}

export function projectRestorePoint(model: RestorePointModel): DiscoveredRestorePoint {
  const methods = (["Snapshot", "Export"] as const).filter((method) =>
    model.restoreMethodsAvailable.has(method),
  );

  return {
    name: model.name,
    vm: model.sourceVMName,
    namespace: model.sourceNamespace,
    state: model.vmRunningAtBackup ? "Running" : "Stopped",
    resources: `CPU: ${model.vmResources.cpuCores}, Memory: ${model.vmResources.memory}`,
    disks: model.disks.map((disk) => ({
      name: disk.name,
      size: disk.requestedSize,
      type: disk.hasSnapshotArtifact ? "CSI Snapshot" : "Export",
    })),
    macPreserved:
      model.macAddresses.length > 0 ? `Yes (${model.macAddresses.join(", ")})` : "No",
    freezeAnnotation: model.freezeAnnotationPresent ? `${FREEZE_ANNOTATION}=true` : "None",
    restoreMethods: `[${methods.join(",")}]`,
  };
}

export interface TextFormatOptions {
  readonly showDisks?: boolean;
}

export function formatDiscoveryText(
  items: readonly DiscoveredRestorePoint[],
  options: TextFormatOptions = {},
): string {
  const lines = [`VM RESTORE POINTS FOUND: ${items.length}`, ""];

  for (const item of items) {
    lines.push(
      `Name: ${item.name}`,
      `├─ VM: ${item.vm}`,
      `├─ Namespace: ${item.namespace}`,
      `├─ State: ${item.state}`,
      `├─ Resources: ${item.resources}`,
    );
    if (options.showDisks ?? true) {
      lines.push("├─ Disks:");
      if (item.disks.length === 0) {
        lines.push("│  └─ No disks found");
      }
      item.disks.forEach((disk, index) => {
        const branch = index === item.disks.length - 1 ? "└─" : "├─";
        lines.push(`│  ${branch} ${disk.name} (${disk.size}) - ${disk.type}`);
      });
    }
    lines.push(
      `├─ MAC Preserved: ${item.macPreserved}`,
      `├─ Freeze Annotation: ${item.freezeAnnotation}`,
      `└─ Restore Methods: ${item.restoreMethods}`,
      "",
    );
  }

  return lines.join("\n");
}

export function formatDiscoveryJson(items: readonly DiscoveredRestorePoint[]): {
  readonly total: number;
  readonly restorePoints: readonly DiscoveredRestorePoint[];
} {
  return { total: items.length, restorePoints: items };
}

export interface DiscoveryRequest extends ClassifyOptions {
  readonly filter?: RestorePointFilter;
}

export interface DiscoveryDeps {
  readonly restorePoints: RestorePointReader;
  readonly virtualMachines: VirtualMachineClient;
  readonly logger: Logger;
}

export class DiscoveryService {
  private readonly logger: Logger;

  constructor(private readonly deps: DiscoveryDeps) {
    this.logger = deps.logger.child({ component: "discovery" });
  }

  async discover(request: DiscoveryRequest = {}): Promise<DiscoveredRestorePoint[]> {
    this.logger.info("discovering VM restore points");
    const docs = await this.deps.restorePoints.listRestorePoints(request.filter);
    if (docs.length === 0) {
      this.logger.warn("no restore points found");
      return [];
    }
    this.logger.info(`found ${docs.length} restore point(s), filtering for VMs`);

    const vmOnly = request.vmOnly ?? true;
    const activeVms =
      vmOnly || request.deletedOnly
        ? buildActiveVmIndex(await this.deps.virtualMachines.listVirtualMachines())
        : new Set<string>();

    const items = classifyRestorePoints(docs, activeVms, {
      vmOnly,
      deletedOnly: request.deletedOnly,
    }).map((entry) => projectRestorePoint(entry.model));

    if (items.length === 0) {
      this.logger.warn(
        request.deletedOnly
          ? "no deleted VMs with restore points found"
          : "no VM restore points found",
      );
    }
    return items;
  }
}
