export interface DiskFixture {
  readonly name: string;
  readonly size?: string;
  readonly snapshot?: boolean;
  /** Put the size under `artifact.metadata.spec` instead of `artifact.spec`. */
  readonly sizeUnderMetadata?: boolean;
}

export interface VmFixture {
  readonly name?: string;
  readonly running?: boolean;
  readonly cores?: number | string;
  readonly memory?: string;
  readonly macs?: readonly (string | null)[];
  readonly freeze?: boolean;
}

export interface RestorePointFixture {
  readonly name?: string;
  readonly vmName?: string | null;
  readonly namespace?: string | null;
  readonly disks?: readonly DiskFixture[];
  readonly vm?: VmFixture | null;
  readonly exportEnabled?: boolean;
}

export const RESTORE_POINT = "rpc-rhel9-vm-1";
export const VM_NAME = "rhel9-vm";
export const NAMESPACE = "vms-prod";

/** RestorePointContent document shaped like the cluster returns it. */
export function restorePointDoc(fixture: RestorePointFixture = {}): Record<string, unknown> {
  const vmName = fixture.vmName === undefined ? VM_NAME : fixture.vmName;
  const namespace = fixture.namespace === undefined ? NAMESPACE : fixture.namespace;
  const labels: Record<string, string> = {};
  if (vmName !== null) {
    labels["k10.kasten.io/appName"] = vmName;
  }
  if (namespace !== null) {
    labels["k10.kasten.io/appNamespace"] = namespace;
  }

  const disks = fixture.disks ?? [{ name: "rootdisk", size: "20Gi", snapshot: true }];
  const artifacts: unknown[] = disks.map((disk) => {
    const pvc = disk.size ? { pvc: { resources: { requests: { storage: disk.size } } } } : {};
    return {
      resource: { group: "cdi.kubevirt.io", resource: "datavolumes", name: disk.name },
      artifact: disk.sizeUnderMetadata ? { metadata: { spec: pvc } } : { spec: pvc },
      ...(disk.snapshot ? { volumeSnapshot: { name: `snap-${disk.name}` } } : {}),
    };
  });

  const vm = fixture.vm === undefined ? { running: true } : fixture.vm;
  if (vm !== null) {
    const interfaces = (vm.macs ?? []).map((mac, index) =>
      mac === null ? { name: `nic-${index}` } : { name: `nic-${index}`, macAddress: mac },
    );
    const domain: Record<string, unknown> = { devices: { interfaces } };
    if (vm.cores !== undefined) {
      domain.cpu = { cores: vm.cores };
    }
    if (vm.memory !== undefined) {
      domain.resources = { requests: { memory: vm.memory } };
    }
    artifacts.push({
      resource: {
        group: "kubevirt.io",
        resource: "virtualmachines",
        name: vm.name ?? vmName ?? "vm",
      },
      artifact: {
        metadata: vm.freeze ? { annotations: { "k10.kasten.io/freezeVM": "true" } } : {},
        spec: {
          running: vm.running ?? false,
          template: { spec: { domain } },
        },
      },
    });
  }

  return {
    apiVersion: "apps.kio.kasten.io/v1alpha1",
    kind: "RestorePointContent",
    metadata: { name: fixture.name ?? RESTORE_POINT, labels },
    status: {
      restorePointContentDetails: {
        artifacts,
        exportData: { enabled: fixture.exportEnabled ?? false },
      },
    },
  };
}
