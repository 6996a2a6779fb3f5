import { describe, expect, test } from "vitest";
import { labelValue, parseRestorePoint } from "../src/domain/restore-point.js";
import { restorePointDoc } from "./support/fixtures.js";

describe("restore-point", () => {
  test("should read identity, disks and VM details", () => {
    const model = parseRestorePoint(
      restorePointDoc({
        vm: { running: true, cores: 2, memory: "4Gi", macs: ["52:54:00:00:00:01"], freeze: true },
      }),
    );

    expect(model.name).toBe("rpc-rhel9-vm-1");
    expect(model.sourceVMName).toBe("rhel9-vm");
    expect(model.sourceNamespace).toBe("vms-prod");
    expect(model.disks).toEqual([
      { name: "rootdisk", requestedSize: "20Gi", hasSnapshotArtifact: true },
    ]);
    expect(model.vmRunningAtBackup).toBe(true);
    expect(model.vmResources).toEqual({ cpuCores: "2", memory: "4Gi" });
    expect(model.macAddresses).toEqual(["52:54:00:00:00:01"]);
    expect(model.freezeAnnotationPresent).toBe(true);
    expect(model.hasVirtualMachineArtifact).toBe(true);
    expect([...model.restoreMethodsAvailable]).toEqual(["Snapshot"]);
  });

  test("should default every missing field", () => {
    const model = parseRestorePoint({});

    expect(model.name).toBe("");
    expect(model.sourceVMName).toBe("unknown");
    expect(model.sourceNamespace).toBe("unknown");
    expect(model.disks).toEqual([]);
    expect(model.vmRunningAtBackup).toBe(false);
    expect(model.vmResources).toEqual({ cpuCores: "N/A", memory: "N/A" });
    expect(model.macAddresses).toEqual([]);
    expect(model.freezeAnnotationPresent).toBe(false);
    expect(model.restoreMethodsAvailable.size).toBe(0);
    expect(model.hasVirtualMachineArtifact).toBe(false);
  });

  test("should not throw on malformed input", () => {
    for (const raw of [null, 42, "text", [], { status: { restorePointContentDetails: "x" } }]) {
      expect(parseRestorePoint(raw).disks).toEqual([]);
    }
  });

  test("should take the disk size from metadata.spec and default to Unknown", () => {
    const model = parseRestorePoint(
      restorePointDoc({
        disks: [
          { name: "data", size: "100Gi", sizeUnderMetadata: true },
          { name: "scratch" },
        ],
      }),
    );

    expect(model.disks).toEqual([
      { name: "data", requestedSize: "100Gi", hasSnapshotArtifact: false },
      { name: "scratch", requestedSize: "Unknown", hasSnapshotArtifact: false },
    ]);
  });

  test("should accept a snapshot marker nested inside the artifact", () => {
    const model = parseRestorePoint({
      metadata: { name: "rpc-nested" },
      status: {
        restorePointContentDetails: {
          artifacts: [
            {
              resource: { group: "cdi.kubevirt.io", resource: "datavolumes", name: "rootdisk" },
              artifact: { volumeSnapshot: { name: "snap-1" } },
            },
          ],
        },
      },
    });

    expect(model.disks[0]?.hasSnapshotArtifact).toBe(true);
    expect(model.restoreMethodsAvailable.has("Snapshot")).toBe(true);
  });

  test("should collect MACs from every interface with their positions", () => {
    const model = parseRestorePoint(
      restorePointDoc({
        vm: { macs: ["52:54:00:00:00:01", null, "52:54:00:00:00:03"] },
      }),
    );

    expect(model.macAddresses).toEqual(["52:54:00:00:00:01", "52:54:00:00:00:03"]);
    expect(model.macInterfaceIndexes).toEqual([0, 2]);
  });

  test("should report Export only when export data is enabled", () => {
    const model = parseRestorePoint(
      restorePointDoc({ disks: [{ name: "rootdisk", size: "20Gi" }], exportEnabled: true }),
    );

    expect([...model.restoreMethodsAvailable]).toEqual(["Export"]);
    expect(model.exportEnabled).toBe(true);
  });

  test("should ignore artifacts of other kinds", () => {
    const doc = restorePointDoc({ vm: null });
    const model = parseRestorePoint({
      ...doc,
      status: {
        restorePointContentDetails: {
          artifacts: [
            { resource: { group: "", resource: "configmaps", name: "settings" }, artifact: {} },
            { resource: { group: "kubevirt.io", resource: "datavolumes", name: "wrong-group" } },
          ],
        },
      },
    });

    expect(model.disks).toEqual([]);
    expect(model.hasVirtualMachineArtifact).toBe(false);
    expect(model.artifacts).toHaveLength(2);
  });

  test("should return null for blank labels", () => {
    const model = parseRestorePoint(restorePointDoc({ vmName: null }));
    expect(labelValue(model, "k10.kasten.io/appName")).toBeNull();
    expect(labelValue(model, "k10.kasten.io/appNamespace")).toBe("vms-prod");
  });
});
