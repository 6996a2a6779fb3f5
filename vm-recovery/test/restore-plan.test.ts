import { describe, expect, test } from "vitest";
import { parseRestoreOptions, type RestoreOptionsInput } from "../src/domain/restore-options.js";
import { parseRestorePoint } from "../src/domain/restore-point.js";
import { computeRestoreNames } from "../src/services/name-resolver.js";
import {
  buildRestorePlan,
  formatRestorePlan,
  type RestorePlanInput,
} from "../src/services/restore-plan.js";
import { RESTORE_POINT, restorePointDoc } from "./support/fixtures.js";

function planInput(
  options: Partial<RestoreOptionsInput> = {},
  overrides: Partial<RestorePlanInput> = {},
): RestorePlanInput {
  return {
    model: parseRestorePoint(
      restorePointDoc({
        disks: [
          { name: "rootdisk", size: "20Gi", snapshot: true },
          { name: "datadisk", size: "100Gi", snapshot: true },
        ],
      }),
    ),
    options: parseRestoreOptions({ restorePoint: RESTORE_POINT, ...options }),
    sourceVMName: "rhel9-vm",
    sourceNamespace: "vms-prod",
    targetNamespace: "vms-prod",
    k10Namespace: "kasten-io",
    names: computeRestoreNames("rhel9-vm", RESTORE_POINT),
    conflict: "none",
    targetNamespaceExists: true,
    customTransformSetName: null,
    ...overrides,
  };
}

describe("restore-plan", () => {
  test("should describe a generated restore step by step", () => {
    const plan = buildRestorePlan(
      planInput({ newStorageClass: "fast-rbd", resizeDisks: { datadisk: "200Gi" } }),
    );

    expect(plan.transforms).toEqual({
      kind: "generated",
      transformSetName: "vm-restore-transforms-rhel9-vm-rpc-rhel9-vm-1",
    });
    expect(plan.disks).toEqual([
      { name: "rootdisk", size: "20Gi", resizeTo: null },
      { name: "datadisk", size: "100Gi", resizeTo: "200Gi" },
    ]);
    expect(formatRestorePlan(plan)).toEqual([
      "RESTORE PLAN",
      "Restore point: rpc-rhel9-vm-1",
      "Source: vms-prod/rhel9-vm",
      "Target: vms-prod/rhel9-vm",
      "",
      "1. Prepare target environment:",
      "   - Generate and apply VM-specific transforms",
      "   - TransformSet: vm-restore-transforms-rhel9-vm-rpc-rhel9-vm-1 (namespace kasten-io)",
      "",
      "2. Restore resources:",
      "   - DataVolume: rootdisk (20Gi)",
      "   - DataVolume: datadisk (100Gi)",
      "   - VirtualMachine: rhel9-vm",
      "   - RestoreAction: restore-rhel9-vm-rpc-rhel9-vm-1",
      "",
      "3. Post-restore actions:",
      "   - VM will start automatically",
      "",
      "Transform settings:",
      "   - New MAC addresses: false",
      "   - Storage class: fast-rbd",
      "   - Resize disk: datadisk=200Gi",
    ]);
  });

  test("should only plan namespace creation when the namespace is missing", () => {
    const missing = buildRestorePlan(
      planInput(
        { createNamespace: true },
        { targetNamespace: "vms-new", targetNamespaceExists: false },
      ),
    );
    const present = buildRestorePlan(planInput({ createNamespace: true }));

    expect(missing.createNamespace).toBe(true);
    expect(formatRestorePlan(missing)).toContain("   - Create namespace: vms-new");
    expect(present.createNamespace).toBe(false);
  });

  test("should name a custom transform file and its TransformSet", () => {
    const plan = buildRestorePlan(
      planInput(
        { transformFile: "/srv/custom.yaml", noStart: true },
        { customTransformSetName: "custom-transforms" },
      ),
    );
    const lines = formatRestorePlan(plan);

    expect(plan.transforms).toEqual({
      kind: "custom",
      file: "/srv/custom.yaml",
      transformSetName: "custom-transforms",
    });
    expect(lines).toContain("   - Apply custom transforms from: /srv/custom.yaml");
    expect(lines).toContain("   - TransformSet: custom-transforms (namespace kasten-io)");
    expect(lines).toContain("   - VM will remain stopped (--no-start)");
  });

  test("should announce a clone target", () => {
    const plan = buildRestorePlan(
      planInput({}, { conflict: "clone", names: computeRestoreNames("rhel9-vm-clone", RESTORE_POINT) }),
    );

    expect(formatRestorePlan(plan).slice(3, 5)).toEqual([
      "Target: vms-prod/rhel9-vm-clone",
      "Target VM exists; restoring as clone: rhel9-vm-clone",
    ]);
  });

  test("should show quota usage of the target namespace", () => {
    const plan = buildRestorePlan(
      planInput(
        {},
        {
          quotas: [
            {
              name: "compute",
              hard: { "requests.cpu": "8", "requests.memory": "32Gi" },
              used: { "requests.cpu": "2" },
            },
          ],
        },
      ),
    );
    const lines = formatRestorePlan(plan);
    const start = lines.indexOf("Resource quotas in vms-prod (used/hard):");

    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start, start + 3)).toEqual([
      "Resource quotas in vms-prod (used/hard):",
      "   - compute: requests.cpu 2/8",
      "   - compute: requests.memory 0/32Gi",
    ]);
  });

  test("should stop after the header when only verification runs", () => {
    const plan = buildRestorePlan(planInput({}, { conflict: "verify-only" }));

    expect(formatRestorePlan(plan)).toEqual([
      "RESTORE PLAN",
      "Restore point: rpc-rhel9-vm-1",
      "Source: vms-prod/rhel9-vm",
      "Target: vms-prod/rhel9-vm",
      "VM rhel9-vm already exists in vms-prod; restore is skipped and only verification runs",
    ]);
  });
});
