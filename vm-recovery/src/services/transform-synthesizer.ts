import {
  DATA_VOLUME_RESOURCE,
  VIRTUAL_MACHINE_RESOURCE,
  type RestorePointModel,
} from "../domain/restore-point.js";
import {
  MATCH_ALL,
  exactNameRegex,
  jsonPointer,
  type JsonPatchOperation,
  type TransformRule,
} from "../domain/transform.js";

const POPULATED_FOR_ANNOTATION = "cdi.kubevirt.io/storage.populatedFor";
const BOUND_ANNOTATION = "cdi.kubevirt.io/storage.condition.bound";
const BOUND_REASON_ANNOTATION = "cdi.kubevirt.io/storage.condition.bound.reason";
const PVC_RESOURCE = "persistentvolumeclaims";

export interface TransformInput {
  readonly regenerateMac?: boolean;
  readonly newStorageClass?: string;
  /** Name the restored VM should carry when it differs from the source. */
  readonly vmNameOverride?: string;
  readonly sourceNamespace?: string;
  readonly targetNamespace?: string;
  /** Disk name → requested storage quantity. */
  readonly resizeDisks?: Readonly<Record<string, string>>;
}

/**
 * Rules that keep CDI from re-importing disks K10 already restored, plus the
 * optional rename, relocation, storage class and resize rewrites.
 */
export function synthesizeTransforms(
  model: RestorePointModel,
  input: TransformInput,
): TransformRule[] {
  const resizes = Object.entries(input.resizeDisks ?? {});
  const rules: TransformRule[] = [];

  const dataVolumeOps: JsonPatchOperation[] = [
    { op: "remove", path: "/spec/source" },
    {
      op: "add",
      path: jsonPointer("metadata", "annotations", POPULATED_FOR_ANNOTATION),
      value: "{{.spec.pvc.name}}",
    },
  ];
  if (input.newStorageClass) {
    dataVolumeOps.push({
      op: "replace",
      path: "/spec/pvc/storageClassName",
      value: input.newStorageClass,
    });
  }
  rules.push({
    subject: {
      resource: DATA_VOLUME_RESOURCE.kind,
      group: DATA_VOLUME_RESOURCE.group,
      resourceNameRegex: MATCH_ALL,
    },
    json: dataVolumeOps,
  });

  for (const [disk, size] of resizes) {
    rules.push({
      subject: {
        resource: DATA_VOLUME_RESOURCE.kind,
        group: DATA_VOLUME_RESOURCE.group,
        resourceNameRegex: exactNameRegex(disk),
      },
      json: [
        { op: "replace", path: "/spec/pvc/resources/requests/storage", value: size },
      ],
    });
  }

  const claimOps: JsonPatchOperation[] = [
    {
      op: "add",
      path: jsonPointer("metadata", "annotations", BOUND_ANNOTATION),
      value: "true",
    },
    {
      op: "add",
      path: jsonPointer("metadata", "annotations", BOUND_REASON_ANNOTATION),
      value: "Bound",
    },
  ];
  if (input.newStorageClass) {
    claimOps.push({
      op: "replace",
      path: "/spec/storageClassName",
      value: input.newStorageClass,
    });
  }
  rules.push({
    subject: { resource: PVC_RESOURCE, resourceNameRegex: MATCH_ALL },
    json: claimOps,
  });

  for (const [disk, size] of resizes) {
    rules.push({
      subject: { resource: PVC_RESOURCE, resourceNameRegex: exactNameRegex(disk) },
      json: [{ op: "replace", path: "/spec/resources/requests/storage", value: size }],
    });
  }

  const vmOps: JsonPatchOperation[] = [
    { op: "replace", path: "/spec/dataVolumeTemplates", value: [] },
  ];
  if (input.regenerateMac) {
    for (const index of model.macInterfaceIndexes) {
      vmOps.push({
        op: "remove",
        path: jsonPointer(
          "spec",
          "template",
          "spec",
          "domain",
          "devices",
          "interfaces",
          index,
          "macAddress",
        ),
      });
    }
  }
  if (input.vmNameOverride) {
    vmOps.push({ op: "replace", path: "/metadata/name", value: input.vmNameOverride });
  }
  rules.push({
    subject: {
      resource: VIRTUAL_MACHINE_RESOURCE.kind,
      group: VIRTUAL_MACHINE_RESOURCE.group,
      resourceNameRegex: MATCH_ALL,
    },
    json: vmOps,
  });

  if (input.targetNamespace && input.targetNamespace !== input.sourceNamespace) {
    rules.push({
      subject: { resourceNameRegex: MATCH_ALL },
      json: [
        { op: "replace", path: "/metadata/namespace", value: input.targetNamespace },
      ],
    });
  }

  return rules;
}
