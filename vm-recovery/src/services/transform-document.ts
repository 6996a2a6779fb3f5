import { Document, parseAllDocuments } from "yaml";
import { z } from "zod";
import { formatTimestamp } from "../domain/restore-action.js";
import { TRANSFORM_SET_API_VERSION, type TransformRule } from "../domain/transform.js";
import type { TransformInput } from "./transform-synthesizer.js";

export const SOURCE_VM_LABEL = "vm-recovery.io/source-vm";
export const SOURCE_NAMESPACE_LABEL = "vm-recovery.io/source-namespace";
export const GENERATED_BY_LABEL = "vm-recovery.io/generated-by";
export const RESTORE_POINT_ANNOTATION = "vm-recovery.io/restore-point";
export const GENERATED_AT_ANNOTATION = "vm-recovery.io/generated-at";

export interface TransformSetDocumentInput {
  readonly name: string;
  /** K10 namespace the TransformSet lives in. */
  readonly namespace: string;
  readonly restorePoint: string;
  readonly sourceVMName: string;
  readonly sourceNamespace: string;
  readonly rules: readonly TransformRule[];
  readonly options: TransformInput;
  readonly generatedAt: Date;
  readonly generatedBy?: string;
}

export function renderTransformSet(input: TransformSetDocumentInput): string {
  const document = new Document({
    apiVersion: TRANSFORM_SET_API_VERSION,
    kind: "TransformSet",
    metadata: {
      name: input.name,
      namespace: input.namespace,
      labels: {
        [SOURCE_VM_LABEL]: input.sourceVMName,
        [SOURCE_NAMESPACE_LABEL]: input.sourceNamespace,
        [GENERATED_BY_LABEL]: input.generatedBy ?? "vm-recovery",
      },
      annotations: {
        [RESTORE_POINT_ANNOTATION]: input.restorePoint,
        [GENERATED_AT_ANNOTATION]: formatTimestamp(input.generatedAt),
      },
    },
    spec: {
      transforms: input.rules.map((rule) => ({
        subject: { ...rule.subject },
        json: rule.json.map((operation) => ({ ...operation })),
      })),
    },
  });

  document.commentBefore = summarize(input)
    .map((line) => (line.length > 0 ? ` ${line}` : ""))
    .join("\n");

  return document.toString();
}

export function summarize(input: TransformSetDocumentInput): string[] {
  const { options } = input;
  const steps = [
    "Disable CDI import/clone operations on DataVolumes",
    "Add CDI bound annotations to PVCs",
    "Clear dataVolumeTemplates on the VirtualMachine",
  ];
  if (options.newStorageClass) {
    steps.push(`Update storage class to: ${options.newStorageClass}`);
  }
  for (const [disk, size] of Object.entries(options.resizeDisks ?? {})) {
    steps.push(`Resize disk ${disk} to: ${size}`);
  }
  if (options.targetNamespace && options.targetNamespace !== options.sourceNamespace) {
    steps.push(`Change target namespace to: ${options.targetNamespace}`);
  }
  if (options.regenerateMac) {
    steps.push("Remove MAC addresses (new ones will be generated)");
  }
  if (options.vmNameOverride) {
    steps.push(`Override VM name to: ${options.vmNameOverride}`);
  }

  return [
    "VM restore TransformSet",
    `Source VM: ${input.sourceVMName}`,
    `Source namespace: ${input.sourceNamespace}`,
    `Restore point: ${input.restorePoint}`,
    "",
    "This TransformSet will:",
    ...steps.map((step, index) => `${index + 1}. ${step}`),
  ];
}

const transformSetHeaderSchema = z.object({
  kind: z.literal("TransformSet"),
  metadata: z.object({ name: z.string().trim().min(1) }),
});

/** Name of the first TransformSet in a (possibly multi-document) YAML file. */
export function readTransformSetName(content: string): string | null {
  for (const document of parseAllDocuments(content)) {
    if (document.errors.length > 0) {
      continue;
    }
    const header = transformSetHeaderSchema.safeParse(document.toJS());
    if (header.success) {
      return header.data.metadata.name;
    }
  }
  return null;
}
