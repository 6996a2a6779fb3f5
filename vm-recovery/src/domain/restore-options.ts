import { z } from "zod";
import { RestoreOptionsError } from "./errors.js";

const QUANTITY_PATTERN = /^[0-9]+(\.[0-9]+)?(Ki|Mi|Gi|Ti|Pi|Ei|k|M|G|T|P|E)?$/;

const optionalText = z.string().trim().min(1).optional();

const restoreOptionsSchema = z
  .object({
    restorePoint: z.string().trim().min(1, "restore point name is required"),
    vmName: optionalText,
    namespace: optionalText,
    targetNamespace: optionalText,
    regenerateMac: z.boolean().default(false),
    newStorageClass: optionalText,
    resizeDisks: z
      .record(
        z.string().regex(QUANTITY_PATTERN, "size must be a storage quantity such as 50Gi"),
      )
      .default({}),
    noStart: z.boolean().default(false),
    cloneOnConflict: z.boolean().default(false),
    force: z.boolean().default(false),
    autoConfirm: z.boolean().default(false),
    transformFile: optionalText,
    createNamespace: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    validateOnly: z.boolean().default(false),
    restoreTimeoutMs: z.number().int().positive().optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.transformFile) {
      return;
    }
    if (value.regenerateMac) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["regenerateMac"],
        message: "cannot be combined with a custom transform file",
      });
    }
    if (Object.keys(value.resizeDisks).length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["resizeDisks"],
        message: "cannot be combined with a custom transform file",
      });
    }
    if (value.newStorageClass) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["newStorageClass"],
        message: "cannot be combined with a custom transform file",
      });
    }
  });

export type RestoreOptions = Readonly<z.output<typeof restoreOptionsSchema>>;
export type RestoreOptionsInput = z.input<typeof restoreOptionsSchema>;

export function parseRestoreOptions(input: RestoreOptionsInput): RestoreOptions {
  const parsed = restoreOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new RestoreOptionsError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}

/** Turns repeated `disk=size` arguments into a disk → size map. */
export function parseResizeSpecs(specs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  const issues: string[] = [];

  for (const spec of specs) {
    const separator = spec.indexOf("=");
    const disk = separator > 0 ? spec.slice(0, separator).trim() : "";
    const size = separator > 0 ? spec.slice(separator + 1).trim() : "";
    if (!disk || !size) {
      issues.push(`resize-disk: expected <disk>=<size>, got "${spec}"`);
      continue;
    }
    result[disk] = size;
  }

  if (issues.length > 0) {
    throw new RestoreOptionsError(issues);
  }
  return result;
}
