import { APP_NAME_LABEL, APP_NAMESPACE_LABEL } from "./restore-point.js";

export const RESTORE_ACTION_API_VERSION = "actions.kio.kasten.io/v1alpha1";
export const CREATED_BY_LABEL = "vm-recovery.io/created-by";
export const CREATED_AT_ANNOTATION = "vm-recovery.io/created-at";
export const CREATED_AT_LABEL = CREATED_AT_ANNOTATION;
export const SOURCE_RESTORE_POINT_ANNOTATION = "vm-recovery.io/source-restore-point";

export interface RestoreActionManifest {
  readonly apiVersion: typeof RESTORE_ACTION_API_VERSION;
  readonly kind: "RestoreAction";
  readonly metadata: {
    readonly name: string;
    readonly namespace: string;
    readonly labels: Readonly<Record<string, string>>;
    readonly annotations: Readonly<Record<string, string>>;
  };
  readonly spec: {
    readonly subject: {
      readonly namespace: string;
      readonly restorePointContentName: string;
    };
    readonly transforms: readonly {
      readonly name: string;
      readonly namespace: string;
    }[];
  };
}

export interface RestoreActionInput {
  readonly name: string;
  readonly targetNamespace: string;
  readonly vmName: string;
  readonly restorePoint: string;
  readonly transformSetName: string;
  readonly transformSetNamespace: string;
  readonly createdAt: Date;
}

export function buildRestoreActionManifest(
  input: RestoreActionInput,
): RestoreActionManifest {
  return {
    apiVersion: RESTORE_ACTION_API_VERSION,
    kind: "RestoreAction",
    metadata: {
      name: input.name,
      namespace: input.targetNamespace,
      labels: {
        [APP_NAME_LABEL]: input.vmName,
        [APP_NAMESPACE_LABEL]: input.targetNamespace,
        [CREATED_BY_LABEL]: "vm-recovery-restore",
      },
      annotations: {
        [SOURCE_RESTORE_POINT_ANNOTATION]: input.restorePoint,
        [CREATED_AT_ANNOTATION]: formatTimestamp(input.createdAt),
      },
    },
    spec: {
      subject: {
        namespace: input.targetNamespace,
        restorePointContentName: input.restorePoint,
      },
      transforms: [
        {
          name: input.transformSetName,
          namespace: input.transformSetNamespace,
        },
      ],
    },
  };
}

/** UTC timestamp without milliseconds, e.g. 2026-10-19T08:30:00Z. */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}
