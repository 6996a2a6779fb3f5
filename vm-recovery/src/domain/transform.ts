export type JsonPatchOperation =
  | { readonly op: "add"; readonly path: string; readonly value: unknown }
  | { readonly op: "replace"; readonly path: string; readonly value: unknown }
  | { readonly op: "remove"; readonly path: string };

export interface TransformSubject {
  /** Plural resource name; omitted for rules that match every kind. */
  readonly resource?: string;
  readonly group?: string;
  readonly resourceNameRegex: string;
}

export interface TransformRule {
  readonly subject: TransformSubject;
  readonly json: readonly JsonPatchOperation[];
}

export const TRANSFORM_SET_API_VERSION = "config.kio.kasten.io/v1alpha1";
export const MATCH_ALL = ".*";

/** RFC 6901 pointer built from raw segments. */
export function jsonPointer(...segments: readonly (string | number)[]): string {
  return segments
    .map((segment) =>
      String(segment).replace(/~/g, "~0").replace(/\//g, "~1"),
    )
    .map((segment) => `/${segment}`)
    .join("");
}

export function exactNameRegex(name: string): string {
  return `^${name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}$`;
}
