import type { ResolvedNames } from "../domain/restore-session.js";

export const MAX_NAME_LENGTH = 63;
const RESTORE_POINT_SEGMENT_LENGTH = 20;
const MAX_CLONE_INDEX = 99;

export type NameExists = (name: string, namespace: string) => Promise<boolean>;

/**
 * Kubernetes-safe name: lowercase, `[a-z0-9-]` only, at most 63 characters,
 * no trailing dash. Idempotent.
 */
export function sanitizeName(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .slice(0, MAX_NAME_LENGTH)
    .replace(/-+$/, "");
}

/**
 * First free clone name for `base` in `namespace`. Every candidate is checked
 * against the cluster at the moment it is tried.
 */
export async function resolveCloneName(
  base: string,
  namespace: string,
  exists: NameExists,
  now: () => Date = () => new Date(),
): Promise<string> {
  const first = sanitizeName(`${base}-clone`);
  if (!(await exists(first, namespace))) {
    return first;
  }

  for (let index = 2; index <= MAX_CLONE_INDEX; index += 1) {
    const candidate = sanitizeName(`${base}-clone-${index}`);
    if (!(await exists(candidate, namespace))) {
      return candidate;
    }
  }

  // Not checked; only reached when 98 clones already exist.
  const seconds = Math.floor(now().getTime() / 1000);
  return sanitizeName(`${base}-clone-${seconds}`);
}

export function computeRestoreNames(
  vmName: string,
  restorePoint: string,
): ResolvedNames {
  const segment = sanitizeName(restorePoint).slice(0, RESTORE_POINT_SEGMENT_LENGTH);
  return {
    transformSetName: sanitizeName(`vm-restore-transforms-${vmName}-${segment}`),
    restoreActionName: sanitizeName(`restore-${vmName}-${segment}`),
    finalVMName: vmName,
  };
}
