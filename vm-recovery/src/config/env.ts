import { z } from "zod";
import type { LogFormat } from "../observability/logger.js";

const positiveMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  VM_RECOVERY_KUBECTL: z.string().trim().min(1).default("kubectl"),
  VM_RECOVERY_KUBECONFIG: z.string().trim().min(1).optional(),
  VM_RECOVERY_CONTEXT: z.string().trim().min(1).optional(),
  VM_RECOVERY_K10_NAMESPACE: z.string().trim().min(1).optional(),
  VM_RECOVERY_POLL_INTERVAL_MS: positiveMs(10_000),
  VM_RECOVERY_RESTORE_TIMEOUT_MS: positiveMs(600_000),
  VM_RECOVERY_VM_WAIT_TIMEOUT_MS: positiveMs(300_000),
  VM_RECOVERY_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(10_000),
  VM_RECOVERY_LOG_FORMAT: z.enum(["json", "text"]).default("text"),
});

export interface RecoveryConfig {
  readonly kubectlBinary: string;
  readonly kubeconfig?: string;
  readonly kubeContext?: string;
  /** Fixed K10 namespace; discovered from the cluster when unset. */
  readonly k10Namespace?: string;
  readonly pollIntervalMs: number;
  readonly restoreTimeoutMs: number;
  readonly vmWaitTimeoutMs: number;
  readonly settleDelayMs: number;
  readonly logFormat: LogFormat;
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RecoveryConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const value = parsed.data;
  return {
    kubectlBinary: value.VM_RECOVERY_KUBECTL,
    kubeconfig: value.VM_RECOVERY_KUBECONFIG,
    kubeContext: value.VM_RECOVERY_CONTEXT,
    k10Namespace: value.VM_RECOVERY_K10_NAMESPACE,
    pollIntervalMs: value.VM_RECOVERY_POLL_INTERVAL_MS,
    restoreTimeoutMs: value.VM_RECOVERY_RESTORE_TIMEOUT_MS,
    vmWaitTimeoutMs: value.VM_RECOVERY_VM_WAIT_TIMEOUT_MS,
    settleDelayMs: value.VM_RECOVERY_SETTLE_DELAY_MS,
    logFormat: value.VM_RECOVERY_LOG_FORMAT,
  };
}

function blankToUndefined(
  env: Record<string, string | undefined>,
): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === undefined || value.trim().length === 0 ? undefined : value;
  }
  return result;
}
