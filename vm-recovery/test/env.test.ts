import { describe, expect, test } from "vitest";
import { ConfigError, loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  test("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      kubectlBinary: "kubectl",
      kubeconfig: undefined,
      kubeContext: undefined,
      k10Namespace: undefined,
      pollIntervalMs: 10_000,
      restoreTimeoutMs: 600_000,
      vmWaitTimeoutMs: 300_000,
      settleDelayMs: 10_000,
      logFormat: "text",
    });
  });

  test("should read overrides and treat blank values as unset", () => {
    const config = loadConfig({
      VM_RECOVERY_KUBECTL: "/usr/local/bin/oc",
      VM_RECOVERY_CONTEXT: "lab",
      VM_RECOVERY_K10_NAMESPACE: "  ",
      VM_RECOVERY_RESTORE_TIMEOUT_MS: "1200000",
      VM_RECOVERY_SETTLE_DELAY_MS: "0",
      VM_RECOVERY_LOG_FORMAT: "json",
    });

    expect(config.kubectlBinary).toBe("/usr/local/bin/oc");
    expect(config.kubeContext).toBe("lab");
    expect(config.k10Namespace).toBeUndefined();
    expect(config.restoreTimeoutMs).toBe(1_200_000);
    expect(config.settleDelayMs).toBe(0);
    expect(config.logFormat).toBe("json");
  });

  test("should reject invalid values with every issue listed", () => {
    let caught: unknown;
    try {
      loadConfig({ VM_RECOVERY_POLL_INTERVAL_MS: "-5", VM_RECOVERY_LOG_FORMAT: "xml" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^VM_RECOVERY_POLL_INTERVAL_MS: /);
      expect(caught.issues[1]).toMatch(/^VM_RECOVERY_LOG_FORMAT: /);
    }
  });
});
