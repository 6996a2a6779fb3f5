import { KubectlClusterClient } from "./adapters/kubectl-cluster-client.js";
import { systemClock } from "./adapters/system-clock.js";
import { TempTransformStore } from "./adapters/temp-transform-store.js";
import { TerminalConfirmer } from "./adapters/terminal-confirmer.js";
import { loadConfig, type RecoveryConfig } from "./config/env.js";
import { createLogger, type Logger } from "./observability/logger.js";
import type { Clock } from "./ports/clock.js";
import type { ClusterClient } from "./ports/cluster.js";
import type { Confirmer } from "./ports/confirmer.js";
import type { TransformDocumentStore } from "./ports/transform-store.js";
import { DiscoveryService } from "./services/discovery.js";
import { RestoreOrchestrator } from "./services/restore-orchestrator.js";
import type { RestorePlan } from "./services/restore-plan.js";
import { TransformGenerator } from "./services/transform-generator.js";

export interface CreateRecoveryAppOptions {
  readonly config?: RecoveryConfig;
  readonly cluster?: ClusterClient;
  readonly transformStore?: TransformDocumentStore;
  readonly confirmer?: Confirmer;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly onPlan?: (plan: RestorePlan) => void;
}

export interface RecoveryApp {
  readonly config: RecoveryConfig;
  readonly logger: Logger;
  readonly orchestrator: RestoreOrchestrator;
  readonly discovery: DiscoveryService;
  readonly transformGenerator: TransformGenerator;
}

export function createRecoveryApp(options: CreateRecoveryAppOptions = {}): RecoveryApp {
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ??
    createLogger({ component: "vm-recovery" }, { format: config.logFormat, stderrOnly: true });
  const cluster =
    options.cluster ??
    new KubectlClusterClient({
      kubectlBinary: config.kubectlBinary,
      kubeconfig: config.kubeconfig,
      context: config.kubeContext,
      k10Namespace: config.k10Namespace,
    });
  const clock = options.clock ?? systemClock;

  const orchestrator = new RestoreOrchestrator({
    restorePoints: cluster,
    inspector: cluster,
    namespaces: cluster,
    transformSets: cluster,
    transformApplier: cluster,
    restoreActions: cluster,
    virtualMachines: cluster,
    transformStore: options.transformStore ?? new TempTransformStore(),
    confirmer: options.confirmer ?? new TerminalConfirmer(),
    clock,
    logger,
    timing: {
      pollIntervalMs: config.pollIntervalMs,
      restoreTimeoutMs: config.restoreTimeoutMs,
      vmWaitTimeoutMs: config.vmWaitTimeoutMs,
      settleDelayMs: config.settleDelayMs,
    },
    onPlan: options.onPlan,
  });

  return {
    config,
    logger,
    orchestrator,
    discovery: new DiscoveryService({
      restorePoints: cluster,
      virtualMachines: cluster,
      logger,
    }),
    transformGenerator: new TransformGenerator({
      restorePoints: cluster,
      inspector: cluster,
      clock,
      logger,
    }),
  };
}
