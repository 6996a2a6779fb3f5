export { createRecoveryApp, type CreateRecoveryAppOptions, type RecoveryApp } from "./app.js";
export { createProgram, toRestoreOptions } from "./cli.js";
export { loadConfig, ConfigError, type RecoveryConfig } from "./config/env.js";
export { RestoreError, RestoreOptionsError, type RestoreFailureKind } from "./domain/errors.js";
export { buildRestoreActionManifest, type RestoreActionManifest } from "./domain/restore-action.js";
export {
  parseRestoreOptions,
  parseResizeSpecs,
  type RestoreOptions,
  type RestoreOptionsInput,
} from "./domain/restore-options.js";
export { parseRestorePoint, type RestorePointModel } from "./domain/restore-point.js";
export type { RestorePhase, RestoreSession, ResolvedNames } from "./domain/restore-session.js";
export type { JsonPatchOperation, TransformRule } from "./domain/transform.js";
export { KubectlClusterClient, KubectlCommandError } from "./adapters/kubectl-cluster-client.js";
export { createLogger, type Logger } from "./observability/logger.js";
export type { ClusterClient } from "./ports/cluster.js";
export {
  DiscoveryService,
  buildActiveVmIndex,
  classifyRestorePoints,
  formatDiscoveryJson,
  formatDiscoveryText,
} from "./services/discovery.js";
export { computeRestoreNames, resolveCloneName, sanitizeName } from "./services/name-resolver.js";
export {
  RestoreOrchestrator,
  type RestoreOutcome,
  type RestoreOutcomeKind,
} from "./services/restore-orchestrator.js";
export { renderTransformSet, readTransformSetName } from "./services/transform-document.js";
export { synthesizeTransforms } from "./services/transform-synthesizer.js";
