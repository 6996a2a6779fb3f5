import type { RestoreActionManifest } from "../domain/restore-action.js";

export interface RestorePointFilter {
  readonly vmName?: string;
  readonly namespace?: string;
  readonly labelSelector?: string;
}

export interface RestorePointReader {
  /** Raw RestorePointContent document, or null when it does not exist. */
  getRestorePoint(name: string): Promise<unknown | null>;
  listRestorePoints(filter?: RestorePointFilter): Promise<readonly unknown[]>;
}

export interface ResourceQuotaSummary {
  readonly name: string;
  readonly hard: Readonly<Record<string, string>>;
  readonly used: Readonly<Record<string, string>>;
}

export interface ClusterInspector {
  crdExists(name: string): Promise<boolean>;
  storageClassExists(name: string): Promise<boolean>;
  namespaceExists(name: string): Promise<boolean>;
  hasK10SnapshotClass(): Promise<boolean>;
  listResourceQuotas(namespace: string): Promise<readonly ResourceQuotaSummary[]>;
  resolveK10Namespace(): Promise<string>;
}

export interface NamespaceManager {
  createNamespace(name: string, labels: Readonly<Record<string, string>>): Promise<void>;
}

export interface TransformSetClient {
  /** Deletes the TransformSet; a missing object is not an error. */
  deleteTransformSet(name: string, namespace: string): Promise<void>;
}

export interface TransformApplier {
  applyFile(filePath: string): Promise<void>;
}

export interface RestoreActionClient {
  restoreActionExists(name: string, namespace: string): Promise<boolean>;
  createRestoreAction(manifest: RestoreActionManifest): Promise<void>;
  /** Deletes the RestoreAction; a missing object is not an error. */
  deleteRestoreAction(name: string, namespace: string): Promise<void>;
  /** `.status.state`, or null when absent. */
  getRestoreActionState(name: string, namespace: string): Promise<string | null>;
  /** Full object dump for diagnostics. */
  describeRestoreAction(name: string, namespace: string): Promise<string>;
}

export interface VirtualMachineRef {
  readonly name: string;
  readonly namespace: string;
}

export interface VirtualMachineSummary extends VirtualMachineRef {
  readonly running: boolean;
  readonly dataVolumeNames: readonly string[];
}

export interface DataVolumeStatus {
  readonly phase: string | null;
  readonly claimName: string | null;
}

export interface VirtualMachineClient {
  virtualMachineExists(name: string, namespace: string): Promise<boolean>;
  getVirtualMachine(name: string, namespace: string): Promise<VirtualMachineSummary | null>;
  /** Every VirtualMachine in every namespace, in one call. */
  listVirtualMachines(): Promise<readonly VirtualMachineRef[]>;
  setVirtualMachineRunning(name: string, namespace: string, running: boolean): Promise<void>;
  virtualMachineInstanceExists(name: string, namespace: string): Promise<boolean>;
  getDataVolume(name: string, namespace: string): Promise<DataVolumeStatus | null>;
  getPersistentVolumeClaimPhase(name: string, namespace: string): Promise<string | null>;
}

export type ClusterClient = RestorePointReader &
  ClusterInspector &
  NamespaceManager &
  TransformSetClient &
  TransformApplier &
  RestoreActionClient &
  VirtualMachineClient;
