import type { RestoreActionManifest } from "../../src/domain/restore-action.js";
import type { LogContext, Logger } from "../../src/observability/logger.js";
import type { Clock } from "../../src/ports/clock.js";
import type {
  ClusterClient,
  DataVolumeStatus,
  ResourceQuotaSummary,
  RestorePointFilter,
  VirtualMachineRef,
  VirtualMachineSummary,
} from "../../src/ports/cluster.js";
import type { Confirmer } from "../../src/ports/confirmer.js";
import type { TransformDocumentStore } from "../../src/ports/transform-store.js";

type FailableMethod = keyof ClusterClient;

export const MUTATING_METHODS: readonly FailableMethod[] = [
  "createNamespace",
  "deleteTransformSet",
  "applyFile",
  "createRestoreAction",
  "deleteRestoreAction",
  "setVirtualMachineRunning",
];

function key(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

export class FakeCluster implements ClusterClient {
  readonly calls: string[] = [];
  readonly restorePoints = new Map<string, unknown>();
  readonly crds = new Set([
    "restorepointcontents.apps.kio.kasten.io",
    "virtualmachines.kubevirt.io",
    "datavolumes.cdi.kubevirt.io",
  ]);
  readonly storageClasses = new Set<string>();
  readonly namespaces = new Set<string>(["kasten-io"]);
  readonly quotas = new Map<string, ResourceQuotaSummary[]>();
  readonly transformSets = new Set<string>();
  readonly appliedFiles: string[] = [];
  readonly restoreActions = new Map<string, RestoreActionManifest | null>();
  readonly createdActions: RestoreActionManifest[] = [];
  readonly vms = new Map<string, VirtualMachineSummary>();
  readonly vmis = new Set<string>();
  readonly dataVolumes = new Map<string, DataVolumeStatus>();
  readonly claimPhases = new Map<string, string>();
  readonly failures = new Map<FailableMethod, Error>();
  readonly restorePointFilters: RestorePointFilter[] = [];
  readonly vmExistenceChecks: string[] = [];

  snapshotClass = true;
  k10Namespace = "kasten-io";
  /** States returned by successive state reads; the last one repeats. */
  actionStates: (string | null)[] = ["Complete"];
  /** Whether a completed RestoreAction makes its VM, disks and instance appear. */
  materializeOnComplete = true;
  materializeInstance = true;
  restoredDisks: readonly string[] = ["rootdisk"];
  restoredDataVolumePhase = "Succeeded";
  listVirtualMachinesCalls = 0;
  actionDump = "kind: RestoreAction\nstatus:\n  state: Failed\n";

  get mutatingCalls(): string[] {
    return this.calls.filter((call) =>
      MUTATING_METHODS.some((method) => call.startsWith(`${method}:`)),
    );
  }

  seedVm(name: string, namespace: string, running = true, dataVolumeNames: readonly string[] = []): void {
    this.vms.set(key(namespace, name), { name, namespace, running, dataVolumeNames });
  }

  async getRestorePoint(name: string): Promise<unknown | null> {
    this.record("getRestorePoint", name);
    return this.restorePoints.get(name) ?? null;
  }

  async listRestorePoints(filter: RestorePointFilter = {}): Promise<readonly unknown[]> {
    this.record("listRestorePoints");
    this.restorePointFilters.push(filter);
    return [...this.restorePoints.values()];
  }

  async crdExists(name: string): Promise<boolean> {
    this.record("crdExists", name);
    return this.crds.has(name);
  }

  async storageClassExists(name: string): Promise<boolean> {
    this.record("storageClassExists", name);
    return this.storageClasses.has(name);
  }

  async namespaceExists(name: string): Promise<boolean> {
    this.record("namespaceExists", name);
    return this.namespaces.has(name);
  }

  async hasK10SnapshotClass(): Promise<boolean> {
    this.record("hasK10SnapshotClass");
    return this.snapshotClass;
  }

  async listResourceQuotas(namespace: string): Promise<readonly ResourceQuotaSummary[]> {
    this.record("listResourceQuotas", namespace);
    return this.quotas.get(namespace) ?? [];
  }

  async resolveK10Namespace(): Promise<string> {
    this.record("resolveK10Namespace");
    return this.k10Namespace;
  }

  async createNamespace(name: string, labels: Readonly<Record<string, string>>): Promise<void> {
    this.record("createNamespace", name, Object.keys(labels).sort().join(","));
    this.namespaces.add(name);
  }

  async deleteTransformSet(name: string, namespace: string): Promise<void> {
    this.record("deleteTransformSet", namespace, name);
    this.transformSets.delete(key(namespace, name));
  }

  async applyFile(filePath: string): Promise<void> {
    this.record("applyFile", filePath);
    this.appliedFiles.push(filePath);
  }

  async restoreActionExists(name: string, namespace: string): Promise<boolean> {
    this.record("restoreActionExists", namespace, name);
    return this.restoreActions.has(key(namespace, name));
  }

  async createRestoreAction(manifest: RestoreActionManifest): Promise<void> {
    this.record("createRestoreAction", manifest.metadata.namespace, manifest.metadata.name);
    this.restoreActions.set(key(manifest.metadata.namespace, manifest.metadata.name), manifest);
    this.createdActions.push(manifest);
  }

  async deleteRestoreAction(name: string, namespace: string): Promise<void> {
    this.record("deleteRestoreAction", namespace, name);
    this.restoreActions.delete(key(namespace, name));
  }

  async getRestoreActionState(name: string, namespace: string): Promise<string | null> {
    this.record("getRestoreActionState", namespace, name);
    const state = this.actionStates.length > 1 ? this.actionStates.shift() : this.actionStates[0];
    const manifest = this.restoreActions.get(key(namespace, name));
    if (state === "Complete" && this.materializeOnComplete && manifest) {
      this.materialize(manifest);
    }
    return state ?? null;
  }

  async describeRestoreAction(name: string, namespace: string): Promise<string> {
    this.record("describeRestoreAction", namespace, name);
    return this.actionDump;
  }

  async virtualMachineExists(name: string, namespace: string): Promise<boolean> {
    this.record("virtualMachineExists", namespace, name);
    this.vmExistenceChecks.push(name);
    return this.vms.has(key(namespace, name));
  }

  async getVirtualMachine(name: string, namespace: string): Promise<VirtualMachineSummary | null> {
    this.record("getVirtualMachine", namespace, name);
    return this.vms.get(key(namespace, name)) ?? null;
  }

  async listVirtualMachines(): Promise<readonly VirtualMachineRef[]> {
    this.record("listVirtualMachines");
    this.listVirtualMachinesCalls += 1;
    return [...this.vms.values()].map(({ name, namespace }) => ({ name, namespace }));
  }

  async setVirtualMachineRunning(name: string, namespace: string, running: boolean): Promise<void> {
    this.record("setVirtualMachineRunning", namespace, name, String(running));
    const vm = this.vms.get(key(namespace, name));
    if (vm) {
      this.vms.set(key(namespace, name), { ...vm, running });
    }
  }

  async virtualMachineInstanceExists(name: string, namespace: string): Promise<boolean> {
    this.record("virtualMachineInstanceExists", namespace, name);
    return this.vmis.has(key(namespace, name));
  }

  async getDataVolume(name: string, namespace: string): Promise<DataVolumeStatus | null> {
    this.record("getDataVolume", namespace, name);
    return this.dataVolumes.get(key(namespace, name)) ?? null;
  }

  async getPersistentVolumeClaimPhase(name: string, namespace: string): Promise<string | null> {
    this.record("getPersistentVolumeClaimPhase", namespace, name);
    return this.claimPhases.get(key(namespace, name)) ?? null;
  }

  private materialize(manifest: RestoreActionManifest): void {
    const namespace = manifest.metadata.namespace;
    const name = manifest.metadata.labels["k10.kasten.io/appName"] ?? "";
    this.seedVm(name, namespace, true, this.restoredDisks);
    if (this.materializeInstance) {
      this.vmis.add(key(namespace, name));
    }
    for (const disk of this.restoredDisks) {
      this.dataVolumes.set(key(namespace, disk), {
        phase: this.restoredDataVolumePhase,
        claimName: disk,
      });
      this.claimPhases.set(key(namespace, disk), "Bound");
    }
  }

  private record(method: FailableMethod, ...args: string[]): void {
    this.calls.push([method, ...args].join(":"));
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }
}

export class FakeTransformStore implements TransformDocumentStore {
  readonly files = new Map<string, string>();
  readonly persisted: { name: string; content: string }[] = [];
  disposals = 0;
  persistFailure: Error | null = null;

  async persist(name: string, content: string): Promise<string> {
    if (this.persistFailure) {
      throw this.persistFailure;
    }
    const filePath = `/tmp/vm-recovery-test/${name}.yaml`;
    this.files.set(filePath, content);
    this.persisted.push({ name, content });
    return filePath;
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return content;
  }

  async dispose(): Promise<void> {
    this.disposals += 1;
  }
}

export class FakeConfirmer implements Confirmer {
  readonly questions: string[] = [];

  constructor(private readonly answers: boolean[] = []) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }
}

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: Date;

  constructor(start = new Date("2026-10-19T08:30:00.000Z")) {
    this.current = start;
  }

  now(): Date {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface LogRecord {
  readonly level: "info" | "warn" | "error";
  readonly message: string;
  readonly fields: LogContext;
}

export class RecordingLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly context: LogContext = {},
  ) {}

  child(context: LogContext): Logger {
    return new RecordingLogger(this.records, { ...this.context, ...context });
  }

  info(message: string, fields: LogContext = {}): void {
    this.records.push({ level: "info", message, fields: { ...this.context, ...fields } });
  }

  warn(message: string, fields: LogContext = {}): void {
    this.records.push({ level: "warn", message, fields: { ...this.context, ...fields } });
  }

  error(message: string, fields: LogContext = {}): void {
    this.records.push({ level: "error", message, fields: { ...this.context, ...fields } });
  }
}
