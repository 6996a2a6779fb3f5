import { execFile } from "node:child_process";
import { z } from "zod";
import type { RestoreActionManifest } from "../domain/restore-action.js";
import { APP_NAMESPACE_LABEL, APP_NAME_LABEL } from "../domain/restore-point.js";
import type {
  ClusterClient,
  DataVolumeStatus,
  ResourceQuotaSummary,
  RestorePointFilter,
  VirtualMachineRef,
  VirtualMachineSummary,
} from "../ports/cluster.js";

export const RESOURCES = {
  restorePointContent: "restorepointcontents.apps.kio.kasten.io",
  transformSet: "transformsets.config.kio.kasten.io",
  restoreAction: "restoreactions.actions.kio.kasten.io",
  virtualMachine: "virtualmachines.kubevirt.io",
  virtualMachineInstance: "virtualmachineinstances.kubevirt.io",
  dataVolume: "datavolumes.cdi.kubevirt.io",
} as const;

const DEFAULT_K10_NAMESPACE = "kasten-io";
const K10_NAMESPACE_PATTERN = /kasten|k10/;
const SNAPSHOT_CLASS_SELECTOR = "k10.kasten.io/is-snapshot-class=true";
const MAX_BUFFER = 32 * 1024 * 1024;

export interface KubectlClusterClientOptions {
  readonly kubectlBinary?: string;
  readonly kubeconfig?: string;
  readonly context?: string;
  /** Skips namespace discovery when set. */
  readonly k10Namespace?: string;
}

export class KubectlCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(
      `kubectl ${args.join(" ")} failed${exitCode === null ? "" : ` (exit ${exitCode})`}: ${
        stderr.trim() || "no output"
      }`,
      options,
    );
    this.name = "KubectlCommandError";
  }
}

const itemListSchema = z.object({ items: z.array(z.unknown()).catch([]) });

const metadataSchema = z.object({
  name: z.string(),
  namespace: z.string().catch(""),
});

const virtualMachineSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      running: z.boolean().catch(false),
      template: z
        .object({
          spec: z
            .object({
              volumes: z
                .array(
                  z.object({
                    dataVolume: z.object({ name: z.string() }).optional().catch(undefined),
                  }),
                )
                .catch([]),
            })
            .catch({ volumes: [] }),
        })
        .catch({ spec: { volumes: [] } }),
    })
    .catch({ running: false, template: { spec: { volumes: [] } } }),
});

const statusSchema = z.object({
  status: z
    .object({
      state: z.string().optional().catch(undefined),
      phase: z.string().optional().catch(undefined),
      claimName: z.string().optional().catch(undefined),
    })
    .catch({}),
});

const quantityMap = z.record(z.string()).catch({});

const resourceQuotaSchema = z.object({
  metadata: metadataSchema,
  status: z
    .object({ hard: quantityMap, used: quantityMap })
    .catch({ hard: {}, used: {} }),
});

/** Every cluster port, served by shelling out to kubectl. */
export class KubectlClusterClient implements ClusterClient {
  private readonly kubectlBinary: string;
  private readonly globalArgs: readonly string[];
  private readonly k10Namespace?: string;

  constructor(options: KubectlClusterClientOptions = {}) {
    this.kubectlBinary = options.kubectlBinary ?? "kubectl";
    const globalArgs: string[] = [];
    if (options.kubeconfig) {
      globalArgs.push("--kubeconfig", options.kubeconfig);
    }
    if (options.context) {
      globalArgs.push("--context", options.context);
    }
    this.globalArgs = globalArgs;
    this.k10Namespace = options.k10Namespace;
  }

  async getRestorePoint(name: string): Promise<unknown | null> {
    return this.getJson([RESOURCES.restorePointContent, name]);
  }

  async listRestorePoints(filter: RestorePointFilter = {}): Promise<readonly unknown[]> {
    return this.listItems([RESOURCES.restorePointContent, ...restorePointSelector(filter)]);
  }

  async crdExists(name: string): Promise<boolean> {
    return this.exists(["crd", name]);
  }

  async storageClassExists(name: string): Promise<boolean> {
    return this.exists(["storageclass", name]);
  }

  async namespaceExists(name: string): Promise<boolean> {
    return this.exists(["namespace", name]);
  }

  async hasK10SnapshotClass(): Promise<boolean> {
    const stdout = await this.run([
      "get",
      "volumesnapshotclass",
      "-l",
      SNAPSHOT_CLASS_SELECTOR,
      "-o",
      "name",
    ]);
    return stdout.trim().length > 0;
  }

  async listResourceQuotas(namespace: string): Promise<readonly ResourceQuotaSummary[]> {
    const items = await this.listItems(["resourcequota", "-n", namespace]);
    const quotas: ResourceQuotaSummary[] = [];
    for (const item of items) {
      const parsed = resourceQuotaSchema.safeParse(item);
      if (parsed.success) {
        quotas.push({
          name: parsed.data.metadata.name,
          hard: parsed.data.status.hard,
          used: parsed.data.status.used,
        });
      }
    }
    return quotas;
  }

  async resolveK10Namespace(): Promise<string> {
    if (this.k10Namespace) {
      return this.k10Namespace;
    }
    const items = await this.listItems(["namespace"]);
    for (const item of items) {
      const parsed = z.object({ metadata: metadataSchema }).safeParse(item);
      if (parsed.success && K10_NAMESPACE_PATTERN.test(parsed.data.metadata.name)) {
        return parsed.data.metadata.name;
      }
    }
    return DEFAULT_K10_NAMESPACE;
  }

  async createNamespace(
    name: string,
    labels: Readonly<Record<string, string>>,
  ): Promise<void> {
    await this.create({
      apiVersion: "v1",
      kind: "Namespace",
      metadata: { name, labels },
    });
  }

  async deleteTransformSet(name: string, namespace: string): Promise<void> {
    await this.run(["delete", RESOURCES.transformSet, name, "-n", namespace, "--ignore-not-found"]);
  }

  async applyFile(filePath: string): Promise<void> {
    await this.run(["apply", "-f", filePath]);
  }

  async restoreActionExists(name: string, namespace: string): Promise<boolean> {
    return this.exists([RESOURCES.restoreAction, name, "-n", namespace]);
  }

  async createRestoreAction(manifest: RestoreActionManifest): Promise<void> {
    await this.create(manifest);
  }

  async deleteRestoreAction(name: string, namespace: string): Promise<void> {
    await this.run([
      "delete",
      RESOURCES.restoreAction,
      name,
      "-n",
      namespace,
      "--ignore-not-found",
    ]);
  }

  async getRestoreActionState(name: string, namespace: string): Promise<string | null> {
    const raw = await this.getJson([RESOURCES.restoreAction, name, "-n", namespace]);
    if (raw === null) {
      return null;
    }
    return statusSchema.parse(raw).status.state ?? null;
  }

  async describeRestoreAction(name: string, namespace: string): Promise<string> {
    return this.run(["get", RESOURCES.restoreAction, name, "-n", namespace, "-o", "yaml"]);
  }

  async virtualMachineExists(name: string, namespace: string): Promise<boolean> {
    return this.exists([RESOURCES.virtualMachine, name, "-n", namespace]);
  }

  async getVirtualMachine(
    name: string,
    namespace: string,
  ): Promise<VirtualMachineSummary | null> {
    const raw = await this.getJson([RESOURCES.virtualMachine, name, "-n", namespace]);
    if (raw === null) {
      return null;
    }
    const vm = virtualMachineSchema.parse(raw);
    return {
      name: vm.metadata.name,
      namespace: vm.metadata.namespace || namespace,
      running: vm.spec.running,
      dataVolumeNames: vm.spec.template.spec.volumes.flatMap((volume) =>
        volume.dataVolume ? [volume.dataVolume.name] : [],
      ),
    };
  }

  async listVirtualMachines(): Promise<readonly VirtualMachineRef[]> {
    const items = await this.listItems([RESOURCES.virtualMachine, "-A"]);
    const refs: VirtualMachineRef[] = [];
    for (const item of items) {
      const parsed = z.object({ metadata: metadataSchema }).safeParse(item);
      if (parsed.success) {
        refs.push({
          name: parsed.data.metadata.name,
          namespace: parsed.data.metadata.namespace,
        });
      }
    }
    return refs;
  }

  async setVirtualMachineRunning(
    name: string,
    namespace: string,
    running: boolean,
  ): Promise<void> {
    await this.run([
      "patch",
      RESOURCES.virtualMachine,
      name,
      "-n",
      namespace,
      "--type=json",
      "-p",
      JSON.stringify([{ op: "replace", path: "/spec/running", value: running }]),
    ]);
  }

  async virtualMachineInstanceExists(name: string, namespace: string): Promise<boolean> {
    return this.exists([RESOURCES.virtualMachineInstance, name, "-n", namespace]);
  }

  async getDataVolume(name: string, namespace: string): Promise<DataVolumeStatus | null> {
    const raw = await this.getJson([RESOURCES.dataVolume, name, "-n", namespace]);
    if (raw === null) {
      return null;
    }
    const { status } = statusSchema.parse(raw);
    return { phase: status.phase ?? null, claimName: status.claimName ?? null };
  }

  async getPersistentVolumeClaimPhase(name: string, namespace: string): Promise<string | null> {
    const raw = await this.getJson(["persistentvolumeclaim", name, "-n", namespace]);
    if (raw === null) {
      return null;
    }
    return statusSchema.parse(raw).status.phase ?? null;
  }

  private async exists(target: readonly string[]): Promise<boolean> {
    const stdout = await this.run(["get", ...target, "--ignore-not-found", "-o", "name"]);
    return stdout.trim().length > 0;
  }

  private async getJson(target: readonly string[]): Promise<unknown | null> {
    const stdout = await this.run(["get", ...target, "--ignore-not-found", "-o", "json"]);
    if (stdout.trim().length === 0) {
      return null;
    }
    return parseJson(stdout, target);
  }

  private async listItems(target: readonly string[]): Promise<readonly unknown[]> {
    const stdout = await this.run(["get", ...target, "-o", "json"]);
    return itemListSchema.parse(parseJson(stdout, target)).items;
  }

  private async create(manifest: object): Promise<void> {
    await this.run(["create", "-f", "-"], JSON.stringify(manifest));
  }

  private run(args: readonly string[], input?: string): Promise<string> {
    const fullArgs = [...this.globalArgs, ...args];
    return new Promise((resolve, reject) => {
      const child = execFile(
        this.kubectlBinary,
        fullArgs,
        { encoding: "utf8", maxBuffer: MAX_BUFFER },
        (error, stdout, stderr) => {
          if (error) {
            reject(
              new KubectlCommandError(
                args,
                typeof error.code === "number" ? error.code : null,
                stderr || error.message,
                { cause: error },
              ),
            );
            return;
          }
          resolve(stdout);
        },
      );
      if (input !== undefined) {
        child.stdin?.end(input);
      }
    });
  }
}

function restorePointSelector(filter: RestorePointFilter): string[] {
  if (filter.vmName && filter.namespace) {
    return ["-l", `${APP_NAME_LABEL}=${filter.vmName},${APP_NAMESPACE_LABEL}=${filter.namespace}`];
  }
  if (filter.namespace) {
    return ["-l", `${APP_NAMESPACE_LABEL}=${filter.namespace}`];
  }
  if (filter.vmName) {
    return ["-l", `${APP_NAME_LABEL}=${filter.vmName}`];
  }
  if (filter.labelSelector) {
    return ["-l", filter.labelSelector];
  }
  return [];
}

function parseJson(stdout: string, target: readonly string[]): unknown {
  try {
    return JSON.parse(stdout);
  } catch (error) {
    throw new KubectlCommandError(
      ["get", ...target],
      null,
      `unparseable JSON output: ${stdout.slice(0, 200)}`,
      { cause: error },
    );
  }
}
