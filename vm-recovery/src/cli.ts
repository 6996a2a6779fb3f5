import { writeFile } from "node:fs/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import { createRecoveryApp, type CreateRecoveryAppOptions, type RecoveryApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import {
  parseResizeSpecs,
  parseRestoreOptions,
  type RestoreOptions,
} from "./domain/restore-options.js";
import {
  formatDiscoveryJson,
  formatDiscoveryText,
} from "./services/discovery.js";
import type { RestoreOutcome } from "./services/restore-orchestrator.js";
import { formatRestorePlan } from "./services/restore-plan.js";

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  setExitCode(code: number): void;
}

export interface CreateProgramOptions {
  readonly io?: CliIo;
  readonly env?: Record<string, string | undefined>;
  readonly app?: Omit<CreateRecoveryAppOptions, "onPlan">;
}

export interface RestoreCommandOptions {
  readonly restorePoint: string;
  readonly namespace?: string;
  readonly targetNamespace?: string;
  readonly vmName?: string;
  readonly cloneOnConflict?: boolean;
  readonly newMac?: boolean;
  readonly start?: boolean;
  readonly dryRun?: boolean;
  readonly validate?: boolean;
  readonly resizeDisk?: readonly string[];
  readonly newStorageClass?: string;
  readonly createNamespace?: boolean;
  readonly transformFile?: string;
  readonly force?: boolean;
  readonly yes?: boolean;
  readonly timeout?: number;
}

interface DiscoverCommandOptions {
  readonly vm?: string;
  readonly namespace?: string;
  readonly label?: string;
  readonly all?: boolean;
  readonly vmOnly: boolean;
  readonly deletedOnly?: boolean;
  readonly showDisks: boolean;
  readonly output: "text" | "json";
}

interface TransformCommandOptions {
  readonly restorePoint: string;
  readonly output?: string;
  readonly newStorageClass?: string;
  readonly newNamespace?: string;
  readonly newMac?: boolean;
  readonly vmName?: string;
  readonly transformName?: string;
}

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(`${text}\n`);
  },
  err: (text) => {
    process.stderr.write(`${text}\n`);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function createProgram(options: CreateProgramOptions = {}): Command {
  const io = options.io ?? processIo;
  const buildApp = (extra: Pick<CreateRecoveryAppOptions, "onPlan"> = {}): RecoveryApp =>
    createRecoveryApp({
      ...options.app,
      config: options.app?.config ?? loadConfig(options.env ?? process.env),
      ...extra,
    });

  const program = new Command("vm-recovery")
    .description("Discover and restore KubeVirt virtual machines from Kasten K10 restore points")
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command("discover")
    .description("List restore points that hold virtual machines")
    .option("--vm <name>", "only restore points of this VM (needs --namespace)")
    .option("-n, --namespace <ns>", "only restore points of this namespace")
    .option("-l, --label <selector>", "label selector for restore points")
    .option("--all", "every restore point (default when no filter is given)")
    .option("--no-vm-only", "include restore points that are not VM related")
    .option("--deleted-only", "only VMs that no longer exist in the cluster")
    .option("--no-show-disks", "omit disk details from text output")
    .addOption(
      new Option("-o, --output <format>", "output format")
        .choices(["text", "json"])
        .default("text"),
    )
    .action(async (opts: DiscoverCommandOptions) => {
      await guard(io, async () => {
        const app = buildApp();
        const items = await app.discovery.discover({
          filter: opts.all
            ? {}
            : { vmName: opts.vm, namespace: opts.namespace, labelSelector: opts.label },
          vmOnly: opts.vmOnly,
          deletedOnly: opts.deletedOnly,
        });
        io.out(
          opts.output === "json"
            ? JSON.stringify(formatDiscoveryJson(items), null, 2)
            : formatDiscoveryText(items, { showDisks: opts.showDisks }),
        );
      });
    });

  program
    .command("transform")
    .description("Generate a TransformSet for reviewing or applying manually")
    .requiredOption("--restore-point <name>", "RestorePointContent name")
    .option("--output <file>", "write to a file instead of stdout")
    .option("--new-storage-class <class>", "target storage class")
    .option("--new-namespace <ns>", "target namespace")
    .option("--new-mac", "drop MAC addresses so new ones are generated")
    .option("--vm-name <name>", "override the VM name")
    .option("--transform-name <name>", "TransformSet name (generated when omitted)")
    .action(async (opts: TransformCommandOptions) => {
      await guard(io, async () => {
        const app = buildApp();
        const generated = await app.transformGenerator.generate({
          restorePoint: opts.restorePoint,
          newStorageClass: opts.newStorageClass,
          newNamespace: opts.newNamespace,
          regenerateMac: opts.newMac,
          vmName: opts.vmName,
          transformName: opts.transformName,
        });

        if (!opts.output) {
          io.out(generated.content.trimEnd());
          return;
        }
        await writeFile(opts.output, generated.content, "utf8");
        app.logger.info(`transforms written to: ${opts.output}`);
        app.logger.info(`review the file and apply with: kubectl apply -f ${opts.output}`);
      });
    });

  program
    .command("restore")
    .description("Restore a virtual machine from a restore point")
    .requiredOption("--restore-point <name>", "RestorePointContent name")
    .option("-n, --namespace <ns>", "source namespace (read from the restore point by default)")
    .option("--target-namespace <ns>", "namespace to restore into")
    .option("--vm-name <name>", "VM name (read from the restore point by default)")
    .option("--clone-on-conflict", "restore under a clone name when the VM exists")
    .option("--new-mac", "drop MAC addresses so new ones are generated")
    .option("--no-start", "leave the VM stopped after restore")
    .option("--dry-run", "print the plan without changing anything")
    .option("--validate", "run the checks and print the plan only")
    .option(
      "--resize-disk <disk=size>",
      "resize a disk, e.g. rootdisk=50Gi (repeatable)",
      collect,
      [],
    )
    .option("--new-storage-class <class>", "target storage class")
    .option("--create-namespace", "create the target namespace when missing")
    .option("--transform-file <path>", "use this TransformSet file verbatim")
    .option("--force", "delete this tool's TransformSet and RestoreAction first")
    .option("-y, --yes", "answer yes to every confirmation")
    .option("--timeout <seconds>", "restore timeout in seconds", parsePositiveInt)
    .action(async (opts: RestoreCommandOptions) => {
      await guard(io, async () => {
        const restoreOptions = toRestoreOptions(opts);
        const app = buildApp({
          onPlan: (plan) => io.out(formatRestorePlan(plan).join("\n")),
        });
        const outcome = await app.orchestrator.run(restoreOptions);
        reportOutcome(io, outcome);
        io.setExitCode(outcome.ok ? 0 : 1);
      });
    });

  return program;
}

export function toRestoreOptions(opts: RestoreCommandOptions): RestoreOptions {
  return parseRestoreOptions({
    restorePoint: opts.restorePoint,
    vmName: opts.vmName,
    namespace: opts.namespace,
    targetNamespace: opts.targetNamespace,
    regenerateMac: opts.newMac ?? false,
    newStorageClass: opts.newStorageClass,
    resizeDisks: parseResizeSpecs(opts.resizeDisk ?? []),
    noStart: opts.start === false,
    cloneOnConflict: opts.cloneOnConflict ?? false,
    force: opts.force ?? false,
    autoConfirm: opts.yes ?? false,
    transformFile: opts.transformFile,
    createNamespace: opts.createNamespace ?? false,
    dryRun: opts.dryRun ?? false,
    validateOnly: opts.validate ?? false,
    restoreTimeoutMs: opts.timeout === undefined ? undefined : opts.timeout * 1000,
  });
}

function reportOutcome(io: CliIo, outcome: RestoreOutcome): void {
  const { session } = outcome;
  const vm = session.names
    ? `${session.targetNamespace ?? ""}/${session.names.finalVMName}`
    : session.restorePoint;

  switch (outcome.kind) {
    case "Success":
      io.out(`VM restore completed: ${vm}`);
      if (outcome.verification) {
        io.out(`VM state: ${outcome.verification.state}`);
      }
      break;
    case "DryRun":
      io.out("Dry run: no changes were made");
      break;
    case "ValidateOnly":
      io.out("Validation passed");
      break;
    case "Cancelled":
      io.out("Restore cancelled");
      break;
    default:
      io.err(`VM restore failed (${outcome.kind}): ${outcome.error?.message ?? "unknown error"}`);
      for (const detail of outcome.error?.errors ?? []) {
        io.err(`  - ${detail}`);
      }
      if (outcome.error?.diagnostics) {
        io.err(outcome.error.diagnostics.trimEnd());
      }
  }

  if (session.warnings.length > 0) {
    io.err(`Warnings (${session.warnings.length}):`);
    for (const warning of session.warnings) {
      io.err(`  - ${warning}`);
    }
  }
}

async function guard(io: CliIo, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    io.err(`error: ${describeError(error)}`);
    io.setExitCode(1);
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}
