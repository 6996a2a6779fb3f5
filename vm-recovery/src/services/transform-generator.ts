import { RestoreError, describeError } from "../domain/errors.js";
import { parseRestorePoint } from "../domain/restore-point.js";
import type { Logger } from "../observability/logger.js";
import type { Clock } from "../ports/clock.js";
import type { ClusterInspector, RestorePointReader } from "../ports/cluster.js";
import { sanitizeName } from "./name-resolver.js";
import { renderTransformSet } from "./transform-document.js";
import { synthesizeTransforms, type TransformInput } from "./transform-synthesizer.js";

export interface TransformRequest {
  readonly restorePoint: string;
  readonly newStorageClass?: string;
  readonly newNamespace?: string;
  readonly regenerateMac?: boolean;
  readonly vmName?: string;
  readonly transformName?: string;
}

export interface GeneratedTransformSet {
  readonly name: string;
  readonly namespace: string;
  readonly content: string;
  readonly warnings: readonly string[];
}

export interface TransformGeneratorDeps {
  readonly restorePoints: RestorePointReader;
  readonly inspector: ClusterInspector;
  readonly clock: Clock;
  readonly logger: Logger;
}

/** Standalone TransformSet generation for review before a manual restore. */
export class TransformGenerator {
  private readonly logger: Logger;

  constructor(private readonly deps: TransformGeneratorDeps) {
    this.logger = deps.logger.child({ component: "transform-generator" });
  }

  async generate(request: TransformRequest): Promise<GeneratedTransformSet> {
    const raw = await this.deps.restorePoints.getRestorePoint(request.restorePoint);
    if (raw === null) {
      throw new RestoreError(
        "NotFound",
        "Init",
        `restore point not found: ${request.restorePoint}`,
        { objectName: request.restorePoint },
      );
    }
    const model = parseRestorePoint(raw);
    const warnings = await this.checkTargets(request);

    const now = this.deps.clock.now();
    const name = sanitizeName(
      request.transformName ??
        `vm-restore-transforms-${model.sourceVMName}-${compactTimestamp(now)}`,
    );
    const namespace = await this.deps.inspector.resolveK10Namespace();

    const input: TransformInput = {
      regenerateMac: request.regenerateMac ?? false,
      newStorageClass: request.newStorageClass,
      vmNameOverride: request.vmName,
      sourceNamespace: model.sourceNamespace,
      targetNamespace: request.newNamespace,
    };
    this.logger.info(`generating transforms for restore point: ${request.restorePoint}`);

    const content = renderTransformSet({
      name,
      namespace,
      restorePoint: request.restorePoint,
      sourceVMName: model.sourceVMName,
      sourceNamespace: model.sourceNamespace,
      rules: synthesizeTransforms(model, input),
      options: input,
      generatedAt: now,
      generatedBy: "vm-recovery-transform",
    });

    return { name, namespace, content, warnings };
  }

  private async checkTargets(request: TransformRequest): Promise<string[]> {
    const warnings: string[] = [];
    const { inspector } = this.deps;

    if (request.newStorageClass) {
      const exists = await inspector.storageClassExists(request.newStorageClass).catch(
        (error: unknown) => {
          warnings.push(`could not check StorageClass: ${describeError(error)}`);
          return true;
        },
      );
      if (!exists) {
        warnings.push(`StorageClass ${request.newStorageClass} not found, but continuing`);
      }
    }

    if (request.newNamespace) {
      const exists = await inspector.namespaceExists(request.newNamespace).catch(
        (error: unknown) => {
          warnings.push(`could not check namespace: ${describeError(error)}`);
          return true;
        },
      );
      if (!exists) {
        warnings.push(
          `namespace ${request.newNamespace} does not exist; create it before restoring`,
        );
      }
    }

    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    return warnings;
  }
}

/** UTC `YYYYMMDDHHMMSS`. */
export function compactTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-:T]/g, "");
}
