import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { TransformDocumentStore } from "../ports/transform-store.js";

export interface TempTransformStoreOptions {
  /** Parent directory for the private working directory; defaults to the OS temp dir. */
  readonly baseDir?: string;
}

/**
 * Keeps generated TransformSet documents in a per-process directory
 * (mode 0700) as owner-only files (mode 0600).
 */
export class TempTransformStore implements TransformDocumentStore {
  private directory: Promise<string> | null = null;

  constructor(private readonly options: TempTransformStoreOptions = {}) {}

  async persist(name: string, content: string): Promise<string> {
    const directory = await this.workingDirectory();
    const filePath = path.join(directory, `${safeFileName(name)}.yaml`);
    await writeFile(filePath, content, { encoding: "utf8", mode: 0o600, flag: "wx" });
    return filePath;
  }

  async read(filePath: string): Promise<string> {
    return readFile(filePath, "utf8");
  }

  async dispose(): Promise<void> {
    const directory = this.directory;
    this.directory = null;
    if (directory) {
      await rm(await directory, { recursive: true, force: true });
    }
  }

  private workingDirectory(): Promise<string> {
    // mkdtemp creates the directory with mode 0700.
    this.directory ??= mkdtemp(path.join(this.options.baseDir ?? tmpdir(), "vm-recovery-"));
    return this.directory;
  }
}

function safeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, "-");
}
