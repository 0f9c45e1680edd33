import { relative } from "path";
import type { BatchFileSystem } from "../../ports/BatchFileSystem";
import type { MigrationRunner } from "../../ports/MigrationRunner";
import { IMPORT_MIGRATION_GROUP } from "../../core/lock/importLock.types";
import { nextArchiveStamp, pruneBackups } from "./backupRetention";
import type { ImportPaths, ImportSettings } from "./import.settings";
import {
  type BatchImportOutcome,
  type ImportStep,
  toFailedOutcome,
  wrapStepFailure
} from "./import.error-handler";

export const JSON_FILE_PATTERN = /\.json$/;

export type FileStagerDeps = {
  fs: BatchFileSystem;
  runner: MigrationRunner;
  settings: Readonly<ImportSettings>;
  paths: ImportPaths;
  groupId?: string;
  now?: () => Date;
};

/**
 * Moves one fetch cycle's JSON files through staging, the migration run and archival.
 */
export class FileStager {
  private readonly fs: BatchFileSystem;
  private readonly runner: MigrationRunner;
  private readonly settings: Readonly<ImportSettings>;
  private readonly paths: ImportPaths;
  private readonly groupId: string;
  private readonly now: () => Date;

  constructor(deps: FileStagerDeps) {
    this.fs = deps.fs;
    this.runner = deps.runner;
    this.settings = deps.settings;
    this.paths = deps.paths;
    this.groupId = deps.groupId ?? IMPORT_MIGRATION_GROUP;
    this.now = deps.now ?? (() => new Date());
  }

  async listBatchDirectories(): Promise<string[]> {
    const dirs = await this.fs.listSubdirectories(this.paths.sourceRoot);
    return dirs.slice().sort();
  }

  /**
   * Never rejects: failures are logged and reported as a `failed` outcome, and the
   * batch directory is left as it was when the failure happened.
   */
  async stageAndImport(batchDir: string): Promise<BatchImportOutcome> {
    try {
      return await this.runBatch(batchDir);
    } catch (error) {
      const outcome = toFailedOutcome(batchDir, error);
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "import.batch_failed", batchDir, kind: outcome.kind, message: outcome.message }));
      return outcome;
    }
  }

  private async runBatch(batchDir: string): Promise<BatchImportOutcome> {
    const files = await this.step(batchDir, "scan", () => this.fs.scanDirectory(batchDir, JSON_FILE_PATTERN));
    if (files.length === 0) {
      console.log(JSON.stringify({ event: "import.batch_empty", batchDir }));
      return { status: "empty", batchDir };
    }

    // Flat staging: a later file with the same name replaces an earlier one.
    const ordered = files.slice().sort((a, b) => compareStrings(relative(batchDir, a), relative(batchDir, b)));
    await this.step(batchDir, "copy", () => this.fs.prepareDirectory(this.paths.stagingDir));
    for (const file of ordered) {
      await this.step(batchDir, "copy", () => this.fs.copy(file, this.paths.stagingDir), file);
    }
    console.log(JSON.stringify({ event: "import.batch_staged", batchDir, files: ordered.length }));

    await this.step(batchDir, "import", () => this.runner.importGroup(this.groupId));

    if (!this.settings.backupEnabled) {
      await this.step(batchDir, "delete", () => this.fs.deleteRecursive(batchDir));
      console.log(JSON.stringify({ event: "import.batch_deleted", batchDir, files: ordered.length }));
      return { status: "deleted", batchDir, files: ordered };
    }

    const archivedTo = await this.step(batchDir, "archive", async () => {
      await this.fs.prepareDirectory(this.paths.backupRoot);
      const stamp = await nextArchiveStamp(this.fs, this.paths.backupRoot, this.now());
      const target = await this.fs.move(batchDir, this.paths.backupRoot);
      await this.fs.touch(target, stamp);
      return target;
    });

    // The batch is imported and archived at this point; retention problems do not change that.
    let prunedBackups: string[] = [];
    let pruneError: string | undefined;
    try {
      prunedBackups = await pruneBackups(this.fs, this.paths.backupRoot, this.settings.backupLimit);
      if (prunedBackups.length > 0) {
        console.log(JSON.stringify({ event: "import.backups_pruned", limit: this.settings.backupLimit, pruned: prunedBackups }));
      }
    } catch (error) {
      pruneError = wrapStepFailure(error, { batchDir, step: "prune" }).message;
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "import.backups_prune_failed", batchDir, archivedTo, message: pruneError }));
    }

    console.log(JSON.stringify({ event: "import.batch_imported", batchDir, archivedTo, files: ordered.length }));
    return pruneError === undefined
      ? { status: "imported", batchDir, files: ordered, archivedTo, prunedBackups }
      : { status: "imported", batchDir, files: ordered, archivedTo, prunedBackups, pruneError };
  }

  private async step<T>(batchDir: string, step: ImportStep, fn: () => Promise<T>, file?: string): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw wrapStepFailure(error, file ? { batchDir, step, file } : { batchDir, step });
    }
  }
}

const compareStrings = (a: string, b: string): number => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};
