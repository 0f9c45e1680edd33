import type { FileStager } from "./fileStager";
import type { ImportSettings } from "./import.settings";
import { type BatchImportOutcome, toFailedOutcome } from "./import.error-handler";

/**
 * `batch` for scheduled/CLI runs. Anything else (request handlers, REPLs) is
 * `interactive` and never imports.
 */
export type ExecutionContext = "batch" | "interactive";

export type ImportOrchestratorDeps = {
  stager: Pick<FileStager, "stageAndImport">;
  settings: Readonly<ImportSettings>;
  context: ExecutionContext;
};

export class ImportOrchestrator {
  constructor(private readonly deps: ImportOrchestratorDeps) {}

  isEnabled(): boolean {
    return this.deps.settings.enabled;
  }

  isBackupEnabled(): boolean {
    return this.deps.settings.backupEnabled;
  }

  getBackupLimit(): number {
    return this.deps.settings.backupLimit;
  }

  /**
   * Imports one batch directory. Resolves with an outcome in every case.
   * Callers are expected to hold the import lock and to have checked migration health.
   */
  async run(batchDir: string): Promise<BatchImportOutcome> {
    if (!this.isEnabled()) {
      return { status: "skipped", batchDir, reason: "disabled" };
    }
    if (this.deps.context !== "batch") {
      return { status: "skipped", batchDir, reason: "interactive_context" };
    }

    try {
      return await this.deps.stager.stageAndImport(batchDir);
    } catch (error) {
      const outcome = toFailedOutcome(batchDir, error);
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "import.batch_failed", batchDir, kind: outcome.kind, message: outcome.message }));
      return outcome;
    }
  }
}
