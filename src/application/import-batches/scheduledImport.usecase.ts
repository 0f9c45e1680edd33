import type { FileStager } from "./fileStager";
import type { ImportLock } from "./importLock";
import type { ImportOrchestrator } from "./importOrchestrator";
import type { MigrationHealthChecker } from "./migrationHealth";
import {
  type BatchImportOutcome,
  type ImportSessionSummary,
  countOutcomesByStatus
} from "./import.error-handler";

export type ScheduledImportDeps = {
  lock: Pick<ImportLock, "acquire" | "release">;
  health: Pick<MigrationHealthChecker, "checkGroupStatus">;
  stager: Pick<FileStager, "listBatchDirectories">;
  orchestrator: Pick<ImportOrchestrator, "run">;
};

/**
 * One scheduler tick: lock, health check, every pending batch in order, unlock.
 * Refusals come back as statuses; a failed batch does not stop the ones after it.
 */
export const runScheduledImport = async (deps: ScheduledImportDeps): Promise<ImportSessionSummary> => {
  const { lock, health, stager, orchestrator } = deps;

  if (!(await lock.acquire())) {
    console.warn(JSON.stringify({ event: "import.lock_unavailable" }));
    return { status: "lock_unavailable" };
  }

  try {
    if (!(await health.checkGroupStatus())) {
      return { status: "migrations_not_idle" };
    }

    const batches: BatchImportOutcome[] = [];
    for (const batchDir of await stager.listBatchDirectories()) {
      batches.push(await orchestrator.run(batchDir));
    }

    console.log(
      JSON.stringify({
        event: "import.session_completed",
        batches: batches.length,
        byStatus: countOutcomesByStatus(batches)
      })
    );
    return { status: "completed", batches };
  } finally {
    await lock.release();
  }
};
