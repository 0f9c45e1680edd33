import { FileStager } from "../application/import-batches/fileStager";
import type { ImportSessionSummary } from "../application/import-batches/import.error-handler";
import { ImportLock } from "../application/import-batches/importLock";
import { type ExecutionContext, ImportOrchestrator } from "../application/import-batches/importOrchestrator";
import { MigrationHealthChecker } from "../application/import-batches/migrationHealth";
import { runScheduledImport } from "../application/import-batches/scheduledImport.usecase";
import { NodeBatchFileSystem } from "../infrastructure/fs/NodeBatchFileSystem";
import { CommandMigrationRepository } from "../infrastructure/migrate/CommandMigrationRepository";
import { CommandMigrationRunner, UnavailableMigrationRunner } from "../infrastructure/migrate/CommandMigrationRunner";
import { connectMongo } from "../infrastructure/mongo/MongoClientFactory";
import { MongoLockBackend } from "../infrastructure/mongo/MongoLockBackend";
import type { MigrationRunner } from "../ports/MigrationRunner";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const createMigrationRunner = (context: ExecutionContext, commandLine: string): MigrationRunner =>
  context === "batch" ? new CommandMigrationRunner(commandLine) : new UnavailableMigrationRunner();

export const runImport = async (context: ExecutionContext = "batch"): Promise<ImportSessionSummary> => {
  const env = loadEnv();
  const { settings, paths } = loadRuntimeConfigFromEnv();

  const runner = createMigrationRunner(context, env.MIGRATE_COMMAND);
  const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings, paths });
  const orchestrator = new ImportOrchestrator({ stager, settings, context });
  const health = new MigrationHealthChecker(new CommandMigrationRepository(env.MIGRATE_STATUS_COMMAND));

  const mongo = await connectMongo(env.MONGO_URI, env.MONGO_DB);
  try {
    return await runScheduledImport({
      lock: new ImportLock(new MongoLockBackend(mongo.db)),
      health,
      stager,
      orchestrator
    });
  } finally {
    await mongo.close();
  }
};
