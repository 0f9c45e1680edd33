import type { MigrationRepository } from "../../ports/MigrationRepository";
import { IMPORT_MIGRATION_GROUP } from "../../core/lock/importLock.types";
import { isIdle, statusLabel } from "../../core/migrations/MigrationStatus";

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

export class MigrationHealthChecker {
  constructor(private readonly migrations: MigrationRepository) {}

  /**
   * Resolves `true` only when every migration of the group is idle.
   * Stops at the first busy migration; a lookup failure counts as unhealthy.
   */
  async checkGroupStatus(groupId: string = IMPORT_MIGRATION_GROUP): Promise<boolean> {
    try {
      const ids = await this.migrations.findIdsByGroup(groupId);
      const definitions = await this.migrations.loadMany(ids);

      for (const migration of definitions) {
        if (!isIdle(migration)) {
          const label = statusLabel(migration.status);
          // eslint-disable-next-line no-console
          console.error(
            JSON.stringify({
              event: "import.migration_not_idle",
              migrationId: migration.id,
              status: label,
              message: `Migration ${migration.id} has status ${label}.`
            })
          );
          return false;
        }
      }
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({
          event: "import.migration_status_failed",
          group: groupId,
          message: `Impossible to get migrations statuses: ${toErrorMessage(error)}`
        })
      );
      return false;
    }

    return true;
  }
}
