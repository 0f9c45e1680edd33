import type { MigrationDefinition } from "../core/migrations/MigrationStatus";

export interface MigrationRepository {
  findIdsByGroup(group: string): Promise<string[]>;
  /** Returns definitions in the order of `ids`; unknown ids are left out. */
  loadMany(ids: string[]): Promise<MigrationDefinition[]>;
}
