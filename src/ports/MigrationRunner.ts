export interface MigrationRunner {
  /** Imports every migration of the group from the currently staged files. Rejects on failure. */
  importGroup(groupId: string): Promise<void>;
}
