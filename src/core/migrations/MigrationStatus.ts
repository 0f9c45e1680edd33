export type MigrationStatus = "idle" | "importing" | "rolling_back" | "stopping" | "disabled";

export type MigrationDefinition = {
  id: string;
  group: string;
  status: MigrationStatus | UnknownMigrationStatus;
};

export type UnknownMigrationStatus = {
  kind: "unknown";
  raw: string;
};

export const migrationStatusLabels: Record<MigrationStatus, string> = {
  idle: "Idle",
  importing: "Importing",
  rolling_back: "Rolling back",
  stopping: "Stopping",
  disabled: "Disabled"
};

const knownStatuses: readonly MigrationStatus[] = ["idle", "importing", "rolling_back", "stopping", "disabled"];

const isKnownStatus = (value: string): value is MigrationStatus =>
  knownStatuses.some((status) => status === value);

/**
 * Normalizes a status value or label ("Rolling back") reported by the engine.
 * Anything outside the known set is kept as an unknown status, which never counts as idle.
 */
export const parseMigrationStatus = (raw: unknown): MigrationStatus | UnknownMigrationStatus => {
  const value = typeof raw === "string" ? raw.trim().toLowerCase().replace(/\s+/g, "_") : String(raw);
  return isKnownStatus(value) ? value : { kind: "unknown", raw: String(raw) };
};

export const isIdle = (migration: MigrationDefinition): boolean => migration.status === "idle";

export const statusLabel = (status: MigrationDefinition["status"]): string =>
  typeof status === "string" ? migrationStatusLabels[status] : `Unknown (${status.raw})`;
