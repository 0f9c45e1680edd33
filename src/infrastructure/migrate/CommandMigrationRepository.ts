import type { MigrationRepository } from "../../ports/MigrationRepository";
import { type MigrationDefinition, parseMigrationStatus } from "../../core/migrations/MigrationStatus";
import { defaultExecFile, type ExecFileFn, parseCommandLine } from "./execCommand";

type StatusRow = {
  id: string;
  group: string;
  status: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const parseStatusOutput = (stdout: string): StatusRow[] => {
  const trimmed = stdout.trim();
  if (trimmed === "") return [];

  const parsed: unknown = JSON.parse(trimmed);
  // Some engine versions key the rows by migration id instead of returning a list.
  const rows = Array.isArray(parsed) ? parsed : isRecord(parsed) ? Object.values(parsed) : undefined;
  if (!rows) {
    throw new Error(`Unexpected migration status output: ${trimmed.slice(0, 200)}`);
  }

  return rows.flatMap((row) => {
    if (!isRecord(row) || typeof row.id !== "string") return [];
    return [{ id: row.id, group: typeof row.group === "string" ? row.group : "", status: row.status }];
  });
};

/**
 * Reads migration statuses from the engine that runs them, e.g.
 * `drush migrate:status --group=sf_import --format=json`.
 */
export class CommandMigrationRepository implements MigrationRepository {
  private readonly file: string;
  private readonly args: string[];

  constructor(commandLine: string, private readonly exec: ExecFileFn = defaultExecFile) {
    const parsed = parseCommandLine(commandLine, "MIGRATE_STATUS_COMMAND");
    this.file = parsed.file;
    this.args = parsed.args;
  }

  private async status(selector: string): Promise<StatusRow[]> {
    const { stdout } = await this.exec(this.file, [...this.args, selector, "--format=json"]);
    return parseStatusOutput(stdout);
  }

  async findIdsByGroup(group: string): Promise<string[]> {
    const rows = await this.status(`--group=${group}`);
    return rows.map((row) => row.id);
  }

  async loadMany(ids: string[]): Promise<MigrationDefinition[]> {
    if (ids.length === 0) return [];

    const rows = await this.status(ids.join(","));
    const byId = new Map(rows.map((row) => [row.id, row]));

    return ids.flatMap((id) => {
      const row = byId.get(id);
      if (!row) return [];
      return [{ id, group: row.group, status: parseMigrationStatus(row.status) }];
    });
  }
}
