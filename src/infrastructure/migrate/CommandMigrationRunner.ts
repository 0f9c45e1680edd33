import type { MigrationRunner } from "../../ports/MigrationRunner";
import { defaultExecFile, type ExecFileFn, parseCommandLine } from "./execCommand";

/**
 * Runs the migration engine's own CLI for a group, e.g. `drush migrate:import --group=sf_import`.
 * A non-zero exit rejects with the command's stderr.
 */
export class CommandMigrationRunner implements MigrationRunner {
  private readonly file: string;
  private readonly args: string[];

  constructor(commandLine: string, private readonly exec: ExecFileFn = defaultExecFile) {
    const parsed = parseCommandLine(commandLine);
    this.file = parsed.file;
    this.args = parsed.args;
  }

  async importGroup(groupId: string): Promise<void> {
    const args = [...this.args, `--group=${groupId}`];
    const startedAt = Date.now();
    const { stderr } = await this.exec(this.file, args);

    console.log(
      JSON.stringify({
        event: "import.migrations_run",
        group: groupId,
        command: [this.file, ...args].join(" "),
        durationMs: Date.now() - startedAt,
        stderr: stderr.trim() === "" ? undefined : stderr.trim()
      })
    );
  }
}

/**
 * Stand-in for contexts that must never trigger a migration run.
 */
export class UnavailableMigrationRunner implements MigrationRunner {
  async importGroup(groupId: string): Promise<void> {
    throw new Error(`Migration runner is not available outside the batch context (group ${groupId})`);
  }
}
