import { existsSync } from "fs";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { FileStager } from "../../src/application/import-batches/fileStager";
import type { BatchImportOutcome } from "../../src/application/import-batches/import.error-handler";
import { type ImportPaths, resolveImportSettings } from "../../src/application/import-batches/import.settings";
import { NodeBatchFileSystem } from "../../src/infrastructure/fs/NodeBatchFileSystem";
import type { MigrationRunner } from "../../src/ports/MigrationRunner";

const createRunner = () => {
  const importGroup = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
  const runner: MigrationRunner = { importGroup };
  return { runner, importGroup };
};

const writeBatch = async (dir: string, files: Record<string, string>) => {
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await mkdir(join(dir, name, ".."), { recursive: true });
    await writeFile(join(dir, name), content);
  }
};

describe("FileStager", () => {
  let root: string;
  let paths: ImportPaths;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "file-stager-"));
    paths = {
      sourceRoot: join(root, "json"),
      stagingDir: join(root, "staging"),
      backupRoot: join(root, "backup")
    };
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  it("lists batch directories in name order, ignoring files", async () => {
    await mkdir(join(paths.sourceRoot, "b"), { recursive: true });
    await mkdir(join(paths.sourceRoot, "a"));
    await writeFile(join(paths.sourceRoot, "x.txt"), "stray");
    const { runner } = createRunner();
    const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings: resolveImportSettings(), paths });

    await expect(stager.listBatchDirectories()).resolves.toEqual([
      join(paths.sourceRoot, "a"),
      join(paths.sourceRoot, "b")
    ]);
  });

  it("does nothing for a batch without JSON files", async () => {
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "readme.txt": "no data this cycle" });
    const { runner, importGroup } = createRunner();
    const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings: resolveImportSettings(), paths });

    await expect(stager.stageAndImport(batchDir)).resolves.toEqual({ status: "empty", batchDir });

    expect(importGroup).not.toHaveBeenCalled();
    expect(existsSync(paths.stagingDir)).toBe(false);
    expect(existsSync(join(batchDir, "readme.txt"))).toBe(true);
  });

  it("stages, imports once for the group and deletes the batch when backups are off", async () => {
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "sessions.json": "[{\"id\":1}]" });
    const { runner, importGroup } = createRunner();
    const stager = new FileStager({
      fs: new NodeBatchFileSystem(),
      runner,
      settings: resolveImportSettings({ enabled: true }),
      paths
    });

    const outcome = await stager.stageAndImport(batchDir);

    expect(outcome).toEqual({ status: "deleted", batchDir, files: [join(batchDir, "sessions.json")] });
    expect(importGroup).toHaveBeenCalledTimes(1);
    expect(importGroup).toHaveBeenCalledWith("sf_import");
    await expect(readFile(join(paths.stagingDir, "sessions.json"), "utf8")).resolves.toBe("[{\"id\":1}]");
    expect(existsSync(batchDir)).toBe(false);
  });

  it("flattens nested files into the staging directory", async () => {
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, {
      "sessions.json": "[]",
      "nested/classes.json": "[]",
      "notes.txt": "skip"
    });
    const { runner } = createRunner();
    const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings: resolveImportSettings(), paths });

    const outcome = await stager.stageAndImport(batchDir);

    expect(outcome).toEqual({
      status: "deleted",
      batchDir,
      files: [join(batchDir, "nested", "classes.json"), join(batchDir, "sessions.json")]
    });
    await expect(readdir(paths.stagingDir).then((names) => names.sort())).resolves.toEqual([
      "classes.json",
      "sessions.json"
    ]);
  });

  it("lets a later batch overwrite a staged file with the same name", async () => {
    const first = join(paths.sourceRoot, "b1");
    const second = join(paths.sourceRoot, "b2");
    await writeBatch(first, { "sessions.json": "first" });
    await writeBatch(second, { "sessions.json": "second" });
    const { runner } = createRunner();
    const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings: resolveImportSettings(), paths });

    await expect(stager.stageAndImport(first)).resolves.toMatchObject({ status: "deleted" });
    await expect(stager.stageAndImport(second)).resolves.toMatchObject({ status: "deleted" });

    await expect(readFile(join(paths.stagingDir, "sessions.json"), "utf8")).resolves.toBe("second");
  });

  it("archives batches and keeps only the most recent backups", async () => {
    const { runner } = createRunner();
    let tick = 0;
    const stager = new FileStager({
      fs: new NodeBatchFileSystem(),
      runner,
      settings: resolveImportSettings({ enabled: true, backupEnabled: true, backupLimit: 2 }),
      paths,
      now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, ++tick))
    });

    const outcomes: BatchImportOutcome[] = [];
    for (const name of ["B1", "B2", "B3"]) {
      const batchDir = join(paths.sourceRoot, name);
      await writeBatch(batchDir, { "sessions.json": name });
      outcomes.push(await stager.stageAndImport(batchDir));
    }

    expect(outcomes[0]).toEqual({
      status: "imported",
      batchDir: join(paths.sourceRoot, "B1"),
      files: [join(paths.sourceRoot, "B1", "sessions.json")],
      archivedTo: join(paths.backupRoot, "B1"),
      prunedBackups: []
    });
    expect(outcomes[2]).toMatchObject({
      status: "imported",
      archivedTo: join(paths.backupRoot, "B3"),
      prunedBackups: [join(paths.backupRoot, "B1")]
    });
    expect((await readdir(paths.backupRoot)).sort()).toEqual(["B2", "B3"]);
    await expect(readFile(join(paths.backupRoot, "B3", "sessions.json"), "utf8")).resolves.toBe("B3");
    expect(existsSync(join(paths.sourceRoot, "B3"))).toBe(false);
  });

  it("keeps archive order when batches are archived within the same second", async () => {
    const { runner } = createRunner();
    const stager = new FileStager({
      fs: new NodeBatchFileSystem(),
      runner,
      settings: resolveImportSettings({ enabled: true, backupEnabled: true, backupLimit: 2 }),
      paths,
      now: () => new Date(Date.UTC(2026, 0, 1))
    });

    const outcomes: BatchImportOutcome[] = [];
    for (const name of ["c", "b", "a"]) {
      const batchDir = join(paths.sourceRoot, name);
      await writeBatch(batchDir, { "sessions.json": name });
      outcomes.push(await stager.stageAndImport(batchDir));
    }

    expect(outcomes[2]).toMatchObject({
      status: "imported",
      archivedTo: join(paths.backupRoot, "a"),
      prunedBackups: [join(paths.backupRoot, "c")]
    });
    expect((await readdir(paths.backupRoot)).sort()).toEqual(["a", "b"]);
  });

  it("keeps an archived batch imported when pruning old backups fails", async () => {
    class FailingPruneFileSystem extends NodeBatchFileSystem {
      async deleteRecursive(path: string): Promise<void> {
        if (path.startsWith(paths.backupRoot)) throw new Error("EACCES: permission denied");
        await super.deleteRecursive(path);
      }
    }
    const fs = new FailingPruneFileSystem();
    await mkdir(join(paths.backupRoot, "old"), { recursive: true });
    await fs.touch(join(paths.backupRoot, "old"), new Date(Date.UTC(2026, 0, 1)));
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "sessions.json": "[]" });
    const { runner } = createRunner();
    const stager = new FileStager({
      fs,
      runner,
      settings: resolveImportSettings({ enabled: true, backupEnabled: true, backupLimit: 1 }),
      paths,
      now: () => new Date(Date.UTC(2026, 1, 1))
    });

    const outcome = await stager.stageAndImport(batchDir);

    const message = `Batch ${batchDir} failed during prune: EACCES: permission denied`;
    expect(outcome).toEqual({
      status: "imported",
      batchDir,
      files: [join(batchDir, "sessions.json")],
      archivedTo: join(paths.backupRoot, "b1"),
      prunedBackups: [],
      pruneError: message
    });
    expect((await readdir(paths.backupRoot)).sort()).toEqual(["b1", "old"]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "import.backups_prune_failed",
      batchDir,
      archivedTo: join(paths.backupRoot, "b1"),
      message
    });
  });

  it("reports a migration failure and leaves the batch in place", async () => {
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "sessions.json": "[]" });
    const { runner, importGroup } = createRunner();
    importGroup.mockRejectedValue(new Error("migrate exploded"));
    const stager = new FileStager({
      fs: new NodeBatchFileSystem(),
      runner,
      settings: resolveImportSettings({ backupEnabled: true }),
      paths
    });

    const outcome = await stager.stageAndImport(batchDir);

    expect(outcome).toEqual({
      status: "failed",
      batchDir,
      kind: "transform_engine",
      message: `Batch ${batchDir} failed during import: migrate exploded`
    });
    expect(existsSync(join(batchDir, "sessions.json"))).toBe(true);
    expect(existsSync(join(paths.stagingDir, "sessions.json"))).toBe(true);
    expect(existsSync(paths.backupRoot)).toBe(false);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "import.batch_failed",
      batchDir,
      kind: "transform_engine",
      message: `Batch ${batchDir} failed during import: migrate exploded`
    });
  });

  it("reports a staging failure without running migrations", async () => {
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "sessions.json": "[]" });
    await writeFile(paths.stagingDir, "a file where the staging directory should be");
    const { runner, importGroup } = createRunner();
    const stager = new FileStager({ fs: new NodeBatchFileSystem(), runner, settings: resolveImportSettings(), paths });

    const outcome = await stager.stageAndImport(batchDir);

    expect(outcome).toMatchObject({ status: "failed", batchDir, kind: "staging_io" });
    expect(outcome.status === "failed" ? outcome.message : "").toMatch(/failed during copy/);
    expect(importGroup).not.toHaveBeenCalled();
    expect(existsSync(batchDir)).toBe(true);
  });

  it("reports an archival failure after a successful import", async () => {
    class FailingMoveFileSystem extends NodeBatchFileSystem {
      async move(): Promise<string> {
        throw new Error("disk full");
      }
    }
    const batchDir = join(paths.sourceRoot, "b1");
    await writeBatch(batchDir, { "sessions.json": "[]" });
    const { runner, importGroup } = createRunner();
    const stager = new FileStager({
      fs: new FailingMoveFileSystem(),
      runner,
      settings: resolveImportSettings({ backupEnabled: true }),
      paths
    });

    const outcome = await stager.stageAndImport(batchDir);

    expect(outcome).toEqual({
      status: "failed",
      batchDir,
      kind: "archival_io",
      message: `Batch ${batchDir} failed during archive: disk full`
    });
    expect(importGroup).toHaveBeenCalledTimes(1);
    expect(existsSync(batchDir)).toBe(true);
  });
});
