import type { BatchFileSystem } from "../../ports/BatchFileSystem";

type BackupEntry = { path: string; modifiedAt: number };

const byAgeThenName = (a: BackupEntry, b: BackupEntry): number => {
  if (a.modifiedAt !== b.modifiedAt) return a.modifiedAt - b.modifiedAt;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
};

const ARCHIVE_STAMP_STEP_MS = 1000;

/**
 * Modification time to stamp on the next archived batch: `now`, pushed forward to at
 * least one second after every existing backup so archive stamps strictly increase.
 */
export const nextArchiveStamp = async (fs: BatchFileSystem, backupRoot: string, now: Date): Promise<Date> => {
  let latest = Number.NEGATIVE_INFINITY;
  for (const path of await fs.listSubdirectories(backupRoot)) {
    latest = Math.max(latest, (await fs.modifiedAt(path)).getTime());
  }
  return now.getTime() >= latest + ARCHIVE_STAMP_STEP_MS ? now : new Date(latest + ARCHIVE_STAMP_STEP_MS);
};

/**
 * Keeps the `limit` most recent backup directories under `backupRoot` and deletes the rest.
 * Age is the directory's modification time, stamped by `nextArchiveStamp` when the
 * batch was archived, so archived batches never tie; ties between backups placed
 * there by hand fall back to the path. Returns the deleted paths, oldest first.
 */
export const pruneBackups = async (
  fs: BatchFileSystem,
  backupRoot: string,
  limit: number
): Promise<string[]> => {
  const dirs = await fs.listSubdirectories(backupRoot);
  if (dirs.length <= limit) return [];

  const entries: BackupEntry[] = [];
  for (const path of dirs) {
    const modifiedAt = await fs.modifiedAt(path);
    entries.push({ path, modifiedAt: modifiedAt.getTime() });
  }
  entries.sort(byAgeThenName);

  const expired = entries.slice(0, entries.length - limit).map((entry) => entry.path);
  for (const path of expired) {
    await fs.deleteRecursive(path);
  }

  return expired;
};
