import { copyFile, cp, mkdir, readdir, rename, rm, stat, utimes } from "fs/promises";
import { basename, join, resolve } from "path";
import type { BatchFileSystem } from "../../ports/BatchFileSystem";

const isErrnoCode = (error: unknown, code: string): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === code;

const pathExists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return false;
    throw error;
  }
};

/**
 * Local filesystem implementation of the batch file operations.
 */
export class NodeBatchFileSystem implements BatchFileSystem {
  async listSubdirectories(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => resolve(dir, entry.name));
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) return [];
      throw error;
    }
  }

  async scanDirectory(dir: string, pattern: RegExp): Promise<string[]> {
    const matches: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile() && pattern.test(entry.name)) {
          matches.push(resolve(full));
        }
      }
    };

    await walk(dir);
    return matches;
  }

  async copy(file: string, destDir: string): Promise<string> {
    const target = join(destDir, basename(file));
    await copyFile(file, target);
    return target;
  }

  async move(src: string, destDir: string): Promise<string> {
    const name = basename(src);
    let target = join(destDir, name);
    for (let suffix = 0; await pathExists(target); suffix += 1) {
      target = join(destDir, `${name}_${suffix}`);
    }

    try {
      await rename(src, target);
    } catch (error) {
      // Staging and backup may live on different volumes.
      if (!isErrnoCode(error, "EXDEV")) throw error;
      await cp(src, target, { recursive: true });
      await rm(src, { recursive: true, force: true });
    }
    return target;
  }

  async deleteRecursive(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  async prepareDirectory(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  }

  async touch(path: string, at: Date): Promise<void> {
    await utimes(path, at, at);
  }

  async modifiedAt(path: string): Promise<Date> {
    const stats = await stat(path);
    return stats.mtime;
  }
}
