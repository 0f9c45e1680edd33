export interface BatchFileSystem {
  /** Immediate subdirectories of `dir`, as absolute paths. Missing `dir` yields []. */
  listSubdirectories(dir: string): Promise<string[]>;
  /** Files under `dir` (recursive) whose name matches `pattern`, as absolute paths. */
  scanDirectory(dir: string, pattern: RegExp): Promise<string[]>;
  /** Copies `file` into `destDir`, replacing a file of the same name. Returns the target path. */
  copy(file: string, destDir: string): Promise<string>;
  /** Moves `src` into `destDir`, renaming to `<name>_N` on conflict. Returns the final path. */
  move(src: string, destDir: string): Promise<string>;
  deleteRecursive(path: string): Promise<void>;
  /** Creates `dir` (and parents) when it does not exist. */
  prepareDirectory(dir: string): Promise<void>;
  touch(path: string, at: Date): Promise<void>;
  modifiedAt(path: string): Promise<Date>;
}
