import type { LockBackend } from "../../ports/LockBackend";
import { IMPORT_LOCK_NAME, IMPORT_LOCK_TIMEOUT_SECONDS } from "../../core/lock/importLock.types";

/**
 * Single-flight guard for import runs. Every `acquire()` that resolves `true`
 * must be followed by exactly one `release()`.
 */
export class ImportLock {
  constructor(
    private readonly backend: LockBackend,
    private readonly name = IMPORT_LOCK_NAME,
    private readonly timeoutSeconds = IMPORT_LOCK_TIMEOUT_SECONDS
  ) {}

  acquire(): Promise<boolean> {
    return this.backend.acquire(this.name, this.timeoutSeconds);
  }

  release(): Promise<void> {
    return this.backend.release(this.name);
  }
}
