export interface LockBackend {
  /** Resolves `false` when the lock is already held; never waits. */
  acquire(name: string, timeoutSeconds: number): Promise<boolean>;
  /** Releasing a lock that is not held is a no-op. */
  release(name: string): Promise<void>;
}
