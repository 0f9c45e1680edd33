import { randomUUID } from "crypto";
import type { Collection, Db } from "mongodb";
import type { LockBackend } from "../../ports/LockBackend";
import type { LockDocument } from "../../core/lock/importLock.types";
import { mongoIndexes } from "./mongo.indexes";

const DUPLICATE_KEY_ERROR = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === DUPLICATE_KEY_ERROR;

/**
 * Lock backend on a Mongo collection keyed by lock name.
 * Acquire only replaces an expired document, so a live lock (including one held
 * by this same instance) makes the upsert collide on `_id`.
 */
export class MongoLockBackend implements LockBackend {
  private collection?: Collection<LockDocument>;

  constructor(
    private readonly db: Db,
    private readonly owner: string = randomUUID(),
    private readonly collectionName = "locks",
    private readonly clock: () => Date = () => new Date()
  ) {}

  private async getCollection(): Promise<Collection<LockDocument>> {
    if (this.collection) return this.collection;

    const col = this.db.collection<LockDocument>(this.collectionName);
    for (const idx of mongoIndexes.lockCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async acquire(name: string, timeoutSeconds: number): Promise<boolean> {
    const col = await this.getCollection();
    const now = this.clock();
    const expiresAt = new Date(now.getTime() + timeoutSeconds * 1000);

    try {
      await col.updateOne(
        { _id: name, expiresAt: { $lte: now } },
        { $set: { owner: this.owner, acquiredAt: now, expiresAt } },
        { upsert: true }
      );
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }
  }

  async release(name: string): Promise<void> {
    const col = await this.getCollection();
    await col.deleteOne({ _id: name, owner: this.owner });
  }
}
