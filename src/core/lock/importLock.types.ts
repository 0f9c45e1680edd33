/**
 * Lock name and hold time for import runs.
 * A run that outlives the hold time may overlap with the next one once the
 * backend treats the lock as expired; that risk is accepted.
 */
export const IMPORT_LOCK_NAME = "sf_import";
export const IMPORT_LOCK_TIMEOUT_SECONDS = 1200;

export const IMPORT_MIGRATION_GROUP = "sf_import";

export type LockDocument = {
  _id: string;
  owner: string;
  acquiredAt: Date;
  expiresAt: Date;
};
