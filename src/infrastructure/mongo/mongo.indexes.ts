/**
 * Index plan, applied lazily by each repository on first use:
 * - locks: TTL on expiresAt so abandoned locks disappear on their own
 */
export const mongoIndexes = {
  lockCollection: [
    { keys: { expiresAt: 1 }, options: { expireAfterSeconds: 0 } }
  ]
};
