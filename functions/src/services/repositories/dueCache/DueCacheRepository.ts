export type DueCacheEntry = {
  nextOccurrence: string; // ISO-8601
  description: string;
  stepId: string | null;
};

/**
 * Ephemeral key/value store with per-key expiry. It holds a derived projection of
 * schedule state, so a missing entry is an ordinary, recoverable condition.
 */
export interface DueCacheRepository {
  get(key: string): Promise<DueCacheEntry | null>;
  /**
   * Writes `entry` under `key` and adds `key` to the set stored at `listKey` in one
   * atomic step, refreshing both expiries.
   */
  setTracked(key: string, entry: DueCacheEntry, listKey: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  deleteMany(keys: string[]): Promise<number>;
  listTrackedKeys(listKey: string): Promise<string[]>;
}
