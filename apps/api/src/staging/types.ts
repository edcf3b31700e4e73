// Staging store contract - short-lived key-value entries with per-key expiry

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Values are UTF-8 text. An empty string is a value; `null` means absent.
 * Writes set or renew the TTL, reads never extend it, and concurrent writes
 * to one key are last-write-wins.
 */
export interface StagingStore {
  put(key: string, value: string, ttlMs: number): void;
  get(key: string): string | null;
  delete(key: string): void;
  /** Drop entries whose expiry has passed; returns how many were removed */
  purgeExpired(): number;
}
