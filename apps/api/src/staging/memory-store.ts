// In-process staging store, for tests and single-process deployments without a database file

import { systemClock, type Clock, type StagingStore } from './types.js';

interface Entry {
  value: string;
  expiresAt: number;
}

export class MemoryStagingStore implements StagingStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  put(key: string, value: string, ttlMs: number): void {
    if (ttlMs <= 0) {
      throw new RangeError(`TTL must be positive, got ${ttlMs}`);
    }
    this.entries.set(key, { value, expiresAt: this.clock() + ttlMs });
  }

  get(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  purgeExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }
}
