import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database as DatabaseType } from 'better-sqlite3';
import { MemoryStagingStore } from '../../src/staging/memory-store.js';
import { SqliteStagingStore } from '../../src/staging/sqlite-store.js';
import type { Clock, StagingStore } from '../../src/staging/types.js';
import { closeTestDb, createTestDb } from '../utils/database.js';

interface StoreFixture {
  name: string;
  create(clock: Clock): StagingStore;
}

let db: DatabaseType;

const fixtures: StoreFixture[] = [
  { name: 'MemoryStagingStore', create: clock => new MemoryStagingStore(clock) },
  { name: 'SqliteStagingStore', create: clock => new SqliteStagingStore(db, clock) },
];

describe.each(fixtures)('$name', ({ create }) => {
  let now: number;
  let store: StagingStore;

  beforeEach(() => {
    db = createTestDb();
    now = 1_000_000;
    store = create(() => now);
  });

  afterEach(() => {
    closeTestDb();
  });

  it('should return what was put before the TTL elapses', () => {
    store.put('subject:r1', 'Session Notes', 60_000);
    now += 59_999;

    expect(store.get('subject:r1')).toBe('Session Notes');
  });

  it('should return null once the TTL has elapsed', () => {
    store.put('subject:r1', 'Session Notes', 60_000);
    now += 60_000;

    expect(store.get('subject:r1')).toBeNull();
  });

  it('should return null for a key never written', () => {
    expect(store.get('message:missing')).toBeNull();
  });

  it('should keep an empty string distinct from absence', () => {
    store.put('message:r1', '', 60_000);

    expect(store.get('message:r1')).toBe('');
  });

  it('should keep text byte for byte', () => {
    const text = 'Plan:\n  café – 日本語 ✓\r\n';
    store.put('message:r1', text, 60_000);

    expect(store.get('message:r1')).toBe(text);
  });

  it('should overwrite the value and renew the TTL on put', () => {
    store.put('subject:r1', 'first', 60_000);
    now += 50_000;
    store.put('subject:r1', 'second', 60_000);
    now += 50_000;

    expect(store.get('subject:r1')).toBe('second');
  });

  it('should not extend the TTL on get', () => {
    store.put('subject:r1', 'value', 60_000);
    now += 30_000;
    store.get('subject:r1');
    now += 30_000;

    expect(store.get('subject:r1')).toBeNull();
  });

  it('should treat delete of an absent key as a no-op', () => {
    store.put('subject:r1', 'value', 60_000);
    store.delete('subject:r1');

    expect(() => store.delete('subject:r1')).not.toThrow();
    expect(store.get('subject:r1')).toBeNull();
  });

  it('should purge only expired entries', () => {
    store.put('a', '1', 10_000);
    store.put('b', '2', 20_000);
    store.put('c', '3', 30_000);
    now += 20_000;

    expect(store.purgeExpired()).toBe(2);
    expect(store.get('c')).toBe('3');
    expect(store.purgeExpired()).toBe(0);
  });

  it('should reject a non-positive TTL', () => {
    expect(() => store.put('a', '1', 0)).toThrow(RangeError);
  });
});
