import { describe, expect, it } from 'vitest';
import { loadFixturePayload, recentCheck } from '../../../../src/testing/kybFixtures';
import { LocalStoragePreferencesStore, type StorageLike } from './localStoragePreferencesStore';

class MapStorage implements StorageLike {
  readonly values = new Map<string, string>();

  getItem(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.values.set(key, value);
  }

  removeItem(key: string): void {
    this.values.delete(key);
  }
}

describe('LocalStoragePreferencesStore', () => {
  it('persists the selected customer under its key', async () => {
    const storage = new MapStorage();
    const store = new LocalStoragePreferencesStore(storage);

    await store.saveSelectedCustomer('CUST-0004');

    expect(storage.values.get('kyb.selectedCustomerId')).toBe('CUST-0004');
    expect(await store.getSelectedCustomer()).toBe('CUST-0004');
  });

  it('caps recent checks at ten', async () => {
    const store = new LocalStoragePreferencesStore(new MapStorage());

    for (let index = 0; index < 11; index += 1) {
      await store.saveRecentCheck(recentCheck(index));
    }
    const checks = await store.getRecentChecks();

    expect(checks).toHaveLength(10);
    expect(checks[0].traceId).toBe('old-10');
    expect(checks[9].traceId).toBe('old-1');
  });

  it('treats unreadable entries as absent', async () => {
    const storage = new MapStorage();
    storage.setItem('kyb.recentChecks', '{not json');
    storage.setItem('kyb.lastResult', JSON.stringify({ customerId: 'CUST-0001' }));
    const store = new LocalStoragePreferencesStore(storage);

    expect(await store.getRecentChecks()).toEqual([]);
    expect(await store.getLastResult()).toBeNull();
  });

  it('restores the cached result with a Date timestamp', async () => {
    const store = new LocalStoragePreferencesStore(new MapStorage());
    const payload = loadFixturePayload('CUST-0002');

    await store.saveLastResult({
      customerId: 'CUST-0002',
      traceId: 'test-trace',
      payload,
      cachedAt: new Date('2026-05-06T07:08:09.000Z'),
    });

    expect(await store.getLastResult()).toEqual({
      customerId: 'CUST-0002',
      traceId: 'test-trace',
      payload,
      cachedAt: new Date('2026-05-06T07:08:09.000Z'),
    });
  });

  it('removes every key on clear', async () => {
    const storage = new MapStorage();
    const store = new LocalStoragePreferencesStore(storage);
    await store.saveSelectedCustomer('CUST-0001');
    await store.saveRecentCheck(recentCheck(1));

    await store.clear();

    expect(storage.values.size).toBe(0);
  });
});
