import type { CachedRunResult, CustomerId, PreferencesStore, RecentCheckRecord } from '../../../../src/domain/contracts';
import { prependRecentCheck } from '../../../../src/services/preferences/recentChecks';
import { cachedRunResultSchema, recentChecksSchema } from '../../../../src/services/preferences/storedSchemas';

const KEYS = {
  selectedCustomerId: 'kyb.selectedCustomerId',
  recentChecks: 'kyb.recentChecks',
  lastResult: 'kyb.lastResult',
} as const;

export type StorageLike = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

function parseJson(raw: string | null): unknown {
  if (!raw) {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/** Browser persistence. Unreadable entries are treated as absent. */
export class LocalStoragePreferencesStore implements PreferencesStore {
  constructor(private readonly storage: StorageLike) {}

  async getSelectedCustomer(): Promise<CustomerId | null> {
    return this.storage.getItem(KEYS.selectedCustomerId);
  }

  async saveSelectedCustomer(customerId: CustomerId): Promise<void> {
    this.storage.setItem(KEYS.selectedCustomerId, customerId);
  }

  async getRecentChecks(): Promise<RecentCheckRecord[]> {
    const parsed = recentChecksSchema.safeParse(parseJson(this.storage.getItem(KEYS.recentChecks)));
    return parsed.success ? parsed.data : [];
  }

  async saveRecentCheck(record: RecentCheckRecord): Promise<RecentCheckRecord[]> {
    const updated = prependRecentCheck(await this.getRecentChecks(), record);
    this.storage.setItem(KEYS.recentChecks, JSON.stringify(updated));
    return updated;
  }

  async getLastResult(): Promise<CachedRunResult | null> {
    const parsed = cachedRunResultSchema.safeParse(parseJson(this.storage.getItem(KEYS.lastResult)));
    return parsed.success ? parsed.data : null;
  }

  async saveLastResult(result: CachedRunResult): Promise<void> {
    this.storage.setItem(KEYS.lastResult, JSON.stringify({ ...result, cachedAt: result.cachedAt.toISOString() }));
  }

  async clear(): Promise<void> {
    Object.values(KEYS).forEach((key) => this.storage.removeItem(key));
  }
}
