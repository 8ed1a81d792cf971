import type { CachedRunResult, CustomerId, PreferencesStore, RecentCheckRecord } from '../../domain/contracts';
import { prependRecentCheck } from './recentChecks';

export class InMemoryPreferencesStore implements PreferencesStore {
  private selectedCustomer: CustomerId | null = null;
  private recentChecks: RecentCheckRecord[] = [];
  private lastResult: CachedRunResult | null = null;

  async getSelectedCustomer(): Promise<CustomerId | null> {
    return this.selectedCustomer;
  }

  async saveSelectedCustomer(customerId: CustomerId): Promise<void> {
    this.selectedCustomer = customerId;
  }

  async getRecentChecks(): Promise<RecentCheckRecord[]> {
    return [...this.recentChecks];
  }

  async saveRecentCheck(record: RecentCheckRecord): Promise<RecentCheckRecord[]> {
    this.recentChecks = prependRecentCheck(this.recentChecks, record);
    return [...this.recentChecks];
  }

  async getLastResult(): Promise<CachedRunResult | null> {
    return this.lastResult;
  }

  async saveLastResult(result: CachedRunResult): Promise<void> {
    this.lastResult = result;
  }

  async clear(): Promise<void> {
    this.selectedCustomer = null;
    this.recentChecks = [];
    this.lastResult = null;
  }
}
