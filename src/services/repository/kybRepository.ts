import type {
  CachedRunResult,
  CheckOutcome,
  CustomerId,
  KybApi,
  KybRepository,
  PreferencesStore,
  RecentCheckRecord,
  RunCheckOptions,
  Telemetry,
  TraceId,
} from '../../domain/contracts';
import type { CustomerDirectory } from '../customers/customerDirectory';
import { guardTelemetry } from '../telemetry/logger';

export interface KybRepositoryConfig {
  api: KybApi;
  store: PreferencesStore;
  directory: CustomerDirectory;
  telemetry: Telemetry;
}

export class DefaultKybRepository implements KybRepository {
  // Detail screens read this while a new run is in flight; it is only ever replaced whole.
  private cachedResult: CachedRunResult | null = null;
  private readonly telemetry: Telemetry;

  constructor(private readonly config: KybRepositoryConfig) {
    this.telemetry = guardTelemetry(config.telemetry);
  }

  async getAvailableCustomers(): Promise<CustomerId[]> {
    return this.config.directory.ids();
  }

  async getRecentChecks(): Promise<RecentCheckRecord[]> {
    return this.config.store.getRecentChecks();
  }

  async saveRecentCheck(record: RecentCheckRecord): Promise<void> {
    this.telemetry.event('SAVE_RECENT_CHECK', {
      traceId: record.traceId,
      customerId: record.customerId,
      riskBand: record.riskBand,
    });
    await this.config.store.saveRecentCheck(record);
  }

  async saveSelectedCustomer(customerId: CustomerId): Promise<void> {
    await this.config.store.saveSelectedCustomer(customerId);
  }

  async getLastSelectedCustomer(): Promise<CustomerId | null> {
    return this.config.store.getSelectedCustomer();
  }

  async runCheck(customerId: CustomerId, traceId: TraceId, options?: RunCheckOptions): Promise<CheckOutcome> {
    this.telemetry.event('REPOSITORY_KYB_RUN_REQUESTED', {
      traceId,
      customerId,
      screenName: 'Repository',
    });
    return this.config.api.runCheck(customerId, traceId, options);
  }

  async cacheResult(result: CachedRunResult): Promise<void> {
    await this.config.store.saveLastResult(result);
    this.cachedResult = result;
  }

  async getCachedResult(): Promise<CachedRunResult | null> {
    if (this.cachedResult) {
      return this.cachedResult;
    }
    const stored = await this.config.store.getLastResult();
    // A run may have completed while the store was being read.
    if (!this.cachedResult) {
      this.cachedResult = stored;
    }
    return this.cachedResult;
  }
}
