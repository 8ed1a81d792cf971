import { describe, expect, it, vi } from 'vitest';
import type { CachedRunResult, CheckOutcome, KybApi, PreferencesStore } from '../../domain/contracts';
import { loadFixturePayload, recentCheck } from '../../testing/kybFixtures';
import { CustomerDirectory } from '../customers/customerDirectory';
import { InMemoryPreferencesStore } from '../preferences/inMemoryPreferencesStore';
import { InMemorySink, TelemetryLogger } from '../telemetry/logger';
import { DefaultKybRepository } from './kybRepository';

function cached(traceId: string): CachedRunResult {
  return {
    customerId: 'CUST-0002',
    traceId,
    payload: loadFixturePayload('CUST-0002'),
    cachedAt: new Date('2026-01-01T00:00:00.000Z'),
  };
}

function setup(store: PreferencesStore = new InMemoryPreferencesStore()) {
  const sink = new InMemorySink();
  const outcome: CheckOutcome = { status: 'failure', message: 'offline' };
  const api: KybApi = { runCheck: vi.fn(async () => outcome) };
  const repository = new DefaultKybRepository({
    api,
    store,
    directory: new CustomerDirectory(),
    telemetry: new TelemetryLogger({ sinks: [sink] }),
  });
  return { repository, api, sink, store };
}

describe('DefaultKybRepository', () => {
  it('offers the directory ids as available customers', async () => {
    const { repository } = setup();

    expect(await repository.getAvailableCustomers()).toEqual(['CUST-0001', 'CUST-0002', 'CUST-0003', 'CUST-0004']);
  });

  it('delegates runs to the api with trace id and signal', async () => {
    const { repository, api, sink } = setup();
    const controller = new AbortController();

    const outcome = await repository.runCheck('CUST-0001', 'test-trace', { signal: controller.signal });

    expect(outcome).toEqual({ status: 'failure', message: 'offline' });
    expect(api.runCheck).toHaveBeenCalledWith('CUST-0001', 'test-trace', { signal: controller.signal });
    expect(sink.names()).toEqual(['REPOSITORY_KYB_RUN_REQUESTED']);
  });

  it('records recent checks and the selected customer in the store', async () => {
    const { repository, sink } = setup();

    await repository.saveSelectedCustomer('CUST-0003');
    await repository.saveRecentCheck(recentCheck(1));

    expect(await repository.getLastSelectedCustomer()).toBe('CUST-0003');
    expect(await repository.getRecentChecks()).toEqual([recentCheck(1)]);
    expect(sink.read()[0]).toMatchObject({
      name: 'SAVE_RECENT_CHECK',
      fields: { traceId: 'old-1', customerId: 'CUST-0003', riskBand: 'GREEN' },
    });
  });

  it('serves the latest cached result from memory', async () => {
    const { repository, store } = setup();
    const getLastResult = vi.spyOn(store, 'getLastResult');

    await repository.cacheResult(cached('t-1'));
    await repository.cacheResult(cached('t-2'));

    expect((await repository.getCachedResult())?.traceId).toBe('t-2');
    expect(getLastResult).not.toHaveBeenCalled();
  });

  it('falls back to the persisted result after a restart', async () => {
    const store = new InMemoryPreferencesStore();
    await store.saveLastResult(cached('persisted'));
    const { repository } = setup(store);

    expect((await repository.getCachedResult())?.traceId).toBe('persisted');
  });

  it('keeps a result cached while the store read was pending', async () => {
    const store = new InMemoryPreferencesStore();
    let release: (value: CachedRunResult | null) => void = () => undefined;
    vi.spyOn(store, 'getLastResult').mockImplementation(
      () =>
        new Promise((resolve) => {
          release = resolve;
        }),
    );
    const { repository } = setup(store);

    const reading = repository.getCachedResult();
    await repository.cacheResult(cached('fresh'));
    release(cached('stale'));

    expect((await reading)?.traceId).toBe('fresh');
    expect((await repository.getCachedResult())?.traceId).toBe('fresh');
  });
});
