import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Telemetry } from '../../domain/contracts';
import { ConsoleSink, formatEvent, guardTelemetry, InMemorySink, TelemetryLogger } from './logger';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatEvent', () => {
  it('renders name, non-empty fields and the error message', () => {
    const line = formatEvent({
      level: 'error',
      name: 'KYB_RUN_FAILED',
      fields: { traceId: 't-1', customerId: 'CUST-0001', skipped: undefined, empty: null, attempt: 2 },
      error: { name: 'Error', message: 'boom' },
      createdAt: '2026-01-02T03:04:05.000Z',
    });

    expect(line).toBe('eventName=KYB_RUN_FAILED, traceId=t-1, customerId=CUST-0001, attempt=2, error=boom');
  });
});

describe('TelemetryLogger', () => {
  it('merges defaults into every event', () => {
    const sink = new InMemorySink();
    const logger = new TelemetryLogger({ sinks: [sink], defaults: { app: 'test' }, now: fixedNow });

    logger.event('DASHBOARD_LOADED', { customers: 4 });
    logger.withDefaults({ screenName: 'Dashboard' }).debug('CUSTOMER_SELECTED', { customerId: 'CUST-0002' });

    expect(sink.read()).toEqual([
      {
        level: 'info',
        name: 'DASHBOARD_LOADED',
        fields: { app: 'test', customers: 4 },
        createdAt: '2026-01-02T03:04:05.000Z',
      },
      {
        level: 'debug',
        name: 'CUSTOMER_SELECTED',
        fields: { app: 'test', screenName: 'Dashboard', customerId: 'CUST-0002' },
        createdAt: '2026-01-02T03:04:05.000Z',
      },
    ]);
  });

  it('describes thrown values on error events', () => {
    const sink = new InMemorySink();
    const logger = new TelemetryLogger({ sinks: [sink], now: fixedNow });

    logger.error('A', new TypeError('bad input'));
    logger.error('B', 'plain text');
    logger.error('C', 42);

    expect(sink.read().map((event) => event.error)).toEqual([
      { name: 'TypeError', message: 'bad input' },
      { name: 'Error', message: 'plain text' },
      { name: 'Error', message: 'Unknown error' },
    ]);
  });

  it('keeps delivering to later sinks when one throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink = new InMemorySink();
    const logger = new TelemetryLogger({
      sinks: [
        {
          emit() {
            throw new Error('disk full');
          },
        },
        sink,
      ],
    });

    logger.event('KYB_RUN_STARTED');

    expect(sink.names()).toEqual(['KYB_RUN_STARTED']);
    expect(warn).toHaveBeenCalledWith('telemetry sink dropped KYB_RUN_STARTED: disk full');
  });

  it('reports rejected async sinks', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new TelemetryLogger({ sinks: [{ emit: () => Promise.reject(new Error('offline')) }] });

    logger.event('KYB_RUN_COMPLETED');
    await Promise.resolve();
    await Promise.resolve();

    expect(warn).toHaveBeenCalledWith('telemetry sink dropped KYB_RUN_COMPLETED: offline');
  });
});

describe('ConsoleSink', () => {
  it('writes tagged lines at the matching console level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new TelemetryLogger({ sinks: [new ConsoleSink()] });

    logger.event('DASHBOARD_LOADED', { customers: 4 });
    logger.error('DASHBOARD_LOAD_FAILED', new Error('no storage'));

    expect(info).toHaveBeenCalledWith('[KYB_APP] eventName=DASHBOARD_LOADED, customers=4');
    expect(error).toHaveBeenCalledWith('[KYB_APP] eventName=DASHBOARD_LOAD_FAILED, error=no storage');
  });
});

describe('guardTelemetry', () => {
  it('swallows failures from the wrapped implementation', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const throwing: Telemetry = {
      event() {
        throw new Error('exporter down');
      },
      error() {
        throw new Error('exporter down');
      },
    };
    const guarded = guardTelemetry(throwing);

    expect(() => guarded.event('X')).not.toThrow();
    expect(() => guarded.error('Y', new Error('original'))).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('telemetry dropped Y: exporter down');
  });
});
