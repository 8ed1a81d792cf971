import type { PreferencesStore, Telemetry, TraceIdGenerator } from './domain/contracts';
import { FetchHttpClient, type FetchLike, type HttpClient } from './providers/httpClient';
import { KybApiClient } from './providers/kybApiClient';
import { CustomerDirectory } from './services/customers/customerDirectory';
import { DefaultKybRepository } from './services/repository/kybRepository';
import { TelemetryLogger } from './services/telemetry/logger';
import { UuidTraceIdGenerator } from './services/telemetry/traceIdGenerator';
import { RiskCheckController } from './services/workflow/riskCheckController';

export interface RiskCheckAppOptions {
  apiBaseUrl: string;
  store: PreferencesStore;
  /** Either a ready client or a fetch implementation to wrap. */
  http: HttpClient | FetchLike;
  stepDelayMs?: number;
  telemetry?: Telemetry;
  traceIds?: TraceIdGenerator;
  directory?: CustomerDirectory;
}

export interface RiskCheckApp {
  controller: RiskCheckController;
  repository: DefaultKybRepository;
  directory: CustomerDirectory;
  telemetry: Telemetry;
}

/** Builds the controller and its collaborators once; callers pass the pieces down. */
export function createRiskCheckApp(options: RiskCheckAppOptions): RiskCheckApp {
  const telemetry = options.telemetry ?? new TelemetryLogger();
  const directory = options.directory ?? new CustomerDirectory();
  const client = typeof options.http === 'function' ? new FetchHttpClient(options.http) : options.http;

  const api = new KybApiClient({ baseUrl: options.apiBaseUrl, client, telemetry });
  const repository = new DefaultKybRepository({
    api,
    store: options.store,
    directory,
    telemetry,
  });
  const controller = new RiskCheckController({
    repository,
    telemetry,
    traceIds: options.traceIds ?? new UuidTraceIdGenerator(),
    stepDelayMs: options.stepDelayMs,
  });

  return { controller, repository, directory, telemetry };
}
