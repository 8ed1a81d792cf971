export * from './domain/contracts';
export { decodeKybRunResult, kybRunResultSchema, PayloadDecodeError } from './domain/kybPayloadSchema';
export { FetchHttpClient, HttpError } from './providers/httpClient';
export type { FetchLike, HttpClient, RequestOptions } from './providers/httpClient';
export { KybApiClient, TRACE_ID_HEADER } from './providers/kybApiClient';
export { LocalFixtureHttpClient } from './providers/localFixtureHttpClient';
export { loadAppConfig } from './config/appConfig';
export type { AppConfig } from './config/appConfig';
export { CustomerDirectory, defaultCustomers } from './services/customers/customerDirectory';
export {
  buildRiskActionsView,
  buildSummaryView,
  DecisionDraft,
  formatAuditJson,
  loadRunDetail,
} from './services/detail/customerDetail';
export { FilePreferencesStore } from './services/preferences/filePreferencesStore';
export type { FilePreferencesStoreOptions } from './services/preferences/filePreferencesStore';
export { InMemoryPreferencesStore } from './services/preferences/inMemoryPreferencesStore';
export { RECENT_CHECKS_LIMIT } from './services/preferences/recentChecks';
export { DefaultKybRepository } from './services/repository/kybRepository';
export { ConsoleSink, InMemorySink, TelemetryLogger } from './services/telemetry/logger';
export { UuidTraceIdGenerator } from './services/telemetry/traceIdGenerator';
export { RiskCheckController } from './services/workflow/riskCheckController';
export type { DashboardSnapshot, RiskCheckControllerConfig } from './services/workflow/riskCheckController';
export { describeSteps, STEP_LABELS, WORKFLOW_STEPS } from './services/workflow/workflowSteps';
export { createRiskCheckApp } from './compositionRoot';
