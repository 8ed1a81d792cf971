export type CustomerId = string;
export type TraceId = string;

export const RISK_BANDS = ['RED', 'AMBER', 'GREEN'] as const;
export type RiskBand = (typeof RISK_BANDS)[number];

export type StepId =
  | 'journey-classifier'
  | 'entity-parties'
  | 'transactions-insights'
  | 'companies-house'
  | 'risk-rules'
  | 'kyb-summary-note';

export type RunState =
  | { status: 'idle' }
  | { status: 'running'; completedSteps: StepId[] }
  | { status: 'fetching-result'; completedSteps: StepId[] }
  | { status: 'completed'; traceId: TraceId; riskBand: RiskBand }
  | { status: 'failed'; message: string };

export interface Customer {
  customerId: CustomerId;
  legalName: string;
}

export interface AuditTrail {
  agentsCalled: string[];
  customerId: CustomerId;
  timestamp: string;
}

export interface SupportingMetrics {
  latestPeriod: string;
  highRiskCountrySharePct: number;
  intlOutwardChangePct: number;
  cashDepositRatioPct: number;
  periodCoveredMonths: number;
}

export interface TransactionInsights {
  summary: string;
  candidateTriggers: string[];
  supportingMetrics: SupportingMetrics;
}

export interface TriggerImpact {
  code: string;
  delta: number;
}

export interface ScoreBreakdown {
  baseScore: number;
  triggerImpacts: TriggerImpact[];
}

export interface TriggerFired {
  code: string;
  severity: string;
  reason: string;
}

export interface RiskAssessment {
  score: number;
  riskBand: RiskBand;
  scoreBreakdown: ScoreBreakdown;
  triggersFired: TriggerFired[];
  overallReasoning: string;
  journeyType: string;
}

export interface EntityProfile {
  customerId: CustomerId;
  legalName: string;
  sector: string;
  countryOfIncorporation: string;
  primaryOperatingCountry: string;
  onboardingDate: string;
  kybStatus: string;
  turnoverBandInr: string;
  kybLastReviewDate: string;
  kybLastReviewOutcome: string;
  journeyType: string;
}

export interface Party {
  partyId: string;
  name: string;
  role: string;
  riskLabel: string;
  keyFlags: string[];
}

export interface PartySummary {
  parties: Party[];
  keyObservations: string;
}

export interface CompaniesHouseLookup {
  customerId: CustomerId;
  error: string | null;
  message: string | null;
}

export interface SentimentSummary {
  positive: number;
  neutral: number;
  negative: number;
  total: number;
}

export interface SentimentAnalysis {
  customerId: CustomerId;
  topic: string;
  status: string;
  analyzedTweetCount: number;
  sentimentSummary: SentimentSummary;
}

export interface KybRunResult {
  auditTrail: AuditTrail;
  transactionInsights: TransactionInsights;
  recommendedActions: string[];
  kybNote: string;
  riskAssessment: RiskAssessment;
  entityProfile: EntityProfile;
  groupContext: string | null;
  journeyType: string;
  partySummary: PartySummary;
  organizationStructure: string;
  companiesHouse: CompaniesHouseLookup;
  sentimentAnalysis: SentimentAnalysis;
}

export type CheckOutcome =
  | { status: 'success'; payload: KybRunResult }
  | { status: 'failure'; message: string; cause?: Error };

export interface RecentCheckRecord {
  customerId: CustomerId;
  customerName: string;
  riskBand: RiskBand;
  timestamp: number;
  traceId: TraceId;
}

export interface CachedRunResult {
  customerId: CustomerId;
  traceId: TraceId;
  payload: KybRunResult;
  cachedAt: Date;
}

export interface RunCheckOptions {
  signal?: AbortSignal;
}

export interface KybApi {
  runCheck(customerId: CustomerId, traceId: TraceId, options?: RunCheckOptions): Promise<CheckOutcome>;
}

export interface PreferencesStore {
  getSelectedCustomer(): Promise<CustomerId | null>;
  saveSelectedCustomer(customerId: CustomerId): Promise<void>;
  getRecentChecks(): Promise<RecentCheckRecord[]>;
  saveRecentCheck(record: RecentCheckRecord): Promise<RecentCheckRecord[]>;
  getLastResult(): Promise<CachedRunResult | null>;
  saveLastResult(result: CachedRunResult): Promise<void>;
  clear(): Promise<void>;
}

export interface KybRepository {
  getAvailableCustomers(): Promise<CustomerId[]>;
  getRecentChecks(): Promise<RecentCheckRecord[]>;
  saveRecentCheck(record: RecentCheckRecord): Promise<void>;
  saveSelectedCustomer(customerId: CustomerId): Promise<void>;
  getLastSelectedCustomer(): Promise<CustomerId | null>;
  runCheck(customerId: CustomerId, traceId: TraceId, options?: RunCheckOptions): Promise<CheckOutcome>;
  cacheResult(result: CachedRunResult): Promise<void>;
  getCachedResult(): Promise<CachedRunResult | null>;
}

export interface TraceIdGenerator {
  generate(): TraceId;
}

export type TelemetryFields = Record<string, string | number | boolean | null | undefined>;

export interface Telemetry {
  event(name: string, fields?: TelemetryFields): void;
  error(name: string, error: unknown, fields?: TelemetryFields): void;
}

export interface RunCompletionSignal {
  customerId: CustomerId;
  traceId: TraceId;
  riskBand: RiskBand;
}

export type RunCompletionListener = (signal: RunCompletionSignal) => void;

export interface Clock {
  now(): number;
}
