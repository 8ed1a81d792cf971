import type {
  CachedRunResult,
  CustomerId,
  KybRepository,
  KybRunResult,
  RecentCheckRecord,
  RiskBand,
  Telemetry,
  TraceId,
  TriggerFired,
} from '../../domain/contracts';

export const RESULT_NOT_FOUND_MESSAGE = 'KYB result not found';

export type DetailLoad =
  | { status: 'ready'; result: CachedRunResult }
  | { status: 'missing'; message: string };

/**
 * Detail tabs only ever read the cached result of the run that navigated
 * there; a cache holding another run's payload counts as missing.
 */
export async function loadRunDetail(
  repository: KybRepository,
  customerId: CustomerId,
  traceId: TraceId,
): Promise<DetailLoad> {
  const cached = await repository.getCachedResult();
  if (!cached || !isCachedRun(cached, customerId, traceId)) {
    return { status: 'missing', message: RESULT_NOT_FOUND_MESSAGE };
  }
  return { status: 'ready', result: cached };
}

/** Only the history entry of the cached run has a detail view to open. */
export function canOpenRecentCheck(record: RecentCheckRecord, cached: CachedRunResult | null): boolean {
  return cached !== null && isCachedRun(cached, record.customerId, record.traceId);
}

function isCachedRun(cached: CachedRunResult, customerId: CustomerId, traceId: TraceId): boolean {
  return cached.traceId === traceId && cached.customerId === customerId;
}

export interface SummaryView {
  legalName: string;
  customerId: CustomerId;
  profile: Array<{ label: string; value: string }>;
  kybNote: string;
  journeyType: string;
  organizationStructure: string;
  groupContext: string | null;
  keyObservations: string;
  parties: KybRunResult['partySummary']['parties'];
  companiesHouseStatus: string;
  sentiment: { topic: string; positive: number; neutral: number; negative: number; total: number };
}

export function buildSummaryView(payload: KybRunResult): SummaryView {
  const profile = payload.entityProfile;
  const sentiment = payload.sentimentAnalysis;
  return {
    legalName: profile.legalName,
    customerId: profile.customerId,
    profile: [
      { label: 'Sector', value: profile.sector },
      { label: 'Country of incorporation', value: profile.countryOfIncorporation },
      { label: 'Primary operating country', value: profile.primaryOperatingCountry },
      { label: 'Onboarding date', value: profile.onboardingDate },
      { label: 'KYB status', value: profile.kybStatus },
      { label: 'Turnover band (INR)', value: profile.turnoverBandInr },
      { label: 'Last review', value: `${profile.kybLastReviewDate} (${profile.kybLastReviewOutcome})` },
    ],
    kybNote: payload.kybNote,
    journeyType: payload.journeyType,
    organizationStructure: payload.organizationStructure,
    groupContext: payload.groupContext,
    keyObservations: payload.partySummary.keyObservations,
    parties: payload.partySummary.parties,
    companiesHouseStatus: describeCompaniesHouse(payload.companiesHouse),
    sentiment: { topic: sentiment.topic, ...sentiment.sentimentSummary },
  };
}

function describeCompaniesHouse(lookup: KybRunResult['companiesHouse']): string {
  if (lookup.error) {
    return lookup.message ? `${lookup.error}: ${lookup.message}` : lookup.error;
  }
  return lookup.message ?? 'No filing issues reported';
}

const SEVERITY_ORDER = ['HIGH', 'MEDIUM', 'LOW'];

function severityRank(trigger: TriggerFired): number {
  const rank = SEVERITY_ORDER.indexOf(trigger.severity.toUpperCase());
  return rank === -1 ? SEVERITY_ORDER.length : rank;
}

export interface RiskActionsView {
  score: number;
  riskBand: RiskBand;
  baseScore: number;
  triggerImpacts: Array<{ code: string; delta: number }>;
  triggersFired: TriggerFired[];
  overallReasoning: string;
  recommendedActions: string[];
  transactionSummary: string;
  candidateTriggers: string[];
  metrics: Array<{ label: string; value: string }>;
}

export function buildRiskActionsView(payload: KybRunResult): RiskActionsView {
  const assessment = payload.riskAssessment;
  const metrics = payload.transactionInsights.supportingMetrics;
  return {
    score: assessment.score,
    riskBand: assessment.riskBand,
    baseScore: assessment.scoreBreakdown.baseScore,
    triggerImpacts: assessment.scoreBreakdown.triggerImpacts,
    // Array#sort is stable, so equal severities keep payload order.
    triggersFired: [...assessment.triggersFired].sort((a, b) => severityRank(a) - severityRank(b)),
    overallReasoning: assessment.overallReasoning,
    recommendedActions: payload.recommendedActions,
    transactionSummary: payload.transactionInsights.summary,
    candidateTriggers: payload.transactionInsights.candidateTriggers,
    metrics: [
      { label: 'Latest period', value: metrics.latestPeriod },
      { label: 'High-risk country share', value: `${metrics.highRiskCountrySharePct}%` },
      { label: 'International outward change', value: `${metrics.intlOutwardChangePct}%` },
      { label: 'Cash deposit ratio', value: `${metrics.cashDepositRatioPct}%` },
      { label: 'Period covered', value: `${metrics.periodCoveredMonths} months` },
    ],
  };
}

export function formatAuditJson(payload: KybRunResult): string {
  return JSON.stringify(payload, null, 2);
}

export interface DecisionState {
  assessedBand: RiskBand;
  override: RiskBand | null;
  comments: string;
}

/** RM decision tab: an optional manual band plus free-text comments. */
export class DecisionDraft {
  private state: DecisionState;

  constructor(
    assessedBand: RiskBand,
    private readonly context: { customerId: CustomerId; traceId: TraceId; telemetry: Telemetry },
  ) {
    this.state = { assessedBand, override: null, comments: '' };
  }

  snapshot(): DecisionState {
    return this.state;
  }

  effectiveBand(): RiskBand {
    return this.state.override ?? this.state.assessedBand;
  }

  setOverride(riskBand: RiskBand | null): DecisionState {
    if (riskBand === this.state.override) {
      return this.state;
    }
    this.state = { ...this.state, override: riskBand };
    this.context.telemetry.event('RM_OVERRIDE_UPDATED', {
      traceId: this.context.traceId,
      customerId: this.context.customerId,
      screenName: 'Decision',
      override: riskBand ?? 'none',
    });
    return this.state;
  }

  setComments(comments: string): DecisionState {
    this.state = { ...this.state, comments };
    return this.state;
  }
}
