import { z } from 'zod';
import { type KybRunResult, RISK_BANDS, type RiskBand } from './contracts';

// Wire payloads are snake_case; the domain model is camelCase.

const riskBandSchema = z
  .unknown()
  .transform((value): RiskBand => {
    const band = RISK_BANDS.find((candidate) => candidate === value);
    return band ?? 'GREEN';
  });

const auditTrailSchema = z
  .object({
    agents_called: z.array(z.string()).default([]),
    customer_id: z.string(),
    timestamp: z.string(),
  })
  .transform((raw) => ({
    agentsCalled: raw.agents_called,
    customerId: raw.customer_id,
    timestamp: raw.timestamp,
  }));

const transactionInsightsSchema = z
  .object({
    summary: z.string(),
    candidate_triggers: z.array(z.string()).default([]),
    supporting_metrics: z.object({
      latest_period: z.string(),
      high_risk_country_share_pct: z.number(),
      intl_outward_change_pct: z.number(),
      cash_deposit_ratio_pct: z.number(),
      period_covered_months: z.number(),
    }),
  })
  .transform((raw) => ({
    summary: raw.summary,
    candidateTriggers: raw.candidate_triggers,
    supportingMetrics: {
      latestPeriod: raw.supporting_metrics.latest_period,
      highRiskCountrySharePct: raw.supporting_metrics.high_risk_country_share_pct,
      intlOutwardChangePct: raw.supporting_metrics.intl_outward_change_pct,
      cashDepositRatioPct: raw.supporting_metrics.cash_deposit_ratio_pct,
      periodCoveredMonths: raw.supporting_metrics.period_covered_months,
    },
  }));

const riskAssessmentSchema = z
  .object({
    score: z.number(),
    risk_band: riskBandSchema,
    score_breakdown: z.object({
      base_score: z.number(),
      trigger_impacts: z.array(z.object({ code: z.string(), delta: z.number() })).default([]),
    }),
    triggers_fired: z
      .array(z.object({ code: z.string(), severity: z.string(), reason: z.string() }))
      .default([]),
    overall_reasoning: z.string(),
    journey_type: z.string(),
  })
  .transform((raw) => ({
    score: raw.score,
    riskBand: raw.risk_band,
    scoreBreakdown: {
      baseScore: raw.score_breakdown.base_score,
      triggerImpacts: raw.score_breakdown.trigger_impacts,
    },
    triggersFired: raw.triggers_fired,
    overallReasoning: raw.overall_reasoning,
    journeyType: raw.journey_type,
  }));

const entityProfileSchema = z
  .object({
    customer_id: z.string(),
    legal_name: z.string(),
    sector: z.string(),
    country_of_incorporation: z.string(),
    primary_operating_country: z.string(),
    onboarding_date: z.string(),
    kyb_status: z.string(),
    turnover_band_inr: z.string(),
    kyb_last_review_date: z.string(),
    kyb_last_review_outcome: z.string(),
    journey_type: z.string(),
  })
  .transform((raw) => ({
    customerId: raw.customer_id,
    legalName: raw.legal_name,
    sector: raw.sector,
    countryOfIncorporation: raw.country_of_incorporation,
    primaryOperatingCountry: raw.primary_operating_country,
    onboardingDate: raw.onboarding_date,
    kybStatus: raw.kyb_status,
    turnoverBandInr: raw.turnover_band_inr,
    kybLastReviewDate: raw.kyb_last_review_date,
    kybLastReviewOutcome: raw.kyb_last_review_outcome,
    journeyType: raw.journey_type,
  }));

const partySummarySchema = z
  .object({
    parties: z
      .array(
        z.object({
          party_id: z.string(),
          name: z.string(),
          role: z.string(),
          risk_label: z.string(),
          key_flags: z.array(z.string()).default([]),
        }),
      )
      .default([]),
    key_observations: z.string(),
  })
  .transform((raw) => ({
    parties: raw.parties.map((party) => ({
      partyId: party.party_id,
      name: party.name,
      role: party.role,
      riskLabel: party.risk_label,
      keyFlags: party.key_flags,
    })),
    keyObservations: raw.key_observations,
  }));

const companiesHouseSchema = z
  .object({
    customer_id: z.string(),
    error: z.string().nullish(),
    message: z.string().nullish(),
  })
  .transform((raw) => ({
    customerId: raw.customer_id,
    error: raw.error ?? null,
    message: raw.message ?? null,
  }));

const sentimentAnalysisSchema = z
  .object({
    customer_id: z.string(),
    topic: z.string(),
    status: z.string(),
    analyzed_tweet_count: z.number(),
    sentiment_summary: z.object({
      positive: z.number(),
      neutral: z.number(),
      negative: z.number(),
      total: z.number(),
    }),
  })
  .transform((raw) => ({
    customerId: raw.customer_id,
    topic: raw.topic,
    status: raw.status,
    analyzedTweetCount: raw.analyzed_tweet_count,
    sentimentSummary: raw.sentiment_summary,
  }));

export const kybRunResultSchema = z
  .object({
    _audit_trail: auditTrailSchema,
    transaction_insights: transactionInsightsSchema,
    recommended_actions: z.array(z.string()).default([]),
    kyb_note: z.string(),
    risk_assessment: riskAssessmentSchema,
    entity_profile: entityProfileSchema,
    group_context: z.string().nullish(),
    journey_type: z.string(),
    party_summary: partySummarySchema,
    organization_structure: z.string(),
    companies_house: companiesHouseSchema,
    sentiment_analysis: sentimentAnalysisSchema,
  })
  .transform(
    (raw): KybRunResult => ({
      auditTrail: raw._audit_trail,
      transactionInsights: raw.transaction_insights,
      recommendedActions: raw.recommended_actions,
      kybNote: raw.kyb_note,
      riskAssessment: raw.risk_assessment,
      entityProfile: raw.entity_profile,
      groupContext: raw.group_context ?? null,
      journeyType: raw.journey_type,
      partySummary: raw.party_summary,
      organizationStructure: raw.organization_structure,
      companiesHouse: raw.companies_house,
      sentimentAnalysis: raw.sentiment_analysis,
    }),
  );

export class PayloadDecodeError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Malformed KYB payload: ${summarizeIssues(issues)}`);
    this.name = 'PayloadDecodeError';
  }
}

function summarizeIssues(issues: z.ZodIssue[]): string {
  const shown = issues.slice(0, 3).map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`);
  const rest = issues.length - shown.length;
  return rest > 0 ? `${shown.join('; ')} (+${rest} more)` : shown.join('; ');
}

export function decodeKybRunResult(raw: unknown): KybRunResult {
  const parsed = kybRunResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PayloadDecodeError(parsed.error.issues);
  }
  return parsed.data;
}
