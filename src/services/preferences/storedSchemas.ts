import { z } from 'zod';
import { type KybRunResult, RISK_BANDS } from '../../domain/contracts';

// Shapes written by the preference stores themselves, not wire formats.

export const recentCheckSchema = z.object({
  customerId: z.string(),
  customerName: z.string(),
  riskBand: z.enum(RISK_BANDS),
  timestamp: z.number(),
  traceId: z.string(),
});

export const recentChecksSchema = z.array(recentCheckSchema);

export const cachedRunResultSchema = z.object({
  customerId: z.string(),
  traceId: z.string(),
  cachedAt: z.coerce.date(),
  // Stored from an already-decoded payload.
  payload: z.custom<KybRunResult>(
    (value) => typeof value === 'object' && value !== null && 'riskAssessment' in value,
  ),
});
