import type { CheckOutcome, CustomerId, KybApi, RunCheckOptions, Telemetry, TraceId } from '../domain/contracts';
import { decodeKybRunResult } from '../domain/kybPayloadSchema';
import { guardTelemetry } from '../services/telemetry/logger';
import type { HttpClient } from './httpClient';

export const TRACE_ID_HEADER = 'trace-id';
export const FETCH_FAILED_MESSAGE = 'Failed to load KYB data';

export interface KybApiClientConfig {
  baseUrl: string;
  client: HttpClient;
  telemetry: Telemetry;
}

/**
 * Remote data source for `GET /kyb/mcp/run/{customerId}`. Every outcome,
 * including transport errors and malformed bodies, resolves to a
 * `CheckOutcome`; nothing is thrown to the caller.
 */
export class KybApiClient implements KybApi {
  private readonly baseUrl: string;
  private readonly telemetry: Telemetry;

  constructor(private readonly config: KybApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.telemetry = guardTelemetry(config.telemetry);
  }

  async runCheck(customerId: CustomerId, traceId: TraceId, options?: RunCheckOptions): Promise<CheckOutcome> {
    const fields = { traceId, customerId, screenName: 'RemoteDataSource' };
    this.telemetry.event('API_KYB_RUN_REQUEST', fields);

    try {
      const body = await this.config.client.getJson(
        `${this.baseUrl}/kyb/mcp/run/${encodeURIComponent(customerId)}`,
        {
          headers: { [TRACE_ID_HEADER]: traceId },
          signal: options?.signal,
        },
      );
      const payload = decodeKybRunResult(body);

      this.telemetry.event('API_KYB_RUN_SUCCESS', {
        ...fields,
        riskBand: payload.riskAssessment.riskBand,
        score: payload.riskAssessment.score,
      });
      return { status: 'success', payload };
    } catch (error) {
      this.telemetry.error('API_KYB_RUN_FAILED', error, fields);
      const cause = error instanceof Error ? error : undefined;
      return {
        status: 'failure',
        message: cause?.message || FETCH_FAILED_MESSAGE,
        cause,
      };
    }
  }
}
