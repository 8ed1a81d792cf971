import { promises as fs } from 'fs';
import type { IncomingMessage } from 'http';
import * as path from 'path';
import type { Telemetry } from '../src/domain/contracts';
import { TRACE_ID_HEADER } from '../src/providers/kybApiClient';
import type { CustomerDirectory } from '../src/services/customers/customerDirectory';

export interface KybApiHandlerOptions {
  fixturesDir: string;
  directory: CustomerDirectory;
  telemetry: Telemetry;
}

type RequestLike = Pick<IncomingMessage, 'method' | 'url' | 'headers'>;
interface ResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

const RUN_PATH = /^\/kyb\/mcp\/run\/([^/]+)$/;

function sendJson(res: ResponseLike, status: number, payload: unknown, traceId?: string): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  if (traceId) {
    res.setHeader(TRACE_ID_HEADER, traceId);
  }
  res.end(JSON.stringify(payload));
}

function headerValue(req: RequestLike, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Mock KYB backend: serves one fixture per customer from `fixturesDir`
 * (`<customerId>.json`). Customers without a fixture get a 404.
 */
export function createKybApiHandler(options: KybApiHandlerOptions) {
  async function handleRun(req: RequestLike, res: ResponseLike, customerId: string): Promise<void> {
    const traceId = headerValue(req, TRACE_ID_HEADER);
    if (!traceId) {
      sendJson(res, 400, { error: `Missing ${TRACE_ID_HEADER} header` });
      return;
    }
    if (!options.directory.has(customerId)) {
      sendJson(res, 404, { error: `Unknown customer ${customerId}` }, traceId);
      return;
    }

    const fixturePath = path.join(options.fixturesDir, `${customerId}.json`);
    try {
      const raw = await fs.readFile(fixturePath, 'utf-8');
      options.telemetry.event('MOCK_KYB_RUN_SERVED', { traceId, customerId, screenName: 'MockServer' });
      sendJson(res, 200, JSON.parse(raw), traceId);
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        sendJson(res, 404, { error: `No KYB data for ${customerId}` }, traceId);
        return;
      }
      options.telemetry.error('MOCK_KYB_RUN_FAILED', error, { traceId, customerId, screenName: 'MockServer' });
      sendJson(res, 500, { error: error instanceof Error ? error.message : 'Unknown error' }, traceId);
    }
  }

  return async function handle(req: RequestLike, res: ResponseLike): Promise<void> {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Headers', `Content-Type, Accept, ${TRACE_ID_HEADER}`);
    res.setHeader('Access-Control-Expose-Headers', TRACE_ID_HEADER);

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const match = RUN_PATH.exec(url.pathname);
    if (req.method === 'GET' && match) {
      let customerId: string;
      try {
        customerId = decodeURIComponent(match[1]);
      } catch {
        sendJson(res, 400, { error: 'Bad customer id' });
        return;
      }
      await handleRun(req, res, customerId);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  };
}
