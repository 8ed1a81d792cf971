import { createServer } from 'http';
import * as path from 'path';
import { loadAppConfig } from '../src/config/appConfig';
import { CustomerDirectory } from '../src/services/customers/customerDirectory';
import { TelemetryLogger } from '../src/services/telemetry/logger';
import { createKybApiHandler } from './kybApiHandler';

const config = loadAppConfig(process.env);
const telemetry = new TelemetryLogger({ defaults: { service: 'mock-kyb-api' } });

const handle = createKybApiHandler({
  fixturesDir: path.join(process.cwd(), 'fixtures', 'kyb'),
  directory: new CustomerDirectory(),
  telemetry,
});

const server = createServer((req, res) => {
  handle(req, res).catch((error: unknown) => {
    telemetry.error('MOCK_SERVER_REQUEST_FAILED', error, { url: req.url });
    res.statusCode = 500;
    res.end();
  });
});

server.listen(config.apiPort, () => {
  telemetry.event('MOCK_SERVER_LISTENING', { port: config.apiPort });
});
