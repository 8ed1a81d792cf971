import * as path from 'path';
import { createRiskCheckApp } from '../src/compositionRoot';
import { LocalFixtureHttpClient } from '../src/providers/localFixtureHttpClient';
import { FilePreferencesStore } from '../src/services/preferences/filePreferencesStore';
import { buildRiskActionsView } from '../src/services/detail/customerDetail';
import { describeSteps } from '../src/services/workflow/workflowSteps';

const API_BASE = 'http://fixtures.local';

async function main(): Promise<void> {
  const customerId = process.argv[2] ?? 'CUST-0002';
  const fixturesRoot = path.join(process.cwd(), 'fixtures', 'kyb');

  const httpClient = new LocalFixtureHttpClient({
    fixtures: {
      [`${API_BASE}/kyb/mcp/run/CUST-0001`]: path.join(fixturesRoot, 'CUST-0001.json'),
      [`${API_BASE}/kyb/mcp/run/CUST-0002`]: path.join(fixturesRoot, 'CUST-0002.json'),
      [`${API_BASE}/kyb/mcp/run/CUST-0003`]: path.join(fixturesRoot, 'CUST-0003.json'),
    },
  });

  const store = new FilePreferencesStore({
    baseDir: path.join(process.cwd(), '.kyb-data'),
  });

  const { controller, repository } = createRiskCheckApp({
    apiBaseUrl: API_BASE,
    http: httpClient,
    store,
    stepDelayMs: 100,
  });

  controller.subscribe(() => {
    const state = controller.getRunState();
    if (state.status === 'running' || state.status === 'fetching-result') {
      const line = describeSteps(state.completedSteps, state.status === 'running')
        .map((step) => `${step.status === 'complete' ? '[x]' : step.status === 'running' ? '[~]' : '[ ]'} ${step.label}`)
        .join('  ');
      console.log(line);
    }
  });

  controller.attachNavigator(({ traceId, riskBand }) => {
    console.log(`\nRun ${traceId} completed with band ${riskBand}`);
  });

  await controller.load();
  controller.selectCustomer(customerId);
  await controller.startRun();

  const state = controller.getRunState();
  if (state.status === 'failed') {
    console.error(`Run failed: ${state.message}`);
    process.exitCode = 1;
    return;
  }

  const cached = await repository.getCachedResult();
  if (cached) {
    const view = buildRiskActionsView(cached.payload);
    console.log(`Score ${view.score} (${view.riskBand}), ${view.triggersFired.length} triggers fired`);
    view.recommendedActions.forEach((action) => console.log(`  - ${action}`));
  }

  const recent = await repository.getRecentChecks();
  console.log(`\nRecent checks persisted to ${store.getBaseDir()}: ${recent.length}`);
  controller.resetRun();
}

main().catch((error) => {
  console.error('Fixture risk check failed:', error);
  process.exitCode = 1;
});
