import { loadAppConfig } from '../../../../src/config/appConfig';
import { createRiskCheckApp, type RiskCheckApp } from '../../../../src/compositionRoot';
import { TelemetryLogger } from '../../../../src/services/telemetry/logger';
import { LocalStoragePreferencesStore } from './localStoragePreferencesStore';

/** Composition root for the browser: built once in main.tsx and passed down through context. */
export function createAppServices(): RiskCheckApp {
  const config = loadAppConfig({
    KYB_API_BASE_URL: import.meta.env.VITE_KYB_API_BASE,
    KYB_STEP_DELAY_MS: import.meta.env.VITE_KYB_STEP_DELAY_MS,
  });

  return createRiskCheckApp({
    apiBaseUrl: config.apiBaseUrl,
    stepDelayMs: config.stepDelayMs,
    store: new LocalStoragePreferencesStore(window.localStorage),
    http: (url, init) => fetch(url, init),
    telemetry: new TelemetryLogger({ defaults: { app: 'kyb-dashboard-web' } }),
  });
}
