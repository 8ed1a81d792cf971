import { createContext, type ReactNode, useContext, useSyncExternalStore } from 'react';
import type { RiskCheckApp } from '../../../../src/compositionRoot';
import type { DashboardSnapshot } from '../../../../src/services/workflow/riskCheckController';

const RiskCheckServicesContext = createContext<RiskCheckApp | null>(null);

interface ProviderProps {
  services: RiskCheckApp;
  children: ReactNode;
}

export const RiskCheckServicesProvider = ({ services, children }: ProviderProps) => {
  return <RiskCheckServicesContext.Provider value={services}>{children}</RiskCheckServicesContext.Provider>;
};

export const useRiskCheckServices = (): RiskCheckApp => {
  const services = useContext(RiskCheckServicesContext);
  if (!services) {
    throw new Error('useRiskCheckServices must be used inside RiskCheckServicesProvider');
  }
  return services;
};

/** Re-renders on every controller snapshot. */
export const useDashboardSnapshot = (): DashboardSnapshot => {
  const { controller } = useRiskCheckServices();
  return useSyncExternalStore(
    (listener) => controller.subscribe(listener),
    () => controller.getSnapshot(),
  );
};
