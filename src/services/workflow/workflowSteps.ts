import type { StepId } from '../../domain/contracts';

export const WORKFLOW_STEPS: readonly StepId[] = [
  'journey-classifier',
  'entity-parties',
  'transactions-insights',
  'companies-house',
  'risk-rules',
  'kyb-summary-note',
];

export const STEP_LABELS: Record<StepId, string> = {
  'journey-classifier': 'Journey Classifier',
  'entity-parties': 'Entity & Parties',
  'transactions-insights': 'Transactions Insights',
  'companies-house': 'Companies House',
  'risk-rules': 'Risk & Rules',
  'kyb-summary-note': 'KYB Summary Note',
};

export const DEFAULT_STEP_DELAY_MS = 2000;

export type StepDisplayStatus = 'complete' | 'running' | 'pending';

export interface StepDisplay {
  key: StepId;
  label: string;
  status: StepDisplayStatus;
}

/**
 * Maps the completed prefix onto the full step list: finished steps are
 * complete, the next one is running while the run is still walking steps.
 */
export function describeSteps(completedSteps: readonly StepId[], walking: boolean): StepDisplay[] {
  return WORKFLOW_STEPS.map((step, index) => {
    let status: StepDisplayStatus = 'pending';
    if (index < completedSteps.length) {
      status = 'complete';
    } else if (walking && index === completedSteps.length) {
      status = 'running';
    }
    return { key: step, label: STEP_LABELS[step], status };
  });
}

export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
