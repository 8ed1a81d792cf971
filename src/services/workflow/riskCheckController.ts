import type {
  Clock,
  CustomerId,
  KybRepository,
  KybRunResult,
  RecentCheckRecord,
  RunCompletionListener,
  RunState,
  StepId,
  Telemetry,
  TraceId,
  TraceIdGenerator,
} from '../../domain/contracts';
import { FETCH_FAILED_MESSAGE } from '../../providers/kybApiClient';
import { guardTelemetry } from '../telemetry/logger';
import { abortableDelay, DEFAULT_STEP_DELAY_MS, WORKFLOW_STEPS } from './workflowSteps';

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error';
export const LOAD_FAILED_MESSAGE = 'Failed to load dashboard';

const SCREEN_NAME = 'Dashboard';

export interface DashboardSnapshot {
  runState: RunState;
  selectedCustomerId: CustomerId | null;
  traceId: TraceId | null;
  availableCustomers: CustomerId[];
  recentChecks: RecentCheckRecord[];
  loading: boolean;
  loadError: string | null;
}

export interface RiskCheckControllerConfig {
  repository: KybRepository;
  traceIds: TraceIdGenerator;
  telemetry: Telemetry;
  stepDelayMs?: number;
  clock?: Clock;
  navigator?: RunCompletionListener;
}

interface ActiveRun {
  customerId: CustomerId;
  abort: AbortController;
}

const IDLE: RunState = { status: 'idle' };

/**
 * Drives one risk check at a time: customer selection, the simulated step
 * walk, the single remote call, caching of the result and the one-shot
 * navigation signal. State is published as immutable snapshots to
 * subscribers; no method throws.
 */
export class RiskCheckController {
  private snapshot: DashboardSnapshot = {
    runState: IDLE,
    selectedCustomerId: null,
    traceId: null,
    availableCustomers: [],
    recentChecks: [],
    loading: false,
    loadError: null,
  };

  private readonly listeners = new Set<() => void>();
  private readonly telemetry: Telemetry;
  private readonly stepDelayMs: number;
  private readonly clock: Clock;
  private navigator: RunCompletionListener | null;
  private activeRun: ActiveRun | null = null;
  private runCustomerId: CustomerId | null = null;
  private navigationSignaled = false;
  private customersLoaded = false;
  private disposed = false;

  constructor(private readonly config: RiskCheckControllerConfig) {
    this.telemetry = guardTelemetry(config.telemetry);
    this.stepDelayMs = config.stepDelayMs ?? DEFAULT_STEP_DELAY_MS;
    this.clock = config.clock ?? { now: () => Date.now() };
    this.navigator = config.navigator ?? null;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): DashboardSnapshot {
    return this.snapshot;
  }

  getRunState(): RunState {
    return this.snapshot.runState;
  }

  /**
   * Dashboard entry. The selection always starts empty here even though the
   * last run's customer is persisted.
   */
  async load(): Promise<void> {
    this.update({ loading: true, loadError: null, selectedCustomerId: null });
    try {
      const [recentChecks, availableCustomers] = await Promise.all([
        this.config.repository.getRecentChecks(),
        this.config.repository.getAvailableCustomers(),
      ]);
      this.customersLoaded = true;
      this.update({ recentChecks, availableCustomers, loading: false });
      this.telemetry.event('DASHBOARD_LOADED', {
        screenName: SCREEN_NAME,
        firstTime: recentChecks.length === 0,
        customers: availableCustomers.length,
      });
    } catch (error) {
      this.update({ loading: false, loadError: messageOf(error, LOAD_FAILED_MESSAGE) });
      this.telemetry.error('DASHBOARD_LOAD_FAILED', error, { screenName: SCREEN_NAME });
    }
  }

  selectCustomer(customerId: CustomerId): void {
    if (!customerId || (this.customersLoaded && !this.snapshot.availableCustomers.includes(customerId))) {
      this.telemetry.event('CUSTOMER_SELECTION_REJECTED', { customerId, screenName: SCREEN_NAME });
      return;
    }
    this.update({ selectedCustomerId: customerId });
    this.telemetry.event('CUSTOMER_SELECTED', { customerId, screenName: SCREEN_NAME });
  }

  /** Resolves once the run reaches a terminal state, is cancelled, or is rejected. */
  startRun(): Promise<void> {
    const customerId = this.snapshot.selectedCustomerId;
    if (!customerId || this.disposed) {
      return Promise.resolve();
    }
    if (this.activeRun || this.snapshot.runState.status !== 'idle') {
      this.telemetry.event('KYB_RUN_IGNORED', {
        customerId,
        traceId: this.snapshot.traceId,
        runStatus: this.snapshot.runState.status,
        screenName: SCREEN_NAME,
      });
      return Promise.resolve();
    }

    // Claimed before the first await so a second call sees the slot taken.
    const run: ActiveRun = { customerId, abort: new AbortController() };
    this.activeRun = run;
    this.runCustomerId = customerId;
    this.navigationSignaled = false;

    return this.execute(run).finally(() => {
      if (this.activeRun === run) {
        this.activeRun = null;
      }
    });
  }

  resetRun(): void {
    if (this.activeRun) {
      this.activeRun.abort.abort();
      this.activeRun = null;
    }
    this.runCustomerId = null;
    this.navigationSignaled = false;
    if (this.snapshot.runState.status === 'idle' && this.snapshot.traceId === null) {
      return;
    }
    this.update({ runState: IDLE, traceId: null });
    this.telemetry.event('KYB_RUN_RESET', { screenName: SCREEN_NAME });
  }

  /**
   * Hands a completed run to the navigator. Returns true only for the first
   * call per completed run; later calls (re-renders, re-subscriptions) are no-ops.
   */
  consumeCompletionForNavigation(): boolean {
    const state = this.snapshot.runState;
    if (state.status !== 'completed' || this.navigationSignaled || !this.navigator || !this.runCustomerId) {
      return false;
    }
    this.navigationSignaled = true;

    const signal = { customerId: this.runCustomerId, traceId: state.traceId, riskBand: state.riskBand };
    this.telemetry.event('NAVIGATION_CUSTOMER_DETAIL', {
      traceId: signal.traceId,
      customerId: signal.customerId,
      screenName: 'Navigation',
    });
    try {
      this.navigator(signal);
    } catch (error) {
      this.telemetry.error('NAVIGATION_FAILED', error, {
        traceId: signal.traceId,
        customerId: signal.customerId,
        screenName: 'Navigation',
      });
    }
    return true;
  }

  /** A completion that happened while detached is delivered on attach. */
  attachNavigator(listener: RunCompletionListener): () => void {
    this.navigator = listener;
    this.consumeCompletionForNavigation();
    return () => {
      if (this.navigator === listener) {
        this.navigator = null;
      }
    };
  }

  dispose(): void {
    this.disposed = true;
    if (this.activeRun) {
      this.activeRun.abort.abort();
      this.activeRun = null;
    }
    this.navigator = null;
    this.listeners.clear();
  }

  private async execute(run: ActiveRun): Promise<void> {
    const { customerId } = run;
    const { signal } = run.abort;
    let traceId: TraceId | null = null;

    try {
      traceId = this.config.traceIds.generate();
      this.update({ traceId });
      this.telemetry.event('KYB_RUN_STARTED', { traceId, customerId, screenName: SCREEN_NAME });

      await this.config.repository.saveSelectedCustomer(customerId);
      if (!this.isCurrent(run)) {
        return;
      }
      this.transition(run, { status: 'running', completedSteps: [] });

      const completed: StepId[] = [];
      for (const step of WORKFLOW_STEPS) {
        await abortableDelay(this.stepDelayMs, signal);
        if (!this.isCurrent(run)) {
          return;
        }
        completed.push(step);
        const completedSteps = [...completed];
        this.transition(
          run,
          completedSteps.length === WORKFLOW_STEPS.length
            ? { status: 'fetching-result', completedSteps }
            : { status: 'running', completedSteps },
        );
        this.telemetry.event('WORKFLOW_STEP_COMPLETED', { traceId, customerId, step, screenName: SCREEN_NAME });
      }

      const outcome = await this.config.repository.runCheck(customerId, traceId, { signal });
      if (!this.isCurrent(run)) {
        return;
      }

      if (outcome.status === 'failure') {
        this.telemetry.error('KYB_DATA_FETCH_FAILED', outcome.cause ?? outcome.message, {
          traceId,
          customerId,
          screenName: SCREEN_NAME,
        });
        this.transition(run, { status: 'failed', message: outcome.message || FETCH_FAILED_MESSAGE });
        return;
      }

      await this.applySuccess(run, traceId, outcome.payload);
    } catch (error) {
      if (!this.isCurrent(run)) {
        return;
      }
      this.telemetry.error('KYB_RUN_FAILED', error, { traceId, customerId, screenName: SCREEN_NAME });
      this.transition(run, { status: 'failed', message: messageOf(error, UNKNOWN_ERROR_MESSAGE) });
    }
  }

  private async applySuccess(run: ActiveRun, traceId: TraceId, payload: KybRunResult): Promise<void> {
    const { customerId } = run;
    const { riskBand } = payload.riskAssessment;

    // History and cache are committed together; a cancel that lands while
    // they are pending only suppresses the transition and navigation.
    await this.config.repository.saveRecentCheck({
      customerId,
      customerName: payload.entityProfile.legalName,
      riskBand,
      timestamp: this.clock.now(),
      traceId,
    });
    await this.config.repository.cacheResult({
      customerId,
      traceId,
      payload,
      cachedAt: new Date(this.clock.now()),
    });
    const recentChecks = await this.config.repository.getRecentChecks();
    if (!this.disposed) {
      this.update({ recentChecks });
    }
    if (!this.isCurrent(run)) {
      return;
    }

    this.transition(run, { status: 'completed', traceId, riskBand });
    this.telemetry.event('KYB_RUN_COMPLETED', { traceId, customerId, riskBand, screenName: SCREEN_NAME });
    this.consumeCompletionForNavigation();
  }

  private isCurrent(run: ActiveRun): boolean {
    return this.activeRun === run && !run.abort.signal.aborted;
  }

  private transition(run: ActiveRun, runState: RunState): void {
    if (!this.isCurrent(run)) {
      return;
    }
    this.update({ runState });
  }

  private update(patch: Partial<DashboardSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        this.telemetry.error('STATE_LISTENER_FAILED', error, { screenName: SCREEN_NAME });
      }
    }
  }
}

function messageOf(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}
