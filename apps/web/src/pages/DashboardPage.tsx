import { useEffect, useState } from 'react';
import { useNavigate } from 'react-router-dom';
import type { CachedRunResult, RecentCheckRecord } from '../../../../src/domain/contracts';
import { canOpenRecentCheck } from '../../../../src/services/detail/customerDetail';
import { describeSteps } from '../../../../src/services/workflow/workflowSteps';
import CustomerSelect from '../components/CustomerSelect';
import DataTable from '../components/DataTable';
import RiskBandBadge from '../components/RiskBandBadge';
import WorkflowStepper from '../components/WorkflowStepper';
import { useDashboardSnapshot, useRiskCheckServices } from '../hooks/useRiskCheckServices';

const formatTimestamp = (timestamp: number) => new Date(timestamp).toLocaleString();

const DashboardPage = () => {
  const navigate = useNavigate();
  const { controller, directory, repository, telemetry } = useRiskCheckServices();
  const snapshot = useDashboardSnapshot();
  const { runState, selectedCustomerId, traceId, availableCustomers, recentChecks, loading, loadError } = snapshot;
  const [cachedRun, setCachedRun] = useState<CachedRunResult | null>(null);

  useEffect(() => {
    void controller.load();
  }, [controller]);

  // The cache is rewritten together with history, so re-read it whenever history changes.
  useEffect(() => {
    let cancelled = false;
    repository
      .getCachedResult()
      .then((cached) => {
        if (!cancelled) {
          setCachedRun(cached);
        }
      })
      .catch((err: unknown) => {
        telemetry.error('RECENT_CHECK_CACHE_READ_FAILED', err, { screenName: 'Dashboard' });
      });
    return () => {
      cancelled = true;
    };
  }, [repository, telemetry, recentChecks]);

  useEffect(() => {
    return controller.attachNavigator(({ customerId, traceId: runTraceId }) => {
      navigate(`/customers/${encodeURIComponent(customerId)}/${encodeURIComponent(runTraceId)}`);
      controller.resetRun();
    });
  }, [controller, navigate]);

  const busy = runState.status === 'running' || runState.status === 'fetching-result';

  return (
    <section className="dashboard-page">
      <header className="dashboard-hero">
        <h2>Run a KYB risk check</h2>
        <p>Pick a business customer and walk the checks end to end.</p>
        <div className="dashboard-actions">
          <CustomerSelect
            directory={directory}
            availableIds={availableCustomers}
            selectedId={selectedCustomerId}
            disabled={busy || loading}
            onSelect={(customerId) => controller.selectCustomer(customerId)}
          />
          {!busy && (
            <button
              type="button"
              className="pill-button"
              onClick={() => {
                void controller.startRun();
              }}
              disabled={!selectedCustomerId || runState.status !== 'idle'}
            >
              Start Risk Check
            </button>
          )}
        </div>
      </header>

      {loadError && <p className="alert error">{loadError}</p>}

      {(runState.status === 'running' || runState.status === 'fetching-result') && (
        <WorkflowStepper
          steps={describeSteps(runState.completedSteps, runState.status === 'running')}
          footer={
            runState.status === 'fetching-result'
              ? 'Fetching KYB result...'
              : traceId
                ? `Trace ${traceId}`
                : undefined
          }
        />
      )}

      {runState.status === 'failed' && (
        <div className="alert error">
          <p>{runState.message}</p>
          <button type="button" className="ghost-button" onClick={() => controller.resetRun()}>
            Dismiss
          </button>
        </div>
      )}

      <section className="recent-checks">
        <h3>Recent checks</h3>
        {loading ? (
          <p className="alert info">Loading recent checks...</p>
        ) : (
          <DataTable<RecentCheckRecord>
            rows={recentChecks}
            rowKey={(row) => `${row.traceId}-${row.timestamp}`}
            emptyMessage="No checks run yet."
            isRowClickable={(row) => canOpenRecentCheck(row, cachedRun)}
            onRowClick={(row) =>
              navigate(`/customers/${encodeURIComponent(row.customerId)}/${encodeURIComponent(row.traceId)}`)
            }
            columns={[
              { header: 'Customer', accessor: 'customerName' },
              { header: 'ID', accessor: 'customerId', width: '140px' },
              { header: 'Risk band', accessor: (row) => <RiskBandBadge band={row.riskBand} />, width: '120px' },
              { header: 'Checked at', accessor: (row) => formatTimestamp(row.timestamp), width: '200px' },
            ]}
          />
        )}
      </section>
    </section>
  );
};

export default DashboardPage;
