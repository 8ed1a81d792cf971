import { useState } from 'react';
import { Link, useParams } from 'react-router-dom';
import RiskBandBadge from '../../components/RiskBandBadge';
import { useRunDetail } from '../../hooks/useRunDetail';
import AuditTab from './AuditTab';
import DecisionTab from './DecisionTab';
import RiskActionsTab from './RiskActionsTab';
import SummaryTab from './SummaryTab';

const TABS = ['Summary', 'Risk & Actions', 'RM Decision', 'Audit (JSON)'] as const;
type Tab = (typeof TABS)[number];

const CustomerDetailPage = () => {
  const { customerId = '', traceId = '' } = useParams();
  const detail = useRunDetail(customerId, traceId);
  const [tab, setTab] = useState<Tab>('Summary');

  if (detail.status === 'loading') {
    return <p className="alert info">Loading KYB result...</p>;
  }
  if (detail.status !== 'ready') {
    return (
      <section className="customer-detail-page">
        <p className="alert error">{detail.message}</p>
        <Link to="/">Back to dashboard</Link>
      </section>
    );
  }

  const { payload } = detail.result;

  return (
    <section className="customer-detail-page">
      <header className="detail-header">
        <Link to="/" className="ghost-button">
          Back
        </Link>
        <div>
          <h2>{payload.entityProfile.legalName}</h2>
          <p className="muted">
            {customerId} · trace {traceId}
          </p>
        </div>
        <RiskBandBadge band={payload.riskAssessment.riskBand} />
      </header>
      <nav className="detail-tabs" role="tablist">
        {TABS.map((name) => (
          <button
            key={name}
            type="button"
            role="tab"
            aria-selected={tab === name}
            className={`tab-button${tab === name ? ' active' : ''}`}
            onClick={() => setTab(name)}
          >
            {name}
          </button>
        ))}
      </nav>
      {tab === 'Summary' && <SummaryTab payload={payload} />}
      {tab === 'Risk & Actions' && <RiskActionsTab payload={payload} />}
      {tab === 'RM Decision' && <DecisionTab result={detail.result} />}
      {tab === 'Audit (JSON)' && <AuditTab payload={payload} />}
    </section>
  );
};

export default CustomerDetailPage;
