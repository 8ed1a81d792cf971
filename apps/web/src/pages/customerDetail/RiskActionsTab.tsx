import type { KybRunResult } from '../../../../../src/domain/contracts';
import { buildRiskActionsView } from '../../../../../src/services/detail/customerDetail';
import RiskBandBadge from '../../components/RiskBandBadge';

const RiskActionsTab = ({ payload }: { payload: KybRunResult }) => {
  const view = buildRiskActionsView(payload);

  return (
    <div className="detail-tab risk-tab">
      <div className="score-card">
        <span className="score-value">{view.score}</span>
        <RiskBandBadge band={view.riskBand} />
        <span className="muted">base {view.baseScore}</span>
      </div>
      <p>{view.overallReasoning}</p>

      <h4>Triggers fired</h4>
      {view.triggersFired.length === 0 ? (
        <p className="muted">No triggers fired.</p>
      ) : (
        <ul className="trigger-list">
          {view.triggersFired.map((trigger, index) => (
            <li key={`${trigger.code}-${index}`} className={`trigger severity-${trigger.severity.toLowerCase()}`}>
              <strong>{trigger.code}</strong> <span className="severity">{trigger.severity}</span>
              <p>{trigger.reason}</p>
            </li>
          ))}
        </ul>
      )}

      <h4>Score impacts</h4>
      <ul>
        {view.triggerImpacts.map((impact, index) => (
          <li key={`${impact.code}-${index}`}>
            {impact.code}: {impact.delta > 0 ? `+${impact.delta}` : impact.delta}
          </li>
        ))}
      </ul>

      <h4>Recommended actions</h4>
      {view.recommendedActions.length === 0 ? (
        <p className="muted">No actions recommended.</p>
      ) : (
        <ol>
          {view.recommendedActions.map((action) => (
            <li key={action}>{action}</li>
          ))}
        </ol>
      )}

      <h4>Transactions</h4>
      <p>{view.transactionSummary}</p>
      <dl className="profile-grid">
        {view.metrics.map((metric) => (
          <div key={metric.label} className="profile-item">
            <dt>{metric.label}</dt>
            <dd>{metric.value}</dd>
          </div>
        ))}
      </dl>
    </div>
  );
};

export default RiskActionsTab;
