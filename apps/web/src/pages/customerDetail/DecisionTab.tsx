import { useMemo, useState } from 'react';
import { RISK_BANDS, type CachedRunResult, type RiskBand } from '../../../../../src/domain/contracts';
import { DecisionDraft } from '../../../../../src/services/detail/customerDetail';
import RiskBandBadge from '../../components/RiskBandBadge';
import { useRiskCheckServices } from '../../hooks/useRiskCheckServices';

const DecisionTab = ({ result }: { result: CachedRunResult }) => {
  const { telemetry } = useRiskCheckServices();
  const draft = useMemo(
    () =>
      new DecisionDraft(result.payload.riskAssessment.riskBand, {
        customerId: result.customerId,
        traceId: result.traceId,
        telemetry,
      }),
    [result, telemetry],
  );
  const [decision, setDecision] = useState(() => draft.snapshot());

  const chooseOverride = (band: RiskBand | null) => setDecision(draft.setOverride(band));

  return (
    <div className="detail-tab decision-tab">
      <p>
        Assessed band <RiskBandBadge band={decision.assessedBand} />, effective band{' '}
        <RiskBandBadge band={decision.override ?? decision.assessedBand} />
      </p>
      <div className="override-options">
        <button
          type="button"
          className={`toggle-pill${decision.override === null ? ' active' : ''}`}
          onClick={() => chooseOverride(null)}
        >
          Keep assessed
        </button>
        {RISK_BANDS.map((band) => (
          <button
            key={band}
            type="button"
            className={`toggle-pill${decision.override === band ? ' active' : ''}`}
            onClick={() => chooseOverride(band)}
          >
            {band}
          </button>
        ))}
      </div>
      <label className="input-field">
        <span className="input-label">RM comments</span>
        <textarea
          rows={4}
          value={decision.comments}
          onChange={(event) => setDecision(draft.setComments(event.target.value))}
        />
      </label>
    </div>
  );
};

export default DecisionTab;
