import type { RiskBand } from '../../../../src/domain/contracts';

const RiskBandBadge = ({ band }: { band: RiskBand }) => (
  <span className={`risk-badge risk-${band.toLowerCase()}`}>{band}</span>
);

export default RiskBandBadge;
