import type { KybRunResult } from '../../../../../src/domain/contracts';
import { formatAuditJson } from '../../../../../src/services/detail/customerDetail';

const AuditTab = ({ payload }: { payload: KybRunResult }) => (
  <div className="detail-tab audit-tab">
    <p className="muted">Agents called: {payload.auditTrail.agentsCalled.join(', ')}</p>
    <pre className="audit-json">{formatAuditJson(payload)}</pre>
  </div>
);

export default AuditTab;
