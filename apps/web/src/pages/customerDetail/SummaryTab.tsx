import type { KybRunResult } from '../../../../../src/domain/contracts';
import { buildSummaryView } from '../../../../../src/services/detail/customerDetail';
import DataTable from '../../components/DataTable';

const SummaryTab = ({ payload }: { payload: KybRunResult }) => {
  const view = buildSummaryView(payload);

  return (
    <div className="detail-tab summary-tab">
      <dl className="profile-grid">
        {view.profile.map((item) => (
          <div key={item.label} className="profile-item">
            <dt>{item.label}</dt>
            <dd>{item.value}</dd>
          </div>
        ))}
      </dl>

      <h4>KYB note</h4>
      <p>{view.kybNote}</p>

      <h4>Structure</h4>
      <p>
        {view.journeyType} · {view.organizationStructure}
      </p>
      {view.groupContext && <p className="muted">{view.groupContext}</p>}

      <h4>Parties</h4>
      <p>{view.keyObservations}</p>
      <DataTable
        rows={view.parties}
        rowKey={(party) => party.partyId}
        emptyMessage="No parties reported."
        columns={[
          { header: 'Name', accessor: 'name' },
          { header: 'Role', accessor: 'role' },
          { header: 'Risk label', accessor: 'riskLabel' },
          { header: 'Key flags', accessor: (party) => party.keyFlags.join(', ') || 'None' },
        ]}
      />

      <h4>Companies House</h4>
      <p>{view.companiesHouseStatus}</p>

      <h4>Sentiment: {view.sentiment.topic}</h4>
      <p>
        {view.sentiment.positive} positive · {view.sentiment.neutral} neutral · {view.sentiment.negative} negative (
        {view.sentiment.total} total)
      </p>
    </div>
  );
};

export default SummaryTab;
