import { useEffect, useState } from 'react';
import { type DetailLoad, loadRunDetail } from '../../../../src/services/detail/customerDetail';
import { useRiskCheckServices } from './useRiskCheckServices';

type DetailState = { status: 'loading' } | DetailLoad | { status: 'error'; message: string };

export const useRunDetail = (customerId: string, traceId: string): DetailState => {
  const { repository, telemetry } = useRiskCheckServices();
  const [state, setState] = useState<DetailState>({ status: 'loading' });

  useEffect(() => {
    let cancelled = false;
    setState({ status: 'loading' });
    loadRunDetail(repository, customerId, traceId)
      .then((result) => {
        if (cancelled) {
          return;
        }
        setState(result);
        if (result.status === 'ready') {
          telemetry.event('CUSTOMER_DETAIL_LOADED', { traceId, customerId, screenName: 'CustomerDetail' });
        }
      })
      .catch((err: unknown) => {
        telemetry.error('CUSTOMER_DETAIL_LOAD_ERROR', err, { traceId, customerId, screenName: 'CustomerDetail' });
        if (!cancelled) {
          setState({ status: 'error', message: err instanceof Error ? err.message : 'Unknown error' });
        }
      });
    return () => {
      cancelled = true;
    };
  }, [repository, telemetry, customerId, traceId]);

  return state;
};
