import { useCallback, useEffect, useReducer } from 'react';
import type { Dataset } from '../types';
import { config } from '../config';
import { reportDataApi, ReportDataError } from '../services/reportData';
import { armDismissTimer } from '../utils/advisoryTimer';
import { initialReportState, reportReducer } from '../utils/reportReducer';

/** `loadDataset` must keep its identity across renders; a new function starts a new load. */
export const useReportState = (loadDataset: () => Promise<Dataset> = reportDataApi.load) => {
  const [state, dispatch] = useReducer(reportReducer, initialReportState);
  const [attempt, setAttempt] = useReducer((n: number) => n + 1, 0);

  useEffect(() => {
    let cancelled = false;
    loadDataset()
      .then((dataset) => {
        if (!cancelled) dispatch({ type: 'datasetLoaded', dataset, reference: new Date() });
      })
      .catch((e: unknown) => {
        console.error('[report] Failed to load report data', e);
        if (e instanceof ReportDataError && e.issues.length > 0) console.error('[report] Issues:', e.issues);
        const message = e instanceof Error ? e.message : String(e);
        if (!cancelled) dispatch({ type: 'datasetFailed', message });
      });
    return () => {
      cancelled = true;
    };
  }, [loadDataset, attempt]);

  const { advisory } = state;
  useEffect(
    () => armDismissTimer(advisory, (id) => dispatch({ type: 'dismissAdvisory', id }), config.advisoryDismissMs),
    [advisory],
  );

  const retry = useCallback(() => setAttempt(), []);

  return { state, dispatch, retry };
};
