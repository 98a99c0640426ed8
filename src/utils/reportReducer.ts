import type {
  Advisory,
  ChartMode,
  Dataset,
  DateRange,
  RangePreset,
  ReportState,
  ReportView,
  SortColumn,
  SortOrder,
} from '../types';
import { t } from '../locale';
import { clampRange, isValidRange, presetRange } from './rangePresets';
import { deriveReportViews, hasViewData } from './reportViews';

export type ReportAction =
  | { type: 'datasetLoaded'; dataset: Dataset; reference: Date }
  | { type: 'datasetFailed'; message: string }
  | { type: 'selectView'; view: ReportView }
  | { type: 'stageDate'; field: 'startDate' | 'endDate'; value: string }
  | { type: 'applyDateRange'; startDate?: string; endDate?: string; reference: Date }
  | { type: 'selectPreset'; preset: RangePreset; reference: Date }
  | { type: 'toggleSort'; column: SortColumn }
  | { type: 'setChartMode'; mode: ChartMode }
  | { type: 'toggleMonthlyChart' }
  | { type: 'raiseAdvisory'; kind: Advisory['kind']; text: string }
  | { type: 'dismissAdvisory'; id: number };

export const UNSORTED: SortOrder = { column: null, direction: null };

export const initialReportState: ReportState = {
  status: 'loading',
  loadError: null,
  dataset: null,
  selectedView: { kind: 'overview' },
  appliedRange: null,
  pendingRange: null,
  preset: 'month',
  sortOrder: UNSORTED,
  chartMode: 'bar',
  monthlyChartMode: 'totals',
  views: null,
  advisory: null,
  nextAdvisoryId: 1,
};

// unset -> asc -> desc -> unset; another column starts over at asc
export const nextSortOrder = (current: SortOrder, column: SortColumn): SortOrder => {
  if (current.column !== column) return { column, direction: 'asc' };
  return current.direction === 'asc' ? { column, direction: 'desc' } : UNSORTED;
};

const raiseAdvisory = (state: ReportState, kind: Advisory['kind'], text: string): ReportState => {
  if (state.advisory?.text === text) return state;
  return {
    ...state,
    advisory: { id: state.nextAdvisoryId, kind, text },
    nextAdvisoryId: state.nextAdvisoryId + 1,
  };
};

const reconcileNoDataAdvisory = (state: ReportState): ReportState => {
  if (state.status !== 'ready') return state;
  if (!hasViewData(state.views, state.selectedView)) {
    return raiseAdvisory(state, 'warning', t.advisory.noData);
  }
  if (state.advisory?.text === t.advisory.noData) return { ...state, advisory: null };
  return state;
};

/**
 * Re-derives every view from (dataset, appliedRange, sortOrder). A failure
 * leaves `previous` untouched.
 */
const recompute = (previous: ReportState, next: ReportState): ReportState => {
  try {
    const views =
      next.dataset && next.appliedRange
        ? deriveReportViews(next.dataset, next.appliedRange, next.sortOrder)
        : null;
    return reconcileNoDataAdvisory({ ...next, views });
  } catch (e) {
    console.error('[reportReducer] Recomputing report views failed:', e);
    return previous;
  }
};

export const reportReducer = (state: ReportState, action: ReportAction): ReportState => {
  switch (action.type) {
    case 'datasetLoaded': {
      const { dataset, reference } = action;
      const appliedRange = clampRange(presetRange('month', reference), dataset.dateRange);
      return recompute(state, {
        ...state,
        status: 'ready',
        loadError: null,
        dataset,
        preset: 'month',
        appliedRange,
        pendingRange: null,
      });
    }

    case 'datasetFailed':
      return { ...state, status: 'failed', loadError: action.message, dataset: null, views: null };

    case 'selectView':
      return reconcileNoDataAdvisory({ ...state, selectedView: action.view });

    case 'stageDate': {
      const pending: Partial<DateRange> = state.pendingRange ?? {};
      return {
        ...state,
        pendingRange:
          action.field === 'startDate'
            ? { ...pending, startDate: action.value }
            : { ...pending, endDate: action.value },
      };
    }

    case 'applyDateRange': {
      const startDate = action.startDate ?? state.pendingRange?.startDate ?? state.appliedRange?.startDate;
      const endDate = action.endDate ?? state.pendingRange?.endDate ?? state.appliedRange?.endDate;
      if (!startDate || !endDate || !isValidRange(startDate, endDate)) {
        return { ...state, pendingRange: presetRange(state.preset, action.reference) };
      }
      return recompute(state, { ...state, appliedRange: { startDate, endDate }, pendingRange: null });
    }

    case 'selectPreset':
      return recompute(state, {
        ...state,
        preset: action.preset,
        appliedRange: presetRange(action.preset, action.reference),
        pendingRange: null,
      });

    case 'toggleSort':
      return recompute(state, { ...state, sortOrder: nextSortOrder(state.sortOrder, action.column) });

    case 'setChartMode':
      return { ...state, chartMode: action.mode };

    case 'toggleMonthlyChart':
      return { ...state, monthlyChartMode: state.monthlyChartMode === 'totals' ? 'highest' : 'totals' };

    case 'raiseAdvisory':
      return raiseAdvisory(state, action.kind, action.text);

    case 'dismissAdvisory':
      return state.advisory?.id === action.id ? { ...state, advisory: null } : state;
  }
};
