import type {
  DailyRecord,
  Dataset,
  DateRange,
  MonthlyAggregate,
  QuarterlyAggregate,
  ReportView,
  ReportViews,
  SortOrder,
} from '../types';
import {
  computeMonthlyAggregates,
  computeQuarterlyAggregates,
  filterByDateRange,
  sortUsers,
  sumTotalsOf,
} from './aggregation';

interface FilterPass {
  dataset: Dataset;
  startDate: string;
  endDate: string;
  filtered: Dataset;
  monthly: MonthlyAggregate[];
  quarterly: QuarterlyAggregate[];
}

/**
 * Returns a deriver that remembers its last filter pass. Re-deriving with the
 * same dataset reference and range (a sort change, a re-render) skips the
 * filter and both aggregation passes.
 */
export const createReportViewDeriver = () => {
  let last: FilterPass | null = null;

  const filterPass = (dataset: Dataset, range: DateRange): FilterPass => {
    if (last && last.dataset === dataset && last.startDate === range.startDate && last.endDate === range.endDate) {
      return last;
    }
    const filtered = filterByDateRange(dataset, range.startDate, range.endDate);
    last = {
      dataset,
      startDate: range.startDate,
      endDate: range.endDate,
      filtered,
      monthly: computeMonthlyAggregates(filtered),
      quarterly: computeQuarterlyAggregates(filtered),
    };
    return last;
  };

  return (dataset: Dataset, range: DateRange, sortOrder: SortOrder): ReportViews => {
    const { filtered, monthly, quarterly } = filterPass(dataset, range);
    const users = sortUsers(filtered.users, sortOrder);

    return {
      filtered,
      users,
      overviewTotals: sumTotalsOf(users.map((u) => u.summary)),
      maxUserUsageMB: users.reduce((max, u) => Math.max(max, u.summary.totalUsageMB), 0),
      monthly,
      monthlyTotals: sumTotalsOf(monthly.map((m) => m.totals)),
      quarterly,
      quarterlyTotals: sumTotalsOf(quarterly.map((q) => q.totals)),
    };
  };
};

export const deriveReportViews = createReportViewDeriver();

export const findUser = (views: ReportViews | null, displayName: string) =>
  views?.filtered.users.find((u) => u.displayName === displayName) ?? null;

export const maxDailyUsage = (records: DailyRecord[]): number =>
  records.reduce((max, d) => Math.max(max, d.totalMB), 0);

export const hasViewData = (views: ReportViews | null, view: ReportView): boolean => {
  if (!views) return false;
  switch (view.kind) {
    case 'overview':
      return views.users.length > 0;
    case 'monthly':
      return views.monthly.length > 0;
    case 'quarterly':
      return views.quarterly.length > 0;
    case 'user':
      return (findUser(views, view.displayName)?.dailyData.length ?? 0) > 0;
  }
};
