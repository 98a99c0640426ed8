import type {
  Dataset,
  DailyRecord,
  HighestConsumer,
  MonthlyAggregate,
  Quarter,
  QuarterlyAggregate,
  SortOrder,
  Totals,
  UserRecord,
} from '../types';
import { monthlyAggregateSchema, quarterlyAggregateSchema } from '../schemas';
import { shamsiMonthName, toShamsi } from './shamsiCalendar';

export const UNKNOWN_CONSUMER: HighestConsumer = { userName: 'نامشخص', totalUsageMB: 0 };

const QUARTER_BY_SHAMSI_MONTH: Record<number, Quarter> = {
  1: 1, 2: 1, 3: 1,
  4: 2, 5: 2, 6: 2,
  7: 3, 8: 3, 9: 3,
  10: 4, 11: 4, 12: 4,
};

export const QUARTER_NAMES: Record<Quarter, string> = {
  1: 'بهار',
  2: 'تابستان',
  3: 'پاییز',
  4: 'زمستان',
};

export const round2 = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

export const EMPTY_TOTALS: Totals = { totalDownloadMB: 0, totalUploadMB: 0, totalUsageMB: 0 };

export const createTotals = (downloadMB: number, uploadMB: number): Totals => ({
  totalDownloadMB: round2(downloadMB),
  totalUploadMB: round2(uploadMB),
  totalUsageMB: round2(downloadMB + uploadMB),
});

export const sumTotals = (records: DailyRecord[]): Totals => {
  let download = 0;
  let upload = 0;
  records.forEach((r) => {
    download += r.downloadMB;
    upload += r.uploadMB;
  });
  return createTotals(download, upload);
};

export const sumTotalsOf = (items: Totals[]): Totals => {
  let download = 0;
  let upload = 0;
  items.forEach((totals) => {
    download += totals.totalDownloadMB;
    upload += totals.totalUploadMB;
  });
  return createTotals(download, upload);
};

const dayStartMs = (day: string) => Date.parse(`${day}T00:00:00Z`);
const dayEndMs = (day: string) => Date.parse(`${day}T23:59:59.999Z`);

const emptyDataset = (source: Dataset | null, startDate: string, endDate: string): Dataset => ({
  users: [],
  dateRange: { startDate, endDate },
  monthlyHighestConsumers: source?.monthlyHighestConsumers ?? {},
});

/**
 * Keeps the daily records inside [startDate, endDate] (whole days, UTC) and
 * recomputes each user's summary. Users left without records are dropped.
 * The reported dateRange is the span of data actually kept, or the requested
 * bounds when nothing matched.
 */
export const filterByDateRange = (dataset: Dataset | null, startDate: string, endDate: string): Dataset => {
  if (!dataset || !startDate || !endDate) return emptyDataset(dataset, startDate, endDate);

  const from = dayStartMs(startDate);
  const to = dayEndMs(endDate);
  if (Number.isNaN(from) || Number.isNaN(to)) return emptyDataset(dataset, startDate, endDate);

  let minDay: string | null = null;
  let maxDay: string | null = null;

  const users: UserRecord[] = [];
  for (const user of dataset.users) {
    const dailyData = user.dailyData.filter((d) => {
      const t = dayStartMs(d.day);
      return t >= from && t <= to;
    });
    if (dailyData.length === 0) continue;

    for (const d of dailyData) {
      if (minDay === null || d.day < minDay) minDay = d.day;
      if (maxDay === null || d.day > maxDay) maxDay = d.day;
    }
    users.push({ ...user, dailyData, summary: sumTotals(dailyData) });
  }

  if (minDay === null || maxDay === null) return emptyDataset(dataset, startDate, endDate);

  return {
    users,
    dateRange: { startDate: minDay, endDate: maxDay },
    monthlyHighestConsumers: dataset.monthlyHighestConsumers,
  };
};

interface PeriodAccumulator {
  download: number;
  upload: number;
  days: Set<string>;
}

const accumulate = (groups: Map<string, PeriodAccumulator>, key: string, record: DailyRecord) => {
  let group = groups.get(key);
  if (!group) {
    group = { download: 0, upload: 0, days: new Set() };
    groups.set(key, group);
  }
  group.download += record.downloadMB;
  group.upload += record.uploadMB;
  group.days.add(record.day);
};

export const monthKeyOf = (day: string): string => day.slice(0, 7);

export const computeMonthlyAggregates = (dataset: Dataset): MonthlyAggregate[] => {
  const groups = new Map<string, PeriodAccumulator>();
  dataset.users.forEach((user) => {
    user.dailyData.forEach((record) => accumulate(groups, monthKeyOf(record.day), record));
  });

  return Array.from(groups.keys())
    .sort()
    .map((periodKey) => {
      const group = groups.get(periodKey) ?? { download: 0, upload: 0, days: new Set<string>() };
      const [year, month] = periodKey.split('-').map(Number);
      const [shamsiYear, shamsiMonth] = toShamsi(year, month, 1);
      const highest = dataset.monthlyHighestConsumers[periodKey] ?? UNKNOWN_CONSUMER;

      return monthlyAggregateSchema.parse({
        periodKey,
        periodLabel: shamsiMonthName(shamsiMonth),
        shamsiYear,
        shamsiMonth,
        daysCount: group.days.size,
        totals: createTotals(group.download, group.upload),
        highestConsumerName: highest.userName,
        highestConsumerUsageMB: round2(highest.totalUsageMB),
      });
    });
};

export const computeQuarterlyAggregates = (dataset: Dataset): QuarterlyAggregate[] => {
  const groups = new Map<string, PeriodAccumulator>();
  const keys = new Map<string, { shamsiYear: number; quarter: Quarter }>();

  dataset.users.forEach((user) => {
    user.dailyData.forEach((record) => {
      const [year, month, day] = record.day.split('-').map(Number);
      const [shamsiYear, shamsiMonth] = toShamsi(year, month, day);
      const quarter = QUARTER_BY_SHAMSI_MONTH[shamsiMonth];
      const key = `${shamsiYear}-${quarter}`;
      keys.set(key, { shamsiYear, quarter });
      accumulate(groups, key, record);
    });
  });

  return Array.from(keys.entries())
    .sort(([, a], [, b]) => a.shamsiYear - b.shamsiYear || a.quarter - b.quarter)
    .map(([periodKey, { shamsiYear, quarter }]) => {
      const group = groups.get(periodKey) ?? { download: 0, upload: 0, days: new Set<string>() };
      return quarterlyAggregateSchema.parse({
        periodKey,
        periodLabel: QUARTER_NAMES[quarter],
        shamsiYear,
        quarter,
        daysCount: group.days.size,
        totals: createTotals(group.download, group.upload),
      });
    });
};

/**
 * Per Gregorian month, the user with the largest monthly total over the whole
 * history. Equal totals go to the display name that sorts first.
 */
export const deriveMonthlyHighestConsumers = (users: UserRecord[]): Record<string, HighestConsumer> => {
  const perMonth = new Map<string, Map<string, number>>();
  users.forEach((user) => {
    user.dailyData.forEach((record) => {
      const key = monthKeyOf(record.day);
      let byUser = perMonth.get(key);
      if (!byUser) {
        byUser = new Map();
        perMonth.set(key, byUser);
      }
      byUser.set(user.displayName, (byUser.get(user.displayName) ?? 0) + record.downloadMB + record.uploadMB);
    });
  });

  const result: Record<string, HighestConsumer> = {};
  for (const key of Array.from(perMonth.keys()).sort()) {
    let best: HighestConsumer | null = null;
    for (const [userName, total] of perMonth.get(key) ?? []) {
      const usage = round2(total);
      if (!best || usage > best.totalUsageMB || (usage === best.totalUsageMB && userName < best.userName)) {
        best = { userName, totalUsageMB: usage };
      }
    }
    if (best) result[key] = best;
  }
  return result;
};

const SORT_FIELD = {
  totalUsage: 'totalUsageMB',
  totalDownload: 'totalDownloadMB',
  totalUpload: 'totalUploadMB',
} as const;

const compareIds = (a: UserRecord, b: UserRecord) => (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0);

export const sortUsers = (users: UserRecord[], sortOrder: SortOrder): UserRecord[] => {
  const sorted = [...users];
  if (sortOrder.column === null) return sorted.sort(compareIds);

  const field = SORT_FIELD[sortOrder.column];
  const sign = sortOrder.direction === 'asc' ? 1 : -1;
  return sorted.sort((a, b) => sign * (a.summary[field] - b.summary[field]) || compareIds(a, b));
};
