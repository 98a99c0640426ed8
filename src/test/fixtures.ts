import type { DailyRecord, Dataset, UserRecord } from '../types';
import { deriveMonthlyHighestConsumers, round2, sumTotals } from '../utils/aggregation';

export const record = (
  userId: string,
  displayName: string,
  day: string,
  downloadMB: number,
  uploadMB: number,
): DailyRecord => ({ userId, displayName, day, downloadMB, uploadMB, totalMB: round2(downloadMB + uploadMB) });

export const userOf = (userId: string, displayName: string, dailyData: DailyRecord[]): UserRecord => ({
  userId,
  displayName,
  dailyData,
  summary: sumTotals(dailyData),
});

export const datasetOf = (users: UserRecord[]): Dataset => {
  const days = users.flatMap((u) => u.dailyData.map((d) => d.day)).sort();
  return {
    users,
    dateRange: { startDate: days[0] ?? '', endDate: days[days.length - 1] ?? '' },
    monthlyHighestConsumers: deriveMonthlyHighestConsumers(users),
  };
};

/**
 * Two users over March 2024: A uses 100 MB (70 down, 30 up) on the 1st and
 * 31st, B uses 50 MB (30 down, 20 up) on the 15th.
 */
export const marchDataset = (): Dataset =>
  datasetOf([
    userOf('pc-a', 'A', [record('pc-a', 'A', '2024-03-31', 30, 20), record('pc-a', 'A', '2024-03-01', 40, 10)]),
    userOf('pc-b', 'B', [record('pc-b', 'B', '2024-03-15', 30, 20)]),
  ]);
