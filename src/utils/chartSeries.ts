import type { DailyRecord, MonthlyAggregate, Quarter, QuarterlyAggregate, UserRecord } from '../types';
import { formatShamsiDate, toPersianDigits } from './shamsiCalendar';

// Lighter, main, darker shade per season.
const SEASON_PALETTES: Record<Quarter, [string, string, string]> = {
  1: ['#69F0AE', '#00C853', '#00A040'],
  2: ['#FFC107', '#FF9800', '#EF6C00'],
  3: ['#FF8A65', '#FF5722', '#D84315'],
  4: ['#64B5F6', '#2196F3', '#1565C0'],
};

const QUARTER_COLORS: Record<Quarter, string> = {
  1: '#4CAF50',
  2: '#FF9800',
  3: '#FFC107',
  4: '#2196F3',
};

export const SERIES_COLORS = {
  upload: '#4CAF50',
  download: '#2196F3',
  usage: '#FF9800',
  highest: '#DC2626',
  daily: '#4BC0C0',
} as const;

const MONTH_COLORS = [...SEASON_PALETTES[1], ...SEASON_PALETTES[2], ...SEASON_PALETTES[3], ...SEASON_PALETTES[4]];

export const monthColor = (shamsiMonth: number): string => MONTH_COLORS[shamsiMonth - 1] ?? SERIES_COLORS.usage;

export const quarterColor = (quarter: Quarter): string => QUARTER_COLORS[quarter];

export interface OverviewPoint {
  name: string;
  upload: number;
  download: number;
  usage: number;
}

export const overviewSeries = (users: UserRecord[]): OverviewPoint[] =>
  users.map((u) => ({
    name: u.displayName,
    upload: u.summary.totalUploadMB,
    download: u.summary.totalDownloadMB,
    usage: u.summary.totalUsageMB,
  }));

export interface PeriodPoint {
  name: string;
  value: number;
  color: string;
  consumer?: string;
}

export const monthlyTotalsSeries = (months: MonthlyAggregate[]): PeriodPoint[] =>
  months.map((m) => ({
    name: `${m.periodLabel} ${toPersianDigits(m.shamsiYear)}`,
    value: m.totals.totalUsageMB,
    color: monthColor(m.shamsiMonth),
  }));

export const monthlyHighestSeries = (months: MonthlyAggregate[]): PeriodPoint[] =>
  months.map((m) => ({
    name: `${m.periodLabel} ${toPersianDigits(m.shamsiYear)}`,
    value: m.highestConsumerUsageMB,
    color: SERIES_COLORS.highest,
    consumer: m.highestConsumerName,
  }));

export const quarterlySeries = (quarters: QuarterlyAggregate[]): PeriodPoint[] =>
  quarters.map((q) => ({
    name: `${q.periodLabel} ${toPersianDigits(q.shamsiYear)}`,
    value: q.totals.totalUsageMB,
    color: quarterColor(q.quarter),
  }));

export interface DailyPoint {
  name: string;
  usage: number;
}

// Oldest day first, so the x axis reads forward in time.
export const dailySeries = (records: DailyRecord[]): DailyPoint[] =>
  [...records]
    .sort((a, b) => (a.day < b.day ? -1 : a.day > b.day ? 1 : 0))
    .map((d) => ({ name: toPersianDigits(formatShamsiDate(d.day)), usage: d.totalMB }));
