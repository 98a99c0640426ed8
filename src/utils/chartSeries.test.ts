import { describe, expect, it } from 'vitest';
import { marchDataset } from '../test/fixtures';
import { computeMonthlyAggregates, computeQuarterlyAggregates } from './aggregation';
import {
  dailySeries,
  monthColor,
  monthlyHighestSeries,
  monthlyTotalsSeries,
  overviewSeries,
  quarterlySeries,
  SERIES_COLORS,
} from './chartSeries';

const dataset = marchDataset();

describe('chartSeries', () => {
  it('colours months by season shade', () => {
    expect(monthColor(1)).toBe('#69F0AE');
    expect(monthColor(12)).toBe('#1565C0');
    expect(monthColor(13)).toBe(SERIES_COLORS.usage);
  });

  it('plots each user with three totals', () => {
    expect(overviewSeries(dataset.users)[1]).toEqual({ name: 'B', upload: 20, download: 30, usage: 50 });
  });

  it('labels months with their Shamsi year', () => {
    const months = computeMonthlyAggregates(dataset);

    expect(monthlyTotalsSeries(months)).toEqual([{ name: 'اسفند ۱۴۰۲', value: 150, color: '#1565C0' }]);
    expect(monthlyHighestSeries(months)).toEqual([
      { name: 'اسفند ۱۴۰۲', value: 100, color: SERIES_COLORS.highest, consumer: 'A' },
    ]);
  });

  it('plots seasons in order', () => {
    expect(quarterlySeries(computeQuarterlyAggregates(dataset))).toEqual([
      { name: 'زمستان ۱۴۰۲', value: 100, color: '#2196F3' },
      { name: 'بهار ۱۴۰۳', value: 50, color: '#4CAF50' },
    ]);
  });

  it('puts the oldest day first', () => {
    expect(dailySeries(dataset.users[0].dailyData)).toEqual([
      { name: '۱۴۰۲/۱۲/۱۱', usage: 50 },
      { name: '۱۴۰۳/۰۱/۱۲', usage: 50 },
    ]);
  });
});
