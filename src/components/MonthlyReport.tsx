import React, { useMemo } from 'react';
import { Bar, BarChart, CartesianGrid, Cell, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { CalendarRange, Crown, TrendingUp } from 'lucide-react';
import type { MonthlyChartMode, ReportViews } from '../types';
import { interpolate, t } from '../locale';
import { formatMegabytes, formatNumber } from '../utils/format';
import { toPersianDigits } from '../utils/shamsiCalendar';
import { monthlyHighestSeries, monthlyTotalsSeries } from '../utils/chartSeries';
import { chartTooltipStyle, ReportPanel, tableClasses as tc, ToggleButton } from './ReportPanel';

interface MonthlyReportProps {
  views: ReportViews;
  chartMode: MonthlyChartMode;
  onToggleChart: () => void;
}

export const MonthlyReport: React.FC<MonthlyReportProps> = ({ views, chartMode, onToggleChart }) => {
  const showHighest = chartMode === 'highest';
  const chartData = useMemo(
    () => (showHighest ? monthlyHighestSeries(views.monthly) : monthlyTotalsSeries(views.monthly)),
    [views.monthly, showHighest],
  );
  const maxUsage = views.monthly.reduce((max, m) => Math.max(max, m.totals.totalUsageMB), 0);
  const c = t.columns;

  if (views.monthly.length === 0) {
    return <p className="text-center text-slate-500 py-12">{t.report.monthlyEmpty}</p>;
  }

  return (
    <ReportPanel
      title={t.report.monthlyTitle}
      icon={<CalendarRange className="w-5 h-5 text-blue-500" />}
      actions={
        <>
          <ToggleButton active={!showHighest} onClick={() => showHighest && onToggleChart()}>
            <TrendingUp className="w-4 h-4" /> {t.report.showMonthlyTotals}
          </ToggleButton>
          <ToggleButton active={showHighest} onClick={() => !showHighest && onToggleChart()}>
            <Crown className="w-4 h-4" /> {t.report.showMonthlyHighest}
          </ToggleButton>
        </>
      }
    >
      <h3 className="text-sm font-semibold text-slate-500 mb-2">
        {showHighest ? t.report.monthlyHighestChart : t.report.monthlyTotalsChart}
      </h3>
      <div className="h-[360px] w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
            <XAxis dataKey="name" axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 10 }} />
            <YAxis axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 12 }} tickFormatter={(val) => toPersianDigits(val)} />
            <Tooltip
              cursor={{ fill: '#f8fafc' }}
              contentStyle={chartTooltipStyle}
              formatter={(value, _name, item) => {
                const consumer: unknown = item.payload?.consumer;
                const label = typeof consumer === 'string' ? interpolate(t.report.consumer, { name: consumer }) : t.series.monthlyUsage;
                return [formatMegabytes(Number(value)), label];
              }}
            />
            <Bar name={showHighest ? t.series.highestUsage : t.series.monthlyUsage} dataKey="value" radius={[4, 4, 0, 0]}>
              {chartData.map((point) => (
                <Cell key={point.name} fill={point.color} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>

      <div className={tc.wrapper}>
        <table className={tc.table}>
          <thead className={tc.head}>
            <tr>
              {[c.row, c.month, c.days, c.upload, c.download, c.usage, c.highestConsumer, c.highestUsage].map((h) => (
                <th key={h} className={tc.th}>{h}</th>
              ))}
            </tr>
          </thead>
          <tbody className={tc.body}>
            {views.monthly.map((m, i) => (
              <tr key={m.periodKey} className={`hover:bg-slate-50 ${m.totals.totalUsageMB === maxUsage ? tc.highlight : ''}`}>
                <td className={tc.td}>{toPersianDigits(i + 1)}</td>
                <td className={tc.td}>{m.periodLabel} {toPersianDigits(m.shamsiYear)}</td>
                <td className={tc.td}>{toPersianDigits(m.daysCount)}</td>
                <td className={tc.td}>{formatNumber(m.totals.totalUploadMB)}</td>
                <td className={tc.td}>{formatNumber(m.totals.totalDownloadMB)}</td>
                <td className={tc.td}>{formatNumber(m.totals.totalUsageMB)}</td>
                <td className={tc.td}>{m.highestConsumerName}</td>
                <td className={tc.td}>{formatMegabytes(m.highestConsumerUsageMB)}</td>
              </tr>
            ))}
            <tr className={tc.totals}>
              <td className={tc.td} colSpan={3}>{c.grandTotal}</td>
              <td className={tc.td}>{formatMegabytes(views.monthlyTotals.totalUploadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.monthlyTotals.totalDownloadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.monthlyTotals.totalUsageMB)}</td>
              <td className={tc.td} colSpan={2} />
            </tr>
          </tbody>
        </table>
      </div>
    </ReportPanel>
  );
};
