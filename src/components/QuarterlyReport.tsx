import React, { useMemo } from 'react';
import { Bar, BarChart, CartesianGrid, Cell, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { Leaf } from 'lucide-react';
import type { ReportViews } from '../types';
import { t } from '../locale';
import { formatMegabytes, formatNumber } from '../utils/format';
import { toPersianDigits } from '../utils/shamsiCalendar';
import { quarterlySeries } from '../utils/chartSeries';
import { chartTooltipStyle, ReportPanel, tableClasses as tc } from './ReportPanel';

export const QuarterlyReport: React.FC<{ views: ReportViews }> = ({ views }) => {
  const chartData = useMemo(() => quarterlySeries(views.quarterly), [views.quarterly]);
  const maxUsage = views.quarterly.reduce((max, q) => Math.max(max, q.totals.totalUsageMB), 0);
  const c = t.columns;

  if (views.quarterly.length === 0) {
    return <p className="text-center text-slate-500 py-12">{t.report.quarterlyEmpty}</p>;
  }

  return (
    <ReportPanel title={t.report.quarterlyTitle} icon={<Leaf className="w-5 h-5 text-green-500" />}>
      <h3 className="text-sm font-semibold text-slate-500 mb-2">{t.report.quarterlyChart}</h3>
      <div className="h-[360px] w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
            <XAxis dataKey="name" axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 11 }} />
            <YAxis axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 12 }} tickFormatter={(val) => toPersianDigits(val)} />
            <Tooltip cursor={{ fill: '#f8fafc' }} contentStyle={chartTooltipStyle} formatter={(value) => formatMegabytes(Number(value))} />
            <Bar name={t.series.quarterlyUsage} dataKey="value" radius={[4, 4, 0, 0]} barSize={48}>
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
              {[c.row, c.shamsiYear, c.season, c.days, c.upload, c.download, c.usage].map((h) => (
                <th key={h} className={tc.th}>{h}</th>
              ))}
            </tr>
          </thead>
          <tbody className={tc.body}>
            {views.quarterly.map((q, i) => (
              <tr key={q.periodKey} className={`hover:bg-slate-50 ${q.totals.totalUsageMB === maxUsage ? tc.highlight : ''}`}>
                <td className={tc.td}>{toPersianDigits(i + 1)}</td>
                <td className={tc.td}>{toPersianDigits(q.shamsiYear)}</td>
                <td className={tc.td}>{q.periodLabel}</td>
                <td className={tc.td}>{toPersianDigits(q.daysCount)}</td>
                <td className={tc.td}>{formatNumber(q.totals.totalUploadMB)}</td>
                <td className={tc.td}>{formatNumber(q.totals.totalDownloadMB)}</td>
                <td className={tc.td}>{formatNumber(q.totals.totalUsageMB)}</td>
              </tr>
            ))}
            <tr className={tc.totals}>
              <td className={tc.td} colSpan={4}>{c.grandTotal}</td>
              <td className={tc.td}>{formatMegabytes(views.quarterlyTotals.totalUploadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.quarterlyTotals.totalDownloadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.quarterlyTotals.totalUsageMB)}</td>
            </tr>
          </tbody>
        </table>
      </div>
    </ReportPanel>
  );
};
