import React, { useMemo } from 'react';
import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { ArrowDown, ArrowUp, ArrowUpDown, Users } from 'lucide-react';
import type { DateRange, ReportViews, SortColumn, SortOrder } from '../types';
import { t } from '../locale';
import { formatMegabytes, formatNumber } from '../utils/format';
import { formatShamsiDate, toPersianDigits } from '../utils/shamsiCalendar';
import { overviewSeries, SERIES_COLORS } from '../utils/chartSeries';
import { chartTooltipStyle, ReportPanel, tableClasses as tc } from './ReportPanel';

interface OverviewReportProps {
  views: ReportViews;
  sortOrder: SortOrder;
  onSort: (column: SortColumn) => void;
  onSelectUser: (displayName: string) => void;
}

const rangeSubtitle = ({ startDate, endDate }: DateRange) =>
  `(${toPersianDigits(formatShamsiDate(startDate))} - ${toPersianDigits(formatShamsiDate(endDate))})`;

const SortIcon: React.FC<{ column: SortColumn; sortOrder: SortOrder }> = ({ column, sortOrder }) => {
  if (sortOrder.column !== column) return <ArrowUpDown className="w-3 h-3 text-slate-300" />;
  return sortOrder.direction === 'asc' ? <ArrowUp className="w-3 h-3 text-blue-500" /> : <ArrowDown className="w-3 h-3 text-blue-500" />;
};

export const OverviewReport: React.FC<OverviewReportProps> = ({ views, sortOrder, onSort, onSelectUser }) => {
  const chartData = useMemo(() => overviewSeries(views.users), [views.users]);
  const c = t.columns;

  const sortableHeader = (column: SortColumn, label: string) => (
    <th className={tc.th}>
      <button onClick={() => onSort(column)} className="inline-flex items-center gap-1 hover:text-blue-600">
        {label} <SortIcon column={column} sortOrder={sortOrder} />
      </button>
    </th>
  );

  return (
    <ReportPanel
      title={t.report.overviewTitle}
      icon={<Users className="w-5 h-5 text-blue-500" />}
      subtitle={rangeSubtitle(views.filtered.dateRange)}
    >
      <div className="h-[400px] w-full">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
            <XAxis dataKey="name" axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 10 }} />
            <YAxis axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 12 }} tickFormatter={(val) => toPersianDigits(val)} />
            <Tooltip cursor={{ fill: '#f8fafc' }} contentStyle={chartTooltipStyle} formatter={(value) => formatMegabytes(Number(value))} />
            <Legend />
            <Bar name={t.series.upload} dataKey="upload" fill={SERIES_COLORS.upload} radius={[4, 4, 0, 0]} />
            <Bar name={t.series.download} dataKey="download" fill={SERIES_COLORS.download} radius={[4, 4, 0, 0]} />
            <Bar name={t.series.usage} dataKey="usage" fill={SERIES_COLORS.usage} radius={[4, 4, 0, 0]} />
          </BarChart>
        </ResponsiveContainer>
      </div>

      <div className={tc.wrapper}>
        <table className={tc.table}>
          <thead className={tc.head}>
            <tr>
              <th className={tc.th}>{c.row}</th>
              <th className={tc.th}>{c.computer}</th>
              <th className={tc.th}>{c.user}</th>
              {sortableHeader('totalUpload', c.upload)}
              {sortableHeader('totalDownload', c.download)}
              {sortableHeader('totalUsage', c.usage)}
            </tr>
          </thead>
          <tbody className={tc.body}>
            {views.users.map((user, i) => (
              <tr
                key={user.userId}
                className={`hover:bg-slate-50 ${user.summary.totalUsageMB === views.maxUserUsageMB ? tc.highlight : ''}`}
              >
                <td className={tc.td}>{toPersianDigits(i + 1)}</td>
                <td className={tc.td}>{user.userId}</td>
                <td className={tc.td}>
                  <button onClick={() => onSelectUser(user.displayName)} className="text-blue-600 hover:underline">
                    {user.displayName}
                  </button>
                </td>
                <td className={tc.td}>{formatNumber(user.summary.totalUploadMB)}</td>
                <td className={tc.td}>{formatNumber(user.summary.totalDownloadMB)}</td>
                <td className={tc.td}>{formatNumber(user.summary.totalUsageMB)}</td>
              </tr>
            ))}
            <tr className={tc.totals}>
              <td className={tc.td} colSpan={3}>{c.grandTotal}</td>
              <td className={tc.td}>{formatMegabytes(views.overviewTotals.totalUploadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.overviewTotals.totalDownloadMB)}</td>
              <td className={tc.td}>{formatMegabytes(views.overviewTotals.totalUsageMB)}</td>
            </tr>
          </tbody>
        </table>
      </div>
    </ReportPanel>
  );
};
