import React, { useMemo } from 'react';
import { Bar, BarChart, CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { BarChart3, LineChart as LineIcon, User } from 'lucide-react';
import type { ChartMode, UserRecord } from '../types';
import { interpolate, t } from '../locale';
import { formatMegabytes, formatNumber } from '../utils/format';
import { formatShamsiDate, toPersianDigits } from '../utils/shamsiCalendar';
import { dailySeries, SERIES_COLORS } from '../utils/chartSeries';
import { maxDailyUsage } from '../utils/reportViews';
import { chartTooltipStyle, ReportPanel, tableClasses as tc, ToggleButton } from './ReportPanel';

interface UserReportProps {
  user: UserRecord;
  chartMode: ChartMode;
  onChartModeChange: (mode: ChartMode) => void;
}

export const UserReport: React.FC<UserReportProps> = ({ user, chartMode, onChartModeChange }) => {
  const chartData = useMemo(() => dailySeries(user.dailyData), [user.dailyData]);
  const maxUsage = maxDailyUsage(user.dailyData);
  const c = t.columns;

  const axes = (
    <>
      <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
      <XAxis dataKey="name" axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 10 }} />
      <YAxis axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 12 }} tickFormatter={(val) => toPersianDigits(val)} />
      <Tooltip contentStyle={chartTooltipStyle} formatter={(value) => formatMegabytes(Number(value))} />
    </>
  );

  return (
    <ReportPanel
      title={interpolate(t.report.userTitle, { name: user.displayName })}
      icon={<User className="w-5 h-5 text-blue-500" />}
      subtitle={`(${c.computer}: ${user.userId})`}
      actions={
        <>
          <ToggleButton active={chartMode === 'bar'} onClick={() => onChartModeChange('bar')}>
            <BarChart3 className="w-4 h-4" /> {t.report.barChart}
          </ToggleButton>
          <ToggleButton active={chartMode === 'line'} onClick={() => onChartModeChange('line')}>
            <LineIcon className="w-4 h-4" /> {t.report.lineChart}
          </ToggleButton>
        </>
      }
    >
      <h3 className="text-sm font-semibold text-slate-500 mb-2">{interpolate(t.report.userChart, { name: user.displayName })}</h3>
      <div className="h-[360px] w-full">
        <ResponsiveContainer width="100%" height="100%">
          {chartMode === 'bar' ? (
            <BarChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
              {axes}
              <Bar name={t.series.dailyUsage} dataKey="usage" fill={SERIES_COLORS.daily} radius={[4, 4, 0, 0]} />
            </BarChart>
          ) : (
            <LineChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
              {axes}
              <Line name={t.series.dailyUsage} dataKey="usage" type="monotone" stroke={SERIES_COLORS.daily} strokeWidth={2} dot={{ r: 3 }} />
            </LineChart>
          )}
        </ResponsiveContainer>
      </div>

      <div className={tc.wrapper}>
        <table className={tc.table}>
          <thead className={tc.head}>
            <tr>
              {[c.row, c.date, c.upload, c.download, c.usage].map((h) => (
                <th key={h} className={tc.th}>{h}</th>
              ))}
            </tr>
          </thead>
          <tbody className={tc.body}>
            {user.dailyData.map((d, i) => (
              <tr key={d.day} className={`hover:bg-slate-50 ${d.totalMB === maxUsage ? tc.highlight : ''}`}>
                <td className={tc.td}>{toPersianDigits(i + 1)}</td>
                <td className={tc.td}>{toPersianDigits(formatShamsiDate(d.day))}</td>
                <td className={tc.td}>{formatNumber(d.uploadMB)}</td>
                <td className={tc.td}>{formatNumber(d.downloadMB)}</td>
                <td className={tc.td}>{formatNumber(d.totalMB)}</td>
              </tr>
            ))}
            <tr className={tc.totals}>
              <td className={tc.td} colSpan={2}>{c.grandTotal}</td>
              <td className={tc.td}>{formatMegabytes(user.summary.totalUploadMB)}</td>
              <td className={tc.td}>{formatMegabytes(user.summary.totalDownloadMB)}</td>
              <td className={tc.td}>{formatMegabytes(user.summary.totalUsageMB)}</td>
            </tr>
          </tbody>
        </table>
      </div>
    </ReportPanel>
  );
};
