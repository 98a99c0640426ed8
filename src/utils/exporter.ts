import * as XLSX from 'xlsx';
import type { DateRange, ExportCell, ExportTable, ReportView, ReportViews, Totals } from '../types';
import { interpolate, t } from '../locale';
import { findUser, hasViewData } from './reportViews';
import { formatShamsiDate, toPersianDigits } from './shamsiCalendar';
import { formatMegabytes, formatNumber } from './format';

const CELL_NEEDS_QUOTES = /[;"\r\n]/;

export const escapeCell = (cell: ExportCell): string => {
  const text = String(cell);
  return CELL_NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/** `;`-separated, CRLF, BOM-prefixed so spreadsheet apps pick up UTF-8. */
export const toDelimitedText = (rows: ExportCell[][]): string =>
  '\uFEFF' + rows.map((row) => row.map(escapeCell).join(';')).join('\r\n');

const padded = (text: string, width: number): ExportCell[] => [text, ...Array<string>(width - 1).fill('')];

const rangeLine = ({ startDate, endDate }: DateRange) =>
  interpolate(t.report.rangeLine, {
    start: toPersianDigits(formatShamsiDate(startDate)),
    end: toPersianDigits(formatShamsiDate(endDate)),
  });

const totalsCells = (totals: Totals): ExportCell[] => [
  formatMegabytes(totals.totalUploadMB),
  formatMegabytes(totals.totalDownloadMB),
  formatMegabytes(totals.totalUsageMB),
];

const figureCells = (totals: Totals): ExportCell[] => [
  formatNumber(totals.totalUploadMB),
  formatNumber(totals.totalDownloadMB),
  formatNumber(totals.totalUsageMB),
];

const rowNumber = (index: number) => toPersianDigits(index + 1);

const withHeading = (headers: string[], range: DateRange, extra: string[] = []): ExportCell[][] => [
  padded(t.title, headers.length),
  padded(rangeLine(range), headers.length),
  ...extra.map((line) => padded(line, headers.length)),
  [],
  headers,
];

/**
 * Builds the display-ready rows for the selected view, or null when the view
 * has nothing to export.
 */
export const buildExportTable = (
  view: ReportView,
  views: ReportViews | null,
  appliedRange: DateRange,
): ExportTable | null => {
  if (!views || !hasViewData(views, view)) return null;
  const c = t.columns;

  switch (view.kind) {
    case 'overview': {
      const headers = [c.row, c.computer, c.user, c.upload, c.download, c.usage];
      return {
        title: t.title,
        fileSuffix: t.files.overview,
        rows: [
          ...withHeading(headers, views.filtered.dateRange),
          ...views.users.map((u, i) => [rowNumber(i), u.userId, u.displayName, ...figureCells(u.summary)]),
          ['', '', c.grandTotal, ...totalsCells(views.overviewTotals)],
        ],
      };
    }

    case 'monthly': {
      const headers = [c.row, c.month, c.days, c.upload, c.download, c.usage, c.highestConsumer, c.highestUsage];
      return {
        title: t.title,
        fileSuffix: t.files.monthly,
        rows: [
          ...withHeading(headers, appliedRange),
          ...views.monthly.map((m, i) => [
            rowNumber(i),
            `${m.periodLabel} ${toPersianDigits(m.shamsiYear)}`,
            toPersianDigits(m.daysCount),
            ...figureCells(m.totals),
            m.highestConsumerName,
            formatMegabytes(m.highestConsumerUsageMB),
          ]),
          ['', '', c.grandTotal, ...totalsCells(views.monthlyTotals), '', ''],
        ],
      };
    }

    case 'quarterly': {
      const headers = [c.row, c.year, c.season, c.days, c.upload, c.download, c.usage];
      return {
        title: t.title,
        fileSuffix: t.files.quarterly,
        rows: [
          ...withHeading(headers, appliedRange),
          ...views.quarterly.map((q, i) => [
            rowNumber(i),
            toPersianDigits(q.shamsiYear),
            q.periodLabel,
            toPersianDigits(q.daysCount),
            ...figureCells(q.totals),
          ]),
          ['', '', '', c.grandTotal, ...totalsCells(views.quarterlyTotals)],
        ],
      };
    }

    case 'user': {
      const user = findUser(views, view.displayName);
      if (!user) return null;
      const days = user.dailyData.map((d) => d.day).sort();
      const headers = [c.row, c.date, c.upload, c.download, c.usage];
      const detail = interpolate(t.report.userExportTitle, { name: user.displayName, id: user.userId });
      return {
        title: t.title,
        fileSuffix: user.displayName,
        rows: [
          ...withHeading(headers, { startDate: days[0], endDate: days[days.length - 1] }, [detail]),
          ...user.dailyData.map((d, i) => [
            rowNumber(i),
            toPersianDigits(formatShamsiDate(d.day)),
            formatNumber(d.uploadMB),
            formatNumber(d.downloadMB),
            formatNumber(d.totalMB),
          ]),
          ['', c.grandTotal, ...totalsCells(user.summary)],
        ],
      };
    }
  }
};

export const exportFileName = (table: ExportTable, extension: 'csv' | 'xlsx'): string =>
  `${t.files.base}-${table.fileSuffix}.${extension}`;

const SHEET_NAME = 'گزارش';

export const buildWorkbook = (table: ExportTable): XLSX.WorkBook => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(table.rows), SHEET_NAME);
  workbook.Workbook = { Views: [{ RTL: true }] };
  return workbook;
};
