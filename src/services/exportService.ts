import * as XLSX from 'xlsx';
import type { ExportTable } from '../types';
import { buildWorkbook, exportFileName, toDelimitedText } from '../utils/exporter';

const downloadBlob = (blob: Blob, filename: string) => {
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = filename;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
  // Revoke once the click has been handled.
  setTimeout(() => URL.revokeObjectURL(url), 0);
};

export const exportService = {
  csv: (table: ExportTable) => {
    const blob = new Blob([toDelimitedText(table.rows)], { type: 'text/csv;charset=utf-8' });
    downloadBlob(blob, exportFileName(table, 'csv'));
  },

  xlsx: (table: ExportTable) => {
    XLSX.writeFile(buildWorkbook(table), exportFileName(table, 'xlsx'));
  },

  print: () => window.print(),
};
