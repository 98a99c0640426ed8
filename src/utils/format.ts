import { toPersianDigits } from './shamsiCalendar';

export const formatNumber = (value: number): string => toPersianDigits(value);

// Values of 1024 MB and above switch to GB.
export const formatMegabytes = (mb: number): string =>
  mb >= 1024 ? `${toPersianDigits((mb / 1024).toFixed(2))} GB` : `${toPersianDigits(mb.toFixed(2))} MB`;
