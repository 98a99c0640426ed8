import type { DateRange, RangePreset } from '../types';
import {
  isIsoDate,
  startOfShamsiMonth,
  startOfShamsiMonthsAgo,
  startOfShamsiWeek,
  todayIso,
} from './shamsiCalendar';

export const RANGE_PRESETS: RangePreset[] = ['week', 'month', '3months', '6months'];

const presetStart = (preset: RangePreset, reference: Date): string => {
  switch (preset) {
    case 'week':
      return startOfShamsiWeek(reference);
    case 'month':
      return startOfShamsiMonth(reference);
    case '3months':
      return startOfShamsiMonthsAgo(2, reference);
    case '6months':
      return startOfShamsiMonthsAgo(5, reference);
  }
};

/** Preset window ending today; months are counted in the Shamsi calendar. */
export const presetRange = (preset: RangePreset, reference: Date = new Date()): DateRange => ({
  startDate: presetStart(preset, reference),
  endDate: todayIso(reference),
});

export const isValidRange = (startDate?: string | null, endDate?: string | null): boolean =>
  isIsoDate(startDate) && isIsoDate(endDate) && startDate <= endDate;

export const clampRange = (range: DateRange, bounds: DateRange): DateRange => {
  const startDate = range.startDate < bounds.startDate ? bounds.startDate : range.startDate;
  const endDate = range.endDate > bounds.endDate ? bounds.endDate : range.endDate;
  if (startDate > endDate) return { ...bounds };
  return { startDate, endDate };
};
