import React from 'react';
import { Calendar, Filter } from 'lucide-react';
import type { DateRange, RangePreset } from '../types';
import { t } from '../locale';
import { RANGE_PRESETS } from '../utils/rangePresets';
import { formatShamsiDate, toPersianDigits } from '../utils/shamsiCalendar';

interface ReportControlsProps {
  bounds: DateRange;
  displayed: Partial<DateRange>;
  preset: RangePreset;
  onPresetChange: (preset: RangePreset) => void;
  onStageDate: (field: keyof DateRange, value: string) => void;
  onApply: () => void;
}

const isPreset = (value: string): value is RangePreset => RANGE_PRESETS.some((p) => p === value);

const inputClass =
  'bg-slate-50 border border-slate-200 text-slate-700 py-2 px-3 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 text-sm font-medium';

export const ReportControls: React.FC<ReportControlsProps> = ({
  bounds,
  displayed,
  preset,
  onPresetChange,
  onStageDate,
  onApply,
}) => {
  const dateField = (field: keyof DateRange, label: string) => (
    <div className="flex flex-col gap-1">
      <label className="text-xs font-semibold text-slate-500">{label}</label>
      <input
        type="date"
        value={displayed[field] ?? ''}
        min={bounds.startDate}
        max={bounds.endDate}
        onChange={(e) => onStageDate(field, e.target.value)}
        className={`${inputClass} w-full md:w-44`}
      />
      <span className="text-xs text-slate-400 h-4">{toPersianDigits(formatShamsiDate(displayed[field]))}</span>
    </div>
  );

  return (
    <div className="no-print bg-white p-4 rounded-xl border border-slate-200 shadow-sm flex flex-col md:flex-row gap-4 justify-between md:items-end">
      <div className="flex flex-col md:flex-row gap-4 w-full md:w-auto">
        <div className="flex flex-col gap-1">
          <label className="text-xs font-semibold text-slate-500 flex items-center gap-1">
            <Calendar className="w-3.5 h-3.5" /> {t.controls.range}
          </label>
          <select
            value={preset}
            onChange={(e) => {
              if (isPreset(e.target.value)) onPresetChange(e.target.value);
            }}
            className={`${inputClass} w-full md:w-40`}
          >
            {RANGE_PRESETS.map((p) => (
              <option key={p} value={p}>{t.controls.presets[p]}</option>
            ))}
          </select>
          <span className="h-4" />
        </div>
        {dateField('startDate', t.controls.from)}
        {dateField('endDate', t.controls.to)}
      </div>

      <button
        onClick={onApply}
        className="flex items-center justify-center gap-2 px-5 py-2 mb-5 rounded-lg bg-blue-600 hover:bg-blue-700 text-white text-sm font-semibold shadow-sm transition-colors"
      >
        <Filter className="w-4 h-4" /> {t.controls.apply}
      </button>
    </div>
  );
};
