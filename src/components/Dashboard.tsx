import React, { useEffect, useRef, useState } from 'react';
import { BarChart3, Check, ChevronDown, FileSpreadsheet, Home, Printer, Wifi } from 'lucide-react';
import type { Dataset, ReportState, ReportView, ReportViews } from '../types';
import type { ReportAction } from '../utils/reportReducer';
import { t } from '../locale';
import { findUser } from '../utils/reportViews';
import { buildExportTable } from '../utils/exporter';
import { exportService } from '../services/exportService';
import { ReportControls } from './ReportControls';
import { OverviewReport } from './OverviewReport';
import { MonthlyReport } from './MonthlyReport';
import { QuarterlyReport } from './QuarterlyReport';
import { UserReport } from './UserReport';

interface DashboardProps {
  state: ReportState;
  dataset: Dataset;
  views: ReportViews;
  dispatch: React.Dispatch<ReportAction>;
}

type ExportFormat = 'csv' | 'xlsx';

const useClickOutside = (ref: React.RefObject<HTMLElement>, onOutside: () => void) => {
  useEffect(() => {
    const handleClickOutside = (event: MouseEvent) => {
      if (ref.current && event.target instanceof Node && !ref.current.contains(event.target)) onOutside();
    };
    document.addEventListener('mousedown', handleClickOutside);
    return () => document.removeEventListener('mousedown', handleClickOutside);
  }, [ref, onOutside]);
};

const sameView = (a: ReportView, b: ReportView) =>
  a.kind === b.kind && (a.kind !== 'user' || (b.kind === 'user' && a.displayName === b.displayName));

export const Dashboard: React.FC<DashboardProps> = ({ state, dataset, views, dispatch }) => {
  const [openMenu, setOpenMenu] = useState<'reports' | 'export' | null>(null);
  const menuRef = useRef<HTMLElement>(null);
  const closeMenu = React.useCallback(() => setOpenMenu(null), []);
  useClickOutside(menuRef, closeMenu);

  const { selectedView, appliedRange } = state;
  const displayed = { ...appliedRange, ...state.pendingRange };

  const selectView = (view: ReportView) => {
    setOpenMenu(null);
    dispatch({ type: 'selectView', view });
  };

  const handleExport = (format: ExportFormat) => {
    setOpenMenu(null);
    if (!appliedRange) return;
    const table = buildExportTable(selectedView, views, appliedRange);
    if (!table) {
      dispatch({ type: 'raiseAdvisory', kind: 'warning', text: t.advisory.exportNoData });
      return;
    }
    try {
      exportService[format](table);
    } catch (e) {
      console.error(`[export] ${format} export failed`, e);
      dispatch({ type: 'raiseAdvisory', kind: 'warning', text: t.advisory.exportFailed });
    }
  };

  const menuItem = (label: string, active: boolean, onClick: () => void, icon?: React.ReactNode) => (
    <div key={label} className="flex items-center gap-3 p-3 hover:bg-slate-50 cursor-pointer" onClick={onClick}>
      <div className="w-4 h-4 flex items-center justify-center">
        {active ? <Check className="w-4 h-4 text-blue-600" /> : icon}
      </div>
      <span className={`text-sm ${active ? 'font-medium text-blue-600' : 'text-slate-700'}`}>{label}</span>
    </div>
  );

  const navButton = 'flex items-center gap-2 px-3 py-2 rounded-lg text-sm font-medium text-slate-600 hover:bg-slate-100 transition-colors';
  const selectedUser = selectedView.kind === 'user' ? findUser(views, selectedView.displayName) : null;

  let content: React.ReactNode = null;
  switch (selectedView.kind) {
    case 'overview':
      if (views.users.length > 0) {
        content = (
          <OverviewReport
            views={views}
            sortOrder={state.sortOrder}
            onSort={(column) => dispatch({ type: 'toggleSort', column })}
            onSelectUser={(displayName) => selectView({ kind: 'user', displayName })}
          />
        );
      }
      break;
    case 'monthly':
      content = (
        <MonthlyReport views={views} chartMode={state.monthlyChartMode} onToggleChart={() => dispatch({ type: 'toggleMonthlyChart' })} />
      );
      break;
    case 'quarterly':
      content = <QuarterlyReport views={views} />;
      break;
    case 'user':
      if (selectedUser) {
        content = (
          <UserReport user={selectedUser} chartMode={state.chartMode} onChartModeChange={(mode) => dispatch({ type: 'setChartMode', mode })} />
        );
      }
      break;
  }

  return (
    <div className="min-h-screen bg-slate-50 pb-20">
      <header className="no-print bg-white border-b border-slate-200 sticky top-0 z-30 shadow-sm">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 h-16 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="bg-blue-100 p-2 rounded-full"><Wifi className="w-5 h-5 text-blue-600" /></div>
            <h1 className="text-lg font-bold text-slate-900">{t.title}</h1>
          </div>

          <nav className="flex items-center gap-1" ref={menuRef}>
            <button onClick={() => selectView({ kind: 'overview' })} className={navButton}>
              <Home className="w-4 h-4" /> {t.nav.home}
            </button>

            <div className="relative">
              <button onClick={() => setOpenMenu(openMenu === 'reports' ? null : 'reports')} className={navButton}>
                <BarChart3 className="w-4 h-4" /> {t.nav.reports} <ChevronDown className="w-4 h-4 text-slate-400" />
              </button>
              {openMenu === 'reports' && (
                <div className="absolute top-full left-0 mt-1 w-60 bg-white border border-slate-200 rounded-lg shadow-xl z-50 max-h-96 overflow-y-auto">
                  {menuItem(t.nav.monthly, selectedView.kind === 'monthly', () => selectView({ kind: 'monthly' }))}
                  {menuItem(t.nav.quarterly, selectedView.kind === 'quarterly', () => selectView({ kind: 'quarterly' }))}
                  <div className="px-3 pt-3 pb-1 text-xs font-semibold text-slate-400 border-t border-slate-100">{t.nav.users}</div>
                  {dataset.users.map((u) => {
                    const view: ReportView = { kind: 'user', displayName: u.displayName };
                    return menuItem(u.displayName, sameView(selectedView, view), () => selectView(view));
                  })}
                </div>
              )}
            </div>

            <div className="relative">
              <button onClick={() => setOpenMenu(openMenu === 'export' ? null : 'export')} className={navButton}>
                <Printer className="w-4 h-4" /> {t.nav.printAndSave} <ChevronDown className="w-4 h-4 text-slate-400" />
              </button>
              {openMenu === 'export' && (
                <div className="absolute top-full left-0 mt-1 w-56 bg-white border border-slate-200 rounded-lg shadow-xl z-50">
                  {menuItem(t.nav.exportCsv, false, () => handleExport('csv'), <FileSpreadsheet className="w-4 h-4 text-green-600" />)}
                  {menuItem(t.nav.exportXlsx, false, () => handleExport('xlsx'), <FileSpreadsheet className="w-4 h-4 text-green-700" />)}
                  {menuItem(t.nav.print, false, () => { setOpenMenu(null); exportService.print(); }, <Printer className="w-4 h-4 text-slate-500" />)}
                </div>
              )}
            </div>
          </nav>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 space-y-6">
        <ReportControls
          bounds={dataset.dateRange}
          displayed={displayed}
          preset={state.preset}
          onPresetChange={(preset) => dispatch({ type: 'selectPreset', preset, reference: new Date() })}
          onStageDate={(field, value) => dispatch({ type: 'stageDate', field, value })}
          onApply={() => dispatch({ type: 'applyDateRange', reference: new Date() })}
        />
        {content}
      </main>
    </div>
  );
};
