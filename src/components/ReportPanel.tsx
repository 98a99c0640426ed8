import React from 'react';

interface ReportPanelProps {
  title: string;
  icon: React.ReactNode;
  subtitle?: string;
  actions?: React.ReactNode;
  children: React.ReactNode;
}

export const ReportPanel: React.FC<ReportPanelProps> = ({ title, icon, subtitle, actions, children }) => (
  <div className="bg-white rounded-2xl shadow-sm border border-slate-200 p-6 print-section">
    <div className="flex flex-col md:flex-row md:items-center justify-between gap-3 mb-6">
      <h2 className="text-lg font-semibold text-slate-800 flex items-center gap-2">
        {icon}
        {title}
        {subtitle && <span className="text-sm font-normal text-slate-500 mr-2">{subtitle}</span>}
      </h2>
      {actions && <div className="no-print flex bg-slate-100 rounded-lg p-1">{actions}</div>}
    </div>
    {children}
  </div>
);

export const ToggleButton: React.FC<{ active: boolean; onClick: () => void; children: React.ReactNode }> = ({
  active,
  onClick,
  children,
}) => (
  <button
    onClick={onClick}
    className={`flex items-center gap-2 px-4 py-1.5 rounded-md text-sm font-medium transition-all ${active ? 'bg-white text-blue-600 shadow-sm' : 'text-slate-600'}`}
  >
    {children}
  </button>
);

export const tableClasses = {
  wrapper: 'overflow-hidden overflow-x-auto rounded-lg border border-slate-200 mt-6',
  table: 'min-w-full divide-y divide-slate-200',
  head: 'bg-slate-50',
  th: 'px-4 py-3 text-right text-xs font-medium text-slate-500',
  body: 'bg-white divide-y divide-slate-200',
  td: 'px-4 py-3 whitespace-nowrap text-sm text-slate-700',
  highlight: 'bg-amber-50 font-semibold',
  totals: 'bg-slate-100 font-bold text-slate-900',
};

export const chartTooltipStyle = {
  borderRadius: '12px',
  border: 'none',
  boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)',
};
