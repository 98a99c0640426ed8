import React from 'react';
import { AlertCircle, Info, X } from 'lucide-react';
import type { Advisory } from '../types';

interface AdvisoryToastProps {
  advisory: Advisory | null;
  onDismiss: (id: number) => void;
}

export const AdvisoryToast: React.FC<AdvisoryToastProps> = ({ advisory, onDismiss }) => {
  if (!advisory) return null;

  const isWarning = advisory.kind === 'warning';
  return (
    <div className="no-print fixed inset-x-0 top-20 z-50 flex justify-center px-4 pointer-events-none">
      <div
        role="alert"
        className={`pointer-events-auto flex items-start gap-3 max-w-lg w-full rounded-xl border shadow-xl p-4 bg-white ${isWarning ? 'border-amber-200' : 'border-blue-200'}`}
      >
        {isWarning ? <AlertCircle className="w-5 h-5 text-amber-500 shrink-0" /> : <Info className="w-5 h-5 text-blue-500 shrink-0" />}
        <p className={`flex-1 text-sm font-medium ${isWarning ? 'text-amber-800' : 'text-slate-700'}`}>{advisory.text}</p>
        <button onClick={() => onDismiss(advisory.id)} className="p-1 hover:bg-slate-100 rounded-full text-slate-400 transition-colors">
          <X className="w-4 h-4" />
        </button>
      </div>
    </div>
  );
};
