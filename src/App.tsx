import React from 'react';
import { AlertCircle, Loader2, RefreshCw } from 'lucide-react';
import { Dashboard } from './components/Dashboard';
import { AdvisoryToast } from './components/AdvisoryToast';
import { useReportState } from './hooks/useReportState';
import { t } from './locale';

const App: React.FC = () => {
  const { state, dispatch, retry } = useReportState();

  if (state.status === 'failed') {
    return (
      <div className="min-h-screen bg-slate-100 flex items-center justify-center p-4">
        <div className="bg-white p-8 rounded-2xl shadow-xl w-full max-w-md space-y-4 text-center">
          <div className="bg-red-100 p-3 rounded-full w-fit mx-auto"><AlertCircle className="w-8 h-8 text-red-600" /></div>
          <h1 className="text-xl font-bold text-slate-800">{t.loadFailed}</h1>
          {state.loadError && <p className="text-sm text-slate-500">{state.loadError}</p>}
          <button onClick={retry} className="w-full bg-blue-600 hover:bg-blue-700 text-white font-bold py-3 rounded-lg flex items-center justify-center gap-2">
            <RefreshCw className="w-4 h-4" /> {t.retry}
          </button>
        </div>
      </div>
    );
  }

  if (state.status === 'loading' || !state.dataset || !state.views) {
    return (
      <div className="h-screen flex items-center justify-center gap-2 bg-slate-100 text-slate-500">
        <Loader2 className="w-5 h-5 animate-spin" /> {t.loading}
      </div>
    );
  }

  return (
    <>
      <Dashboard state={state} dataset={state.dataset} views={state.views} dispatch={dispatch} />
      <AdvisoryToast advisory={state.advisory} onDismiss={(id) => dispatch({ type: 'dismissAdvisory', id })} />
    </>
  );
};

export default App;
