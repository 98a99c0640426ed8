import React from 'react';
import { AlertCircle } from 'lucide-react';
import { t } from '../locale';

type State = { hasError: boolean; message?: string };

export class ErrorBoundary extends React.Component<{ children: React.ReactNode }, State> {
  state: State = { hasError: false };

  static getDerivedStateFromError(error: unknown): State {
    return { hasError: true, message: error instanceof Error ? error.message : String(error) };
  }

  componentDidCatch(error: unknown, info: React.ErrorInfo) {
    console.error('[ErrorBoundary] Report failed to render:', error, info.componentStack);
  }

  render() {
    if (this.state.hasError) {
      return (
        <div className="min-h-screen bg-slate-50 flex items-center justify-center p-4">
          <div className="bg-white p-8 rounded-2xl shadow-xl max-w-md w-full text-center space-y-3">
            <div className="bg-red-100 p-3 rounded-full w-fit mx-auto"><AlertCircle className="w-8 h-8 text-red-600" /></div>
            <h1 className="text-lg font-bold text-slate-800">{t.renderFailed}</h1>
            {this.state.message && <p className="text-sm text-slate-500">{this.state.message}</p>}
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}
