'use client';

import { Component, ErrorInfo, ReactNode } from 'react';
import { AlertTriangle } from 'lucide-react';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
}

interface State {
  hasError: boolean;
  error?: Error;
  componentStack?: string;
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('Billing overview failed to render:', error, errorInfo);
    this.setState({ error, componentStack: errorInfo.componentStack ?? undefined });
  }

  private reset = () => {
    this.setState({ hasError: false, error: undefined, componentStack: undefined });
  };

  render() {
    if (!this.state.hasError) {
      return this.props.children;
    }

    if (this.props.fallback) {
      return this.props.fallback;
    }

    return (
      <div className="flex items-center justify-center bg-neutral-50 px-4 py-16">
        <div className="max-w-2xl w-full bg-white rounded-lg shadow-lg border border-red-200 p-8">
          <div className="flex items-start space-x-4">
            <AlertTriangle className="h-10 w-10 flex-shrink-0 text-red-500" aria-hidden="true" />
            <div className="flex-1">
              <h1 className="text-2xl font-bold text-neutral-900 mb-2">Billing overview unavailable</h1>
              <p className="text-neutral-600 mb-4">
                The billing data could not be displayed. Bills already issued are not affected.
              </p>

              {this.state.error && (
                <pre className="bg-red-50 rounded-lg p-4 mb-4 text-xs text-red-700 overflow-x-auto">
                  {this.state.error.message}
                </pre>
              )}

              {this.state.componentStack && process.env.NODE_ENV === 'development' && (
                <details className="bg-neutral-100 rounded-lg p-4 mb-4">
                  <summary className="text-sm font-semibold text-neutral-700 cursor-pointer">
                    Component stack
                  </summary>
                  <pre className="text-xs text-neutral-600 mt-2 overflow-x-auto">{this.state.componentStack}</pre>
                </details>
              )}

              <button
                onClick={this.reset}
                className="px-4 py-2 bg-blue-600 text-white rounded-lg hover:bg-blue-700 transition-colors"
              >
                Try again
              </button>
            </div>
          </div>
        </div>
      </div>
    );
  }
}

export default ErrorBoundary;
