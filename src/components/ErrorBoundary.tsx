/**
 * Error Boundary Component
 *
 * WHAT: Catches rendering errors in the child component tree.
 *
 * WHY: A crash while the overlay is up would otherwise leave a blank
 * page. The fallback offers a retry that also clears loading state.
 *
 * HOW: Class component error boundary lifecycle methods.
 * Must be a class component as hooks cannot catch rendering errors.
 */

import { Component, type ErrorInfo, type ReactNode } from 'react';

interface Props {
  children: ReactNode;
  /** Replaces the default error screen; receives the retry callback */
  fallback?: (retry: () => void) => ReactNode;
  /** Runs before the subtree is rendered again */
  onReset?: () => void;
}

interface State {
  error: Error | null;
  errorInfo: ErrorInfo | null;
}

class ErrorBoundary extends Component<Props, State> {
  state: State = {
    error: null,
    errorInfo: null,
  };

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    this.setState({ errorInfo });
    console.error('ErrorBoundary caught error:', error, errorInfo);
  }

  handleRetry = (): void => {
    this.props.onReset?.();
    this.setState({ error: null, errorInfo: null });
  };

  render(): ReactNode {
    const { error, errorInfo } = this.state;

    if (error === null) {
      return this.props.children;
    }

    if (this.props.fallback) {
      return this.props.fallback(this.handleRetry);
    }

    return (
      <main className="flex min-h-screen flex-col items-center justify-center px-4">
        <div className="max-w-lg text-center">
          <h1 className="text-3xl font-bold tracking-tight text-gray-900">
            Something went wrong
          </h1>
          <p className="mt-4 text-base text-gray-600">
            An unexpected error occurred while rendering this page.
          </p>

          {import.meta.env.DEV && (
            <details className="mt-6 rounded-lg bg-gray-50 p-4 text-left">
              <summary className="cursor-pointer text-sm font-medium text-gray-700">
                Error details (development only)
              </summary>
              <p className="mt-4 break-all font-mono text-sm text-red-600">
                {error.toString()}
              </p>
              {errorInfo && (
                <pre className="mt-2 max-h-48 overflow-auto text-xs text-gray-600">
                  {errorInfo.componentStack}
                </pre>
              )}
            </details>
          )}

          <div className="mt-10 flex items-center justify-center gap-x-6">
            <button type="button" onClick={this.handleRetry} className="btn-primary">
              Try again
            </button>
            {/* Plain anchor: the boundary sits outside the router */}
            <a href="/" className="text-sm font-semibold text-gray-900">
              Back to the demo <span aria-hidden="true">&rarr;</span>
            </a>
          </div>
        </div>
      </main>
    );
  }
}

export default ErrorBoundary;
