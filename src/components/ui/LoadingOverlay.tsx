/**
 * Loading Overlay Component
 *
 * WHAT: Decoration that covers any content while a flag is set.
 *
 * WHY: Blocks interaction during async operations without each screen
 * building its own loading state.
 *
 * HOW: Wraps children in a disabled, blurred fieldset and cross-fades a
 * centered message box with a spinner on top. The box stays mounted so
 * hiding fades out instead of disappearing.
 */

import type { ComponentType, ReactNode } from 'react';
import { config } from '../../config';
import ActivityIndicator from './ActivityIndicator';

interface LoadingOverlayProps {
  isShowing: boolean;
  message?: string;
  /** Blur applied to the covered content, in pixels */
  blurRadius?: number;
  children: ReactNode;
  className?: string;
}

function LoadingOverlay({
  isShowing,
  message = config.loadingMessage,
  blurRadius = config.overlayBlurPx,
  children,
  className = '',
}: LoadingOverlayProps) {
  return (
    <div className={`relative ${className}`}>
      <fieldset
        disabled={isShowing}
        aria-busy={isShowing}
        data-testid="loading-overlay-content"
        className={`m-0 min-w-0 border-0 p-0 transition-[filter] duration-300 ease-in-out ${
          isShowing ? 'pointer-events-none select-none' : ''
        }`}
        style={{ filter: isShowing ? `blur(${blurRadius}px)` : 'none' }}
      >
        {children}
      </fieldset>

      <div
        aria-hidden={!isShowing}
        aria-live="polite"
        data-testid="loading-overlay"
        className={`absolute inset-0 flex items-center justify-center transition-opacity duration-300 ease-in-out ${
          isShowing ? 'opacity-100' : 'pointer-events-none opacity-0'
        }`}
      >
        <div className="flex h-1/5 w-1/2 flex-col items-center justify-center gap-3 rounded-[20px] bg-gray-900/75 text-white shadow-lg">
          <p className="text-sm font-medium">{message}</p>
          <ActivityIndicator isAnimating style="large" color="white" />
        </div>
      </div>
    </div>
  );
}

interface LoadingProps {
  isLoading: boolean;
  loadingMessage?: string;
}

/**
 * Compose a loading overlay onto an existing component.
 *
 * isLoading and loadingMessage stay with the overlay; the wrapped
 * component receives only its own props.
 *
 * @example
 * ```tsx
 * const LoadingTable = withLoadingOverlay(ResultsTable);
 * <LoadingTable rows={rows} isLoading={isFetching} />
 * ```
 */
export function withLoadingOverlay<P extends object>(Wrapped: ComponentType<P>) {
  function WithLoadingOverlay({ isLoading, loadingMessage, ...rest }: P & LoadingProps) {
    return (
      <LoadingOverlay isShowing={isLoading} message={loadingMessage}>
        {/* Omit<P & LoadingProps, keyof LoadingProps> is P once the loading keys are gone */}
        <Wrapped {...(rest as P)} />
      </LoadingOverlay>
    );
  }

  WithLoadingOverlay.displayName = `withLoadingOverlay(${Wrapped.displayName ?? Wrapped.name})`;
  return WithLoadingOverlay;
}

export default LoadingOverlay;
