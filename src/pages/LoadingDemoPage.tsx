/**
 * Loading Demo Page
 *
 * WHAT: Sample list covered by the loading overlay on demand.
 *
 * HOW: The button raises the overlay through the loading store and a
 * single delayed hide clears it.
 */

import { useEffect } from 'react';
import { config } from '../config';
import { LoadingOverlay } from '../components/ui';
import { useLoadingStore, selectIsShowing, selectMessage } from '../store';

const SAMPLE_ROWS = ['Row 1', 'Row 2', 'Row 3', 'Row 4', 'Row 5'];

function LoadingDemoPage() {
  const isShowing = useLoadingStore(selectIsShowing);
  const message = useLoadingStore(selectMessage);
  const showFor = useLoadingStore((state) => state.showFor);
  const hide = useLoadingStore((state) => state.hide);

  // Leaving the page must not leave a pending hide behind
  useEffect(() => hide, [hide]);

  return (
    <main className="mx-auto flex min-h-screen max-w-md flex-col px-4 py-10">
      <LoadingOverlay isShowing={isShowing} message={message} className="flex-1">
        <div className="rounded-lg bg-white shadow">
          <div className="flex items-center justify-between border-b border-gray-200 px-4 py-4">
            <h1 className="text-2xl font-bold tracking-tight text-gray-900">A List</h1>
            <button
              type="button"
              className="btn-primary"
              onClick={() => showFor(config.loadingDurationMs)}
            >
              Show loading
            </button>
          </div>
          <ul className="divide-y divide-gray-200">
            {SAMPLE_ROWS.map((row) => (
              <li key={row} className="px-4 py-3 text-sm text-gray-700">
                {row}
              </li>
            ))}
          </ul>
        </div>
      </LoadingOverlay>
    </main>
  );
}

export default LoadingDemoPage;
