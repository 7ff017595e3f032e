/**
 * Root Application Component
 *
 * WHAT: Main application component with routing.
 *
 * WHY: Central component that sets up the error boundary and
 * React Router for navigation.
 *
 * HOW: Uses React Router v6 with a single demo route and a catch-all.
 */

import { BrowserRouter, Routes, Route } from 'react-router-dom';
import ErrorBoundary from './components/ErrorBoundary';
import LoadingDemoPage from './pages/LoadingDemoPage';
import NotFound from './pages/NotFound';
import { useLoadingStore } from './store';

/**
 * Route table, shared with tests that mount it under a memory router.
 */
export function AppRoutes() {
  return (
    <Routes>
      <Route path="/" element={<LoadingDemoPage />} />
      <Route path="*" element={<NotFound />} />
    </Routes>
  );
}

/**
 * Retrying after a crash starts from a clear overlay.
 */
function resetLoading(): void {
  useLoadingStore.getState().hide();
}

function App() {
  return (
    <ErrorBoundary onReset={resetLoading}>
      <BrowserRouter>
        <AppRoutes />
      </BrowserRouter>
    </ErrorBoundary>
  );
}

export default App;
