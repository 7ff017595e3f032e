/**
 * Test Utilities
 *
 * WHAT: Reusable test helpers and custom render functions.
 *
 * WHY: Pages use react-router links, so they need a router around them.
 *
 * HOW: Wraps @testing-library/react render with a memory router.
 */

import type { ReactElement, ReactNode } from 'react';
import { render, type RenderOptions, type RenderResult } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';

interface ProviderOptions extends Omit<RenderOptions, 'wrapper'> {
  /** Initial location for the memory router */
  route?: string;
}

/**
 * Custom render function with providers
 *
 * @example
 * ```tsx
 * renderWithProviders(<AppRoutes />, { route: '/missing' });
 * expect(screen.getByText('Page not found')).toBeInTheDocument();
 * ```
 */
export function renderWithProviders(
  ui: ReactElement,
  { route = '/', ...options }: ProviderOptions = {}
): RenderResult {
  function AllProviders({ children }: { children: ReactNode }): ReactElement {
    return <MemoryRouter initialEntries={[route]}>{children}</MemoryRouter>;
  }

  return render(ui, { wrapper: AllProviders, ...options });
}

export * from '@testing-library/react';
