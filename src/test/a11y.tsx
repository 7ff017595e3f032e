/**
 * Accessibility Testing Utilities
 *
 * WHAT: Helper functions for WCAG 2.1 Level AA compliance testing.
 *
 * WHY: The overlay hides and disables content, which is easy to get
 * wrong for screen reader and keyboard users.
 *
 * HOW: Runs axe-core against the rendered container.
 */

import type { ReactElement } from 'react';
import axe, { type AxeResults, type RunOptions } from 'axe-core';
import { renderWithProviders } from './utils';

/**
 * axe-core options for component tests
 *
 * WHY: JSDOM has no layout engine, so contrast cannot be computed.
 * Page-level rules need a full document.
 */
const axeOptions: RunOptions = {
  rules: {
    'color-contrast': { enabled: false },
    'page-has-heading-one': { enabled: false },
    region: { enabled: false },
  },
};

async function checkA11y(container: Element): Promise<AxeResults> {
  return axe.run(container, axeOptions);
}

/**
 * Format axe violations for readable test output
 */
function formatViolations(results: AxeResults): string {
  if (results.violations.length === 0) {
    return 'No accessibility violations found';
  }

  return results.violations
    .map((violation) => {
      const nodes = violation.nodes
        .map((node) => `  - ${node.html}\n    Fix: ${node.failureSummary ?? ''}`)
        .join('\n');

      return `
${violation.id}: ${violation.description}
Impact: ${violation.impact ?? 'unknown'}
Help: ${violation.helpUrl}
Elements:
${nodes}
`;
    })
    .join('\n---\n');
}

/**
 * Render a component and fail with readable output on any violation.
 *
 * @example
 * ```tsx
 * it('should be accessible', async () => {
 *   await expectNoA11yViolations(<MyComponent />);
 * });
 * ```
 */
export async function expectNoA11yViolations(ui: ReactElement): Promise<void> {
  const { container } = renderWithProviders(ui);
  const results = await checkA11y(container);

  if (results.violations.length > 0) {
    throw new Error(`Accessibility violations found:\n${formatViolations(results)}`);
  }
}
