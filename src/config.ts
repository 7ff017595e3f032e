/**
 * Application Configuration
 *
 * WHAT: Typed, validated settings for the loading overlay.
 *
 * WHY: Timing and copy can change per environment without code edits.
 *
 * HOW: Vite exposes VITE_* variables on import.meta.env; a Zod schema
 * coerces them and fills in defaults.
 */

import { z } from 'zod';

/** Longest delay setTimeout honours; larger values fire immediately */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const envSchema = z.object({
  VITE_LOADING_DURATION_MS: z.coerce
    .number({ invalid_type_error: 'Loading duration must be a number' })
    .int('Loading duration must be a whole number of milliseconds')
    .positive('Loading duration must be greater than 0')
    .max(MAX_TIMER_DELAY_MS, `Loading duration cannot exceed ${MAX_TIMER_DELAY_MS} ms`)
    .default(2000),
  VITE_LOADING_MESSAGE: z
    .string()
    .min(1, 'Loading message cannot be empty')
    .default('Loading...'),
  VITE_OVERLAY_BLUR_PX: z.coerce
    .number({ invalid_type_error: 'Blur radius must be a number' })
    .min(0, 'Blur radius cannot be negative')
    .default(3),
});

export interface AppConfig {
  /** Delay before the demo clears the loading flag */
  loadingDurationMs: number;
  loadingMessage: string;
  /** Blur applied to covered content, in pixels */
  overlayBlurPx: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment record.
 *
 * @throws ConfigError when any variable fails validation
 */
export function parseConfig(env: Record<string, unknown>): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    loadingDurationMs: result.data.VITE_LOADING_DURATION_MS,
    loadingMessage: result.data.VITE_LOADING_MESSAGE,
    overlayBlurPx: result.data.VITE_OVERLAY_BLUR_PX,
  };
}

export const config: AppConfig = parseConfig(import.meta.env);
