/**
 * UI Components Index
 *
 * WHAT: Central export point for UI components.
 *
 * WHY: Single import path for reusable UI components.
 */

export { default as ActivityIndicator } from './ActivityIndicator';
export { default as LoadingOverlay, withLoadingOverlay } from './LoadingOverlay';
