/**
 * Store Index
 *
 * WHAT: Central export point for all Zustand stores.
 *
 * WHY: Single import path for store access across components.
 */

export { useLoadingStore, selectIsShowing, selectMessage } from './loadingStore';
