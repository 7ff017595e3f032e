/**
 * Loading Overlay Store
 *
 * WHAT: Zustand store for the "loading / not loading" flag.
 *
 * WHY: Any component or service can raise the overlay without
 * prop drilling.
 *
 * HOW: A boolean plus a message, with a single pending timer for
 * delayed hides. Every transition cancels the previous timer.
 */

import { create } from 'zustand';
import { config, MAX_TIMER_DELAY_MS } from '../config';

interface LoadingState {
  isShowing: boolean;
  message: string;
  show: (message?: string) => void;
  hide: () => void;
  showFor: (durationMs: number, message?: string) => void;
}

let hideTimer: ReturnType<typeof setTimeout> | null = null;

function cancelPendingHide(): void {
  if (hideTimer !== null) {
    clearTimeout(hideTimer);
    hideTimer = null;
  }
}

export const useLoadingStore = create<LoadingState>((set, get) => ({
  isShowing: false,
  message: config.loadingMessage,

  show: (message) => {
    cancelPendingHide();
    set({ isShowing: true, message: message ?? config.loadingMessage });
  },

  hide: () => {
    cancelPendingHide();
    set({ isShowing: false });
  },

  /**
   * Show the overlay, then hide it once after durationMs.
   */
  showFor: (durationMs, message) => {
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      throw new RangeError(`Loading duration must be a positive number, got ${durationMs}`);
    }
    if (durationMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(
        `Loading duration cannot exceed ${MAX_TIMER_DELAY_MS} ms, got ${durationMs}`
      );
    }

    get().show(message);
    hideTimer = setTimeout(() => {
      hideTimer = null;
      set({ isShowing: false });
    }, durationMs);
  },
}));

export const selectIsShowing = (state: LoadingState) => state.isShowing;
export const selectMessage = (state: LoadingState) => state.message;

export default useLoadingStore;
