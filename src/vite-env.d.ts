/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOADING_DURATION_MS?: string;
  readonly VITE_LOADING_MESSAGE?: string;
  readonly VITE_OVERLAY_BLUR_PX?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
