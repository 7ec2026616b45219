/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string;
  readonly VITE_REQUEST_TIMEOUT_MS?: string;
  readonly VITE_NOTIFICATION_CAPACITY?: string;
  readonly VITE_ANALYTICS_WINDOW_DAYS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
