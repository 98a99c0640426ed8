/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_REPORT_DATA_URL?: string;
  readonly VITE_USER_NAMES_URL?: string;
  readonly VITE_EXCLUDED_USERS?: string;
  readonly VITE_ADVISORY_DISMISS_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}

interface Window {
  // Inlined by the export step through report-data.js.
  reportData?: unknown;
}
