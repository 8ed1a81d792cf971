/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_KYB_API_BASE?: string;
  readonly VITE_KYB_STEP_DELAY_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
