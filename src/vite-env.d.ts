/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SCHEDULER_MODE?: string;
  readonly VITE_DEFAULT_QUANTUM?: string;
  readonly VITE_SCHEDULER_STRICT?: string;
  readonly VITE_SCHEDULER_DEBUG?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
