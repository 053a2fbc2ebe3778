/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_CATALOG_URL?: string;
    readonly VITE_CLOTHING_IMAGE_BASE?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
