/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_REGIONS_URL?: string;
    readonly VITE_DEFAULT_DHW?: string;
    readonly VITE_TILE_URL?: string;
    readonly VITE_DEBUG?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
