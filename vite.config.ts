import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// PORT and BASE_PATH let the same build sit behind a proxy sub-route, e.g. BASE_PATH=/dhw-to-sst/
const port = Number(process.env.PORT ?? 8080);

export default defineConfig({
    base: process.env.BASE_PATH ?? "/",
    plugins: [react()],
    build: {
        sourcemap: false,
        target: "es2020",
    },
    server: {
        host: "0.0.0.0",
        port,
        strictPort: false,
    },
    preview: {
        host: "0.0.0.0",
        port,
        strictPort: false,
    },
});
