import { fileURLToPath } from "url";
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tsconfigPaths from "vite-tsconfig-paths";
import tailwindcss from "tailwindcss";
import autoprefixer from "autoprefixer";
import tailwindConfig from "./ui/tailwind.config";

const API_TARGET = process.env.TOOLBENCH_API_URL || "http://127.0.0.1:8765";

export default defineConfig({
  root: "ui",
  plugins: [react(), tsconfigPaths({ root: fileURLToPath(new URL(".", import.meta.url)) })],
  css: {
    postcss: {
      plugins: [tailwindcss(tailwindConfig), autoprefixer()],
    },
  },
  build: {
    outDir: "dist",
    emptyOutDir: true,
  },
  server: {
    proxy: {
      "/api": API_TARGET,
      "/ws": { target: API_TARGET, ws: true },
    },
  },
});
