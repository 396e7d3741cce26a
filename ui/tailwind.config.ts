import type { Config } from "tailwindcss";
import { fileURLToPath } from "url";

const uiDir = fileURLToPath(new URL(".", import.meta.url));

const config: Config = {
  content: [`${uiDir}index.html`, `${uiDir}**/*.{ts,tsx}`],
  darkMode: "class",
  theme: {
    extend: {
      colors: {
        primary: {
          300: "#7cc7fb",
          400: "#36a9f7",
          500: "#0c8ce9",
          600: "#0070c7",
          700: "#0159a1",
        },
        success: {
          light: "#4ade80",
          DEFAULT: "#22c55e",
        },
        warning: {
          light: "#fbbf24",
          DEFAULT: "#f59e0b",
        },
        error: {
          light: "#f87171",
          DEFAULT: "#ef4444",
        },
        background: {
          primary: "#0f172a",
          secondary: "#1e293b",
        },
        surface: {
          primary: "#1e293b",
          secondary: "#334155",
        },
      },
      fontFamily: {
        sans: ["Inter", "system-ui", "sans-serif"],
        mono: ["JetBrains Mono", "Menlo", "Monaco", "Courier New", "monospace"],
      },
      animation: {
        "fade-in": "fadeIn 0.2s ease-in-out",
      },
      keyframes: {
        fadeIn: {
          "0%": { opacity: "0" },
          "100%": { opacity: "1" },
        },
      },
    },
  },
  plugins: [],
};

export default config;
