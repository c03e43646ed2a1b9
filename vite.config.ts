import { defineConfig } from "vite";
import dts from "vite-plugin-dts";

export default defineConfig({
  build: {
    lib: {
      entry: "src/index.ts",
      name: "region-history",
      formats: ["es", "cjs"],
    },
  },
  plugins: [dts({ include: ["src"] })],
});
