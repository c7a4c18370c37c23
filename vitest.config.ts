import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    include: ["src/**/*.test.{ts,tsx}"],
    environment: "node",
    // the component test opts into jsdom with a docblock
    setupFiles: ["src/test/setup.ts"],
  },
});
