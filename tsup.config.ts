import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The CSV adapters open files through node:fs.
  platform: "node",
  target:   "node20",
});
