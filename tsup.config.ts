import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — no Node.js or browser specific APIs in the public
  // interface; WeakRef and BigInt are available in both.
  platform: "neutral",
});
