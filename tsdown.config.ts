import { defineConfig } from "tsdown"

export default defineConfig({
  entry: ["src/main.ts"],

  format: ["esm"],
  target: "node20",
  platform: "node",

  sourcemap: true,
  clean: true,

  env: {
    NODE_ENV: "production",
  },
})
