// Browser bundle served by @fastify/static from frontend/public.
import { defineConfig } from "tsup";

export default defineConfig({
  entry: { app: "frontend/src/main.ts" },
  outDir: "frontend/public/assets",
  format: ["iife"],
  platform: "browser",
  target: "es2020",
  dts: false,
  splitting: false,
  sourcemap: true,
  minify: true,
  clean: true,
  outExtension: () => ({ js: ".js" }),
});
