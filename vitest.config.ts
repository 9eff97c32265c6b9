import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function pkg(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@accrual/types": pkg("types"),
      "@accrual/ledger": pkg("ledger"),
      "@accrual/event-store": pkg("event-store"),
      "@accrual/rewards": pkg("rewards"),
      "@accrual/subscriptions": pkg("subscriptions"),
    },
  },
  test: {
    globals: true,
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts"],
    },
  },
});
