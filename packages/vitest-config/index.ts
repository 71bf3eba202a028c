import type { ViteUserConfig } from "vitest/config";

export const sharedConfig = {
  test: {
    include: ["src/**/*.test.ts"],
    restoreMocks: true,
    testTimeout: 10_000,
  },
} satisfies ViteUserConfig;
