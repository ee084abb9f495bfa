import { defineConfig } from "vitest/config";

const workspaceProjects = [
  ["./platform/core/types/vitest.config.ts", "./platform/core/types"],
  ["./platform/core/config/vitest.config.ts", "./platform/core/config"],
  ["./platform/runtime/io/vitest.config.ts", "./platform/runtime/io"],
  ["./platform/runtime/engine/vitest.config.ts", "./platform/runtime/engine"],
] as const;

export default defineConfig({
  test: {
    projects: [
      {
        root: ".",
        test: {
          name: "workspace",
          environment: "node",
          include: ["tests/**/*.test.ts"],
        },
      },
      ...workspaceProjects.map(([configPath, root]) => ({
        root,
        extends: configPath,
      })),
    ],
  },
});
