import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspaceRoot = path.resolve(
  fileURLToPath(new URL(".", import.meta.url)),
  ".."
);

const packageDirectoryMap = {
  config: path.join("core", "config"),
  engine: path.join("runtime", "engine"),
  io: path.join("runtime", "io"),
  types: path.join("core", "types"),
} as const satisfies Record<string, string>;

const packageAliases = Object.entries(packageDirectoryMap).map(([name, relativeDir]) => ({
  find: new RegExp(`^@switchboard/${name}$`),
  replacement: path.resolve(workspaceRoot, "platform", relativeDir, "src", "index.ts"),
}));

const coverageIncludeGlobs = ["src/**/*.ts"];

export const createPackageVitestConfig = (packageName: string) =>
  defineConfig({
    resolve: {
      alias: packageAliases,
    },
    esbuild: {
      tsconfigRaw: {
        compilerOptions: {
          experimentalDecorators: true,
          useDefineForClassFields: false,
        },
      },
    },
    test: {
      name: packageName,
      globals: true,
      include: ["test/**/*.test.ts"],
      environment: "node",
      pool: "threads",
      passWithNoTests: true,
      coverage: {
        reporter: ["text", "json-summary"],
        include: coverageIncludeGlobs,
        reportsDirectory: path.resolve(
          workspaceRoot,
          "coverage",
          packageName
        ),
        reportOnFailure: true,
      },
    },
  });
