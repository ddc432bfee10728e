import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string): string =>
  fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "#ast": src("ast/index.ts"),
      "#ir": src("ir/index.ts"),
      "#irgen/errors": src("irgen/errors.ts"),
      "#irgen/type": src("irgen/type.ts"),
      "#irgen": src("irgen/index.ts"),
      "#linkage": src("linkage/index.ts"),
      "#runtime": src("runtime/index.ts"),
      "#llvm": src("llvm/index.ts"),
      "#toolchain": src("toolchain/index.ts"),
      "#compiler": src("compiler/index.ts"),
      "#cli": src("cli/index.ts"),
      "#result": src("result.ts"),
      "#errors": src("errors.ts"),
    },
  },
});
