/**
 * Example Files Test Suite
 *
 * Discovers every example under `examples/` and compiles it to LLVM IR
 * against the descriptors in `examples/c_map`.
 *
 * See annotations.ts for the example format.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { describe, it, expect } from "vitest";
import { glob } from "glob";

import { decode } from "#ast";
import { compile } from "#compiler";
import { Result } from "#result";

import { type Example, parseExample } from "./annotations.js";

const EXAMPLES_DIR = fileURLToPath(
  new URL("../../../../examples/", import.meta.url),
);

interface ExampleInfo {
  relativePath: string;
  example: Example;
}

async function loadExamples(): Promise<ExampleInfo[]> {
  const files = await glob("**/*.yaml", { cwd: EXAMPLES_DIR });
  const examples: ExampleInfo[] = [];

  for (const relativePath of files.sort()) {
    const text = await readFile(join(EXAMPLES_DIR, relativePath), "utf8");
    examples.push({ relativePath, example: parseExample(text, relativePath) });
  }

  return examples;
}

function describeErrors(result: Result<unknown>): string {
  return Result.errors(result)
    .map((error) => `${error.code}: ${error.message}`)
    .join("\n");
}

describe("Example Files", async () => {
  const examples = await loadExamples();

  it("finds the examples", () => {
    expect(examples.length).toBeGreaterThan(0);
  });

  for (const { relativePath, example } of examples) {
    it(relativePath, async () => {
      const decoded = decode(example.ast);
      if (!decoded.success) {
        expect.fail(`Malformed syntax tree:\n${describeErrors(decoded)}`);
      }

      const result = await compile({
        to: "llvm",
        ast: decoded.value,
        searchPaths: [join(EXAMPLES_DIR, "c_map")],
      });
      const { error, message, warnings, llvm } = example.expect;

      if (error) {
        const errors = Result.errors(result);
        expect(errors.map(({ code }) => code)).toEqual([error]);
        if (message) {
          expect(errors[0].message).toBe(message);
        }
        return;
      }

      if (!result.success) {
        expect.fail(
          `Expected compilation to succeed but got errors:\n${describeErrors(result)}`,
        );
      }

      expect(Result.warnings(result).map(({ code }) => code)).toEqual(warnings);

      const lines = result.value.llvm.split("\n");
      for (const line of llvm) {
        expect(lines).toContain(line);
      }
    });
  }
});
