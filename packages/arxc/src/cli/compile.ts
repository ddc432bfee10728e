import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";

import { decode } from "#ast";
import type { ArxcError } from "#errors";
import { compile } from "#compiler";
import * as Ir from "#ir";
import { Result } from "#result";
import { buildExecutable } from "#toolchain";

import { CliBase } from "./cli-base.js";
import { compileOptions, parseEmit, resolveSearchPaths } from "./options.js";
import { displayErrors, displayWarnings, writeOutput } from "./output.js";

export interface CompileCliEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * `arxc [options] <program.json>`
 */
export class CompileCli extends CliBase {
  constructor(
    args: string[] = process.argv.slice(2),
    private readonly environment: CompileCliEnvironment = {
      cwd: process.cwd(),
      env: process.env,
    },
  ) {
    super(
      {
        name: "arxc",
        description: "Compile an Arx syntax tree to LLVM IR or an executable",
        options: compileOptions,
        allowPositionals: true,
        usage: "<program.json>",
        examples: [
          "arxc program.json",
          "arxc --emit ir -o program.ir program.json",
          "arxc --emit exe -L ./c_map --c-lib ./c_lib program.json",
        ],
      },
      args,
    );
  }

  protected shouldShowHelp(): boolean {
    return this.positionals.length === 0;
  }

  protected validateArgs(): void {
    if (this.positionals.length > 1) {
      throw new Error("Expected exactly one input file");
    }
    parseEmit(this.string("emit"));
  }

  protected async execute(): Promise<void> {
    const { cwd, env } = this.environment;
    const file = resolve(cwd, this.positionals[0]);
    const emit = parseEmit(this.string("emit"));

    const decoded = decode(await readJson(file));
    if (!decoded.success) {
      return this.fail(Result.errors(decoded));
    }

    const input = {
      ast: decoded.value,
      searchPaths: resolveSearchPaths({
        libPaths: this.strings("lib-path"),
        cwd,
        env,
      }),
      target: this.string("target"),
    };
    const output = this.string("output");

    if (emit === "ir") {
      const result = await compile({ to: "ir", ...input });
      displayWarnings(Result.warnings(result));
      if (!result.success) {
        return this.fail(Result.errors(result));
      }
      const text = new Ir.Analysis.Formatter().format(result.value.ir);
      return writeOutput(text, output && resolve(cwd, output));
    }

    const result = await compile({ to: "llvm", ...input });
    displayWarnings(Result.warnings(result));
    if (!result.success) {
      return this.fail(Result.errors(result));
    }

    if (emit === "llvm") {
      return writeOutput(result.value.llvm, output && resolve(cwd, output));
    }

    const name = basename(file, extname(file));
    const built = await buildExecutable({
      llvm: result.value.llvm,
      name,
      modules: result.value.externs.modules,
      libraryPath: resolve(cwd, this.string("c-lib") ?? "c_lib"),
      buildDir: resolve(cwd, this.string("build-dir") ?? "build"),
      outDir: resolve(cwd, this.string("out-dir") ?? "out"),
    });
    if (!built.success) {
      return this.fail(Result.errors(built));
    }
  }

  private fail(errors: readonly ArxcError[]): void {
    displayErrors(errors);
    process.exitCode = 1;
  }
}

async function readJson(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    throw new Error(`Cannot read ${file}: ${reason(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`Cannot parse ${file}: ${reason(error)}`);
  }
}

const reason = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
