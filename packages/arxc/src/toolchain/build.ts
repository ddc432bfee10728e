import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { Result } from "#result";

import {
  type Error as ToolchainError,
  EnvironmentError,
  ProcessError,
} from "./errors.js";
import { type Tools, locateTools } from "./locate.js";
import { type Runner, spawnRunner } from "./runner.js";

export interface BuildOptions {
  /** Textual LLVM IR of the program */
  llvm: string;
  /** Base name of the artifacts */
  name: string;
  /** Extern modules whose C sources are compiled and linked */
  modules: readonly string[];
  /** Directory holding `<module>.c` sources */
  libraryPath: string;
  /** Directory for `.ll` and object files */
  buildDir: string;
  /** Directory for the executable */
  outDir: string;
  /** Progress output, one line per call */
  logger?: (line: string) => void;
  runner?: Runner;
  /** Resolved tool paths; located on `PATH` when omitted */
  tools?: Tools;
  platform?: NodeJS.Platform;
}

export interface BuildArtifacts {
  llvmFile: string;
  objects: string[];
  executable: string;
}

/**
 * Compile LLVM IR with `llc`, compile the extern modules' C sources and link
 * everything into one executable
 */
export async function buildExecutable(
  options: BuildOptions,
): Promise<Result<BuildArtifacts, ToolchainError>> {
  const log = options.logger ?? console.log;
  const run = options.runner ?? spawnRunner;
  const windows = (options.platform ?? process.platform) === "win32";
  const objectExtension = windows ? ".obj" : ".o";

  try {
    const { llc, cc } = options.tools ?? (await locateTools());

    await mkdir(options.buildDir, { recursive: true });
    await mkdir(options.outDir, { recursive: true });

    const llvmFile = join(options.buildDir, `${options.name}.ll`);
    const mainObject = join(options.buildDir, options.name + objectExtension);
    await writeFile(llvmFile, options.llvm, "utf8");
    await check(run, llc, [llvmFile, "-filetype=obj", "-o", mainObject]);

    const objects = [mainObject];
    const total = options.modules.length + 1;
    for (const [index, module] of options.modules.entries()) {
      log(`[ ${index + 1}/${total} ] [lib] (${module})`);
      const object = join(options.buildDir, module + objectExtension);
      await check(run, cc, [
        "-c",
        "-o",
        object,
        join(options.libraryPath, `${module}.c`),
      ]);
      objects.push(object);
    }

    log(`[ ${total}/${total} ] [main]`);
    const executable = join(
      options.outDir,
      windows ? `${options.name}.exe` : options.name,
    );
    await check(run, cc, [...objects, "-o", executable]);
    log(`Built at [ ${executable} ]`);

    return Result.ok({ llvmFile, objects, executable });
  } catch (error) {
    if (error instanceof EnvironmentError || error instanceof ProcessError) {
      return Result.err(error);
    }
    throw error;
  }
}

async function check(
  run: Runner,
  command: string,
  args: readonly string[],
): Promise<void> {
  const { exitCode, stderr } = await run(command, args);
  if (exitCode !== 0) {
    throw new ProcessError([command, ...args], exitCode, stderr);
  }
}
