import type { Result } from "#result";

import {
  type SequenceInput,
  type Target,
  type TargetError,
  type TargetOutput,
  targetSequences,
} from "./sequences/index.js";

export interface CompileOptions<T extends Target = Target>
  extends SequenceInput {
  to: T;
}

export type CompileResult<T extends Target> = Result<
  TargetOutput<T>,
  TargetError<T>
>;

/**
 * Compile an AST through the sequence for the requested target
 */
export function compile(
  options: CompileOptions<"ir">,
): Promise<CompileResult<"ir">>;
export function compile(
  options: CompileOptions<"llvm">,
): Promise<CompileResult<"llvm">>;
export function compile(
  options: CompileOptions,
): Promise<CompileResult<"ir"> | CompileResult<"llvm">>;
export async function compile(
  options: CompileOptions,
): Promise<CompileResult<"ir"> | CompileResult<"llvm">> {
  const { to, ...input } = options;
  switch (to) {
    case "ir":
      return targetSequences.ir.run(input);
    case "llvm":
      return targetSequences.llvm.run(input);
  }
}
