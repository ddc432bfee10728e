/**
 * Concrete compilation sequences for different targets
 */

import type { Program } from "#ast";
import type { Severity } from "#result";
import { pass as linkagePass } from "#linkage";
import { pass as irGenerationPass } from "#irgen";
import { pass as validationPass } from "#ir";
import { pass as llvmEmissionPass } from "#llvm";

import { Sequence } from "../sequence.js";

export interface SequenceInput {
  ast: Program;
  /** Directories searched for extern descriptors */
  searchPaths: readonly string[];
  /** Target triple; the host default when omitted */
  target?: string;
}

// IR sequence (extern loading through IR generation and validation)
export const irSequence = Sequence.start<SequenceInput>()
  .then(linkagePass)
  .then(irGenerationPass)
  .then(validationPass);

// LLVM sequence (IR sequence plus textual LLVM emission)
export const llvmSequence = irSequence.then(llvmEmissionPass);

// Consolidated target sequences
export const targetSequences = {
  ir: irSequence,
  llvm: llvmSequence,
} as const;

export type Target = keyof typeof targetSequences;
export type TargetSequence<T extends Target> = (typeof targetSequences)[T];

/**
 * Everything a target's sequence produces
 */
export type TargetOutput<T extends Target> = Extract<
  Awaited<ReturnType<TargetSequence<T>["run"]>>,
  { success: true }
>["value"];

export type TargetError<T extends Target> = NonNullable<
  Awaited<ReturnType<TargetSequence<T>["run"]>>["messages"][Severity.Error]
>[number];
