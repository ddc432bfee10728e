export const VERSION = "0.1.0";

export * as Ast from "#ast";
export * as Ir from "#ir";
export * as Runtime from "#runtime";

// Re-export AST decoding
export { decode } from "#ast";

// Re-export extern linkage
export { Table, loadExterns, parseDescriptor } from "#linkage";

// Re-export IR generation functionality
export { generateModule, type GenerateOptions } from "#irgen";

// Re-export LLVM emission
export { Emitter } from "#llvm";

// Re-export the native toolchain driver
export { buildExecutable, type BuildOptions } from "#toolchain";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export {
  compile,
  type CompileOptions,
  type CompileResult,
  type Target,
} from "#compiler";

// CLI utilities are not exported; import them from ./cli
