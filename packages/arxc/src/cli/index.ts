/**
 * CLI module exports
 */

export { CliBase, type CliConfig, type OptionConfig } from "./cli-base.js";
export { CompileCli, type CompileCliEnvironment } from "./compile.js";
export {
  compileOptions,
  emitTargets,
  isEmit,
  parseEmit,
  resolveSearchPaths,
  type Emit,
} from "./options.js";
export {
  displayErrors,
  displayWarnings,
  writeOutput,
  exitWithError,
} from "./output.js";
export { formatError, formatWarning } from "./error-formatter.js";
