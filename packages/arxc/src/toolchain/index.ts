export {
  type BuildArtifacts,
  type BuildOptions,
  buildExecutable,
} from "./build.js";
export { type Tools, compilers, locateTools, which } from "./locate.js";
export { type RunResult, type Runner, spawnRunner } from "./runner.js";
export {
  type Error,
  EnvironmentError,
  ErrorCode,
  ErrorMessages,
  ProcessError,
} from "./errors.js";
