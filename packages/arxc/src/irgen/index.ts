export { generateModule, type GenerateOptions } from "./generator.js";
export { Error, ErrorCode, ErrorMessages } from "./errors.js";
export { fromAstType, describe } from "./type.js";
export { default as pass } from "./pass.js";
