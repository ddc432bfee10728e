/**
 * IR utilities exports
 */

export { Formatter } from "./formatter.js";
export { type ValidationResult, Validator } from "./validator.js";
