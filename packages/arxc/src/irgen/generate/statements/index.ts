export { buildStatement, buildBlock } from "./statement.js";
