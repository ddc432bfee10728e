export { buildModule } from "./module.js";
export { buildFunction } from "./function.js";
export { Process } from "./process.js";
export { State } from "./state.js";
