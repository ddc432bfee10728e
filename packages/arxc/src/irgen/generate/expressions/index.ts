export { buildExpression, buildList } from "./expression.js";
