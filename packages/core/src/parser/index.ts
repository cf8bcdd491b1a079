export { parseArguments } from "./arguments.js";
export { decodeLiteral, formatLiteral } from "./literal.js";
export type { DecodedLiteral } from "./literal.js";
