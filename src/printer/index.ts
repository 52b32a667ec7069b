export * from "./printer.js";
export * from "./string-literal.js";
