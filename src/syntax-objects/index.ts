export * from "./syntax.js";
export * from "./atom.js";
export * from "./compound.js";
export * from "./form.js";
