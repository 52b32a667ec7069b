export * from "./syntax-objects/index.js";
export * from "./parser/index.js";
export * from "./printer/index.js";
export { encodeForms, decodeForms, FormDecodeError } from "./lib/form-codec.js";
export {
  abbreviations,
  getAbbreviationRule,
  type AbbreviationRule,
} from "./parser/grammar.js";
