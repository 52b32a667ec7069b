import { number, string, symbol } from "../../syntax-objects/form.js";
import type { ReaderMacro } from "./types.js";

export const symbolReader: ReaderMacro = {
  match: (t) => t.kind === "symbol",
  macro: (token) => symbol(token.value, token.location),
};

export const numberReader: ReaderMacro = {
  match: (t) => t.kind === "number",
  macro: (token) => number(token.value, token.location),
};

export const rawStringReader: ReaderMacro = {
  match: (t) => t.kind === "raw-string",
  macro: (token) => string(token.value, token.location),
};
