import type { SigilKind, TokenKind } from "./token.js";

export const isWhitespace = (char?: string) =>
  char === " " || char === "\t" || char === "\n" || char === "\r";

export const isDigit = (char?: string) =>
  char !== undefined && char >= "0" && char <= "9";

export const isDigitSign = (char?: string) => char === "+" || char === "-";

const isLetter = (char: string) =>
  (char >= "a" && char <= "z") || (char >= "A" && char <= "Z");

const isSymbolPunctuation = newTest([
  "!",
  "$",
  "%",
  "&",
  "*",
  "+",
  "-",
  "/",
  ":",
  "<",
  "=",
  ">",
  "?",
  "^",
  "_",
  "#",
]);

/** Characters that may begin a symbol or number */
export const isSymbolStart = (char?: string): char is string =>
  char !== undefined &&
  (isLetter(char) || isDigit(char) || isSymbolPunctuation(char));

/** `.` may appear inside a symbol, never at its start */
export const isSymbolChar = (char?: string): char is string =>
  isSymbolStart(char) || char === ".";

/** True when a symbol-character run should be read as a number */
export const startsNumber = (first?: string, second?: string) =>
  isDigit(first) || (isDigitSign(first) && isDigit(second));

const DECIMAL_REGEX =
  /^[+-]?\d(?:_?\d)*(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?$/;
const RADIX_REGEX =
  /^[+-]?0(?:x[0-9a-fA-F](?:_?[0-9a-fA-F])*|o[0-7](?:_?[0-7])*|b[01](?:_?[01])*)$/;

export const isNumberText = (text: string) =>
  DECIMAL_REGEX.test(text) || RADIX_REGEX.test(text);

export const sigilChars = new Map<string, SigilKind>([
  ["'", "quote-sigil"],
  ["`", "backquote-sigil"],
  ["~", "unquote-sigil"],
  ["@", "atsign-sigil"],
]);

export const delimiterChars = new Map<string, TokenKind>([
  ["(", "open-paren"],
  [")", "close-paren"],
  ["[", "open-bracket"],
  ["]", "close-bracket"],
]);

/**
 * The abbreviation table. The reader expands with it and the printer
 * contracts with it, so the two directions cannot drift apart.
 */
export type AbbreviationRule =
  | { shape: "prefix"; sigil: string; token: SigilKind }
  | { shape: "access"; minArgs: number }
  | { shape: "template"; minArgs: number };

export const abbreviations = new Map<string, AbbreviationRule>([
  ["quote", { shape: "prefix", sigil: "'", token: "quote-sigil" }],
  ["backquote", { shape: "prefix", sigil: "`", token: "backquote-sigil" }],
  ["unquote", { shape: "prefix", sigil: "~", token: "unquote-sigil" }],
  ["splay", { shape: "prefix", sigil: "..", token: "splay-sigil" }],
  ["atsign", { shape: "prefix", sigil: "@", token: "atsign-sigil" }],
  ["met-name", { shape: "prefix", sigil: ".", token: "dot-sigil" }],
  ["access", { shape: "access", minArgs: 2 }],
  ["template-str", { shape: "template", minArgs: 3 }],
]);

export const ACCESS = "access";
export const TEMPLATE_STR = "template-str";

/** Key is the sigil token kind, value is the operator it expands to */
export const sigilOperators = new Map<TokenKind, string>(
  Array.from(abbreviations).flatMap(([operator, rule]) =>
    rule.shape === "prefix" ? [[rule.token, operator] as const] : []
  )
);

export const getAbbreviationRule = (operator?: string) =>
  operator === undefined ? undefined : abbreviations.get(operator);

function newTest<T>(list: Set<T> | Array<T>) {
  const set = new Set(list);
  return (val: T) => set.has(val);
}
