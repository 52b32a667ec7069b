import type { SourceLocation } from "../syntax-objects/syntax.js";

export type SigilKind =
  | "quote-sigil"
  | "backquote-sigil"
  | "unquote-sigil"
  | "splay-sigil"
  | "atsign-sigil"
  | "dot-sigil";

export type CloseKind = "close-paren" | "close-bracket" | "template-brace-close";

export type TokenKind =
  | SigilKind
  | CloseKind
  | "open-paren"
  | "open-bracket"
  | "symbol"
  | "number"
  | "string-chunk"
  | "raw-string"
  | "template-brace-open"
  | "end-of-input";

export type TokenOpts = {
  kind: TokenKind;
  location: SourceLocation;
  value?: string;
  opensLiteral?: boolean;
  closesLiteral?: boolean;
};

export class Token {
  readonly kind: TokenKind;
  /** Covers the token's raw text span */
  readonly location: SourceLocation;
  /**
   * Symbol name, number text, or the decoded characters of a string chunk.
   * Empty for punctuation.
   */
  readonly value: string;
  /** string-chunk: the chunk begins right after an opening `"` */
  readonly opensLiteral: boolean;
  /** string-chunk: the chunk ends at the closing `"` */
  readonly closesLiteral: boolean;

  constructor(opts: TokenOpts) {
    this.kind = opts.kind;
    this.location = opts.location;
    this.value = opts.value ?? "";
    this.opensLiteral = opts.opensLiteral ?? false;
    this.closesLiteral = opts.closesLiteral ?? false;
  }

  get isEnd() {
    return this.kind === "end-of-input";
  }

  get isClose() {
    return (
      this.kind === "close-paren" ||
      this.kind === "close-bracket" ||
      this.kind === "template-brace-close"
    );
  }

  is(kind: TokenKind) {
    return this.kind === kind;
  }

  /** Source-like spelling, for error messages */
  describe(): string {
    return describeTokenKind(this.kind, this.value);
  }
}

const PUNCTUATION: Partial<Record<TokenKind, string>> = {
  "open-paren": "(",
  "close-paren": ")",
  "open-bracket": "[",
  "close-bracket": "]",
  "quote-sigil": "'",
  "backquote-sigil": "`",
  "unquote-sigil": "~",
  "splay-sigil": "..",
  "atsign-sigil": "@",
  "dot-sigil": ".",
  "template-brace-open": "{",
  "template-brace-close": "}",
};

export const describeTokenKind = (kind: TokenKind, value = ""): string => {
  const punctuation = PUNCTUATION[kind];
  if (punctuation) return `\`${punctuation}\``;
  if (kind === "end-of-input") return "end of input";
  if (kind === "string-chunk" || kind === "raw-string") return "a string";
  return `\`${value}\``;
};
