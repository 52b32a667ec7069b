import type { Element } from "../../syntax-objects/compound.js";
import type { Form } from "../../syntax-objects/form.js";
import type { SourceLocation } from "../../syntax-objects/syntax.js";
import type { Lexer } from "../lexer.js";
import type { CloseKind, Token, TokenKind } from "../token.js";

/** The slice of the reader a macro may call back into */
export interface ReaderContext {
  readonly lexer: Lexer;
  /** Reads one form in a general position, where `..x` means `(splay x)` */
  readForm(): Form;
  /** Reads the operand of a prefix sigil */
  readOperand(sigil: Token): Form;
  /** Reads argument-list elements up to and including `close` */
  readElements(close: CloseKind): Element[];
  expect(kind: TokenKind): Token;
  /** A location running from `start` to the current position */
  spanFrom(start: SourceLocation): SourceLocation;
}

export interface ReaderMacro {
  match: (token: Token) => boolean;
  macro: (token: Token, reader: ReaderContext) => Form;
}
