import type { Element } from "../syntax-objects/compound.js";
import type { Form } from "../syntax-objects/form.js";
import type { SourceLocation } from "../syntax-objects/syntax.js";
import { ParserSyntaxError } from "./errors.js";
import type { Lexer } from "./lexer.js";
import { getReaderMacroForToken } from "./reader-macros/index.js";
import type { ReaderContext } from "./reader-macros/types.js";
import {
  type CloseKind,
  type Token,
  type TokenKind,
  describeTokenKind,
} from "./token.js";

export const DEFAULT_MAX_DEPTH = 1024;

export type ReaderOptions = {
  /** Reported in source locations. Defaults to "raw" */
  filePath?: string;
  /** Deepest form nesting accepted before failing */
  maxDepth?: number;
};

/** Recursive descent over the lexer's tokens, one form at a time */
export class Reader implements ReaderContext {
  readonly lexer: Lexer;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(lexer: Lexer, opts: Pick<ReaderOptions, "maxDepth"> = {}) {
    this.lexer = lexer;
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  readAll(): Form[] {
    const forms: Form[] = [];
    while (!this.lexer.peek().isEnd) {
      forms.push(this.readForm());
    }
    return forms;
  }

  readForm(): Form {
    const token = this.lexer.next();
    this.depth += 1;
    try {
      if (this.depth > this.maxDepth) {
        throw new ParserSyntaxError(
          "RecursionDepthExceeded",
          `Forms are nested more than ${this.maxDepth} levels deep`,
          token.location
        );
      }

      const macro = getReaderMacroForToken(token);
      if (!macro) throw unexpectedToken(token);
      return macro(token, this);
    } finally {
      this.depth -= 1;
    }
  }

  /**
   * Reads one element of an argument list. Here a leading `..` sets the
   * element's splay flag instead of wrapping it in `(splay ...)`.
   */
  readElement(): Element {
    const token = this.lexer.peek();
    if (!token.is("splay-sigil")) {
      return { form: this.readForm(), splayed: false };
    }

    this.lexer.next();
    return { form: this.readOperand(token), splayed: true };
  }

  readElements(close: CloseKind): Element[] {
    const elements: Element[] = [];
    while (true) {
      const token = this.lexer.peek();
      if (token.is(close)) {
        this.lexer.next();
        return elements;
      }

      if (token.isEnd || token.isClose) {
        throw new ParserSyntaxError(
          "UnbalancedDelimiter",
          `Expected ${describeTokenKind(close)}, found ${token.describe()}`,
          token.location
        );
      }

      elements.push(this.readElement());
    }
  }

  readOperand(sigil: Token): Form {
    const next = this.lexer.peek();
    if (next.isEnd || next.isClose) {
      throw new ParserSyntaxError(
        "DanglingSigil",
        `${sigil.describe()} must be followed by a form, found ${next.describe()}`,
        next.location
      );
    }
    return this.readForm();
  }

  expect(kind: TokenKind): Token {
    const token = this.lexer.next();
    if (!token.is(kind)) {
      throw new ParserSyntaxError(
        "UnbalancedDelimiter",
        `Expected ${describeTokenKind(kind)}, found ${token.describe()}`,
        token.location
      );
    }
    return token;
  }

  spanFrom(start: SourceLocation): SourceLocation {
    const location = start.clone();
    location.setEndToStartOf(this.lexer.currentSourceLocation());
    return location;
  }
}

const unexpectedToken = (token: Token) =>
  new ParserSyntaxError(
    "UnbalancedDelimiter",
    token.isEnd
      ? "Unexpected end of input"
      : `Unexpected ${token.describe()}`,
    token.location
  );
