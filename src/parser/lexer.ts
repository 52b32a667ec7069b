import type { CharStream } from "./char-stream.js";
import { ParserSyntaxError } from "./errors.js";
import {
  delimiterChars,
  isNumberText,
  isSymbolChar,
  isSymbolStart,
  isWhitespace,
  sigilChars,
  startsNumber,
} from "./grammar.js";
import { Token, type TokenKind } from "./token.js";
import type { SourceLocation } from "../syntax-objects/syntax.js";

/**
 * `code` is the base frame. A `"` pushes `template-text`; a `{` inside the
 * literal pushes `template-brace`, which lexes like code until its `}` pops
 * it again. Nested literals inside braces push their own frames.
 */
export type LexerMode =
  | { mode: "code" }
  | {
      mode: "template-text";
      /** What the next token in this literal must be */
      awaiting: "chunk" | "brace-open";
      start: SourceLocation;
    }
  | { mode: "template-brace"; start: SourceLocation };

type TemplateTextFrame = Extract<LexerMode, { mode: "template-text" }>;

const SIMPLE_ESCAPES = new Map([
  ["\\", "\\"],
  ['"', '"'],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["0", "\0"],
]);

/**
 * Produces tokens one at a time. Tokens cannot be lexed up front because
 * the meaning of `{` and `}` depends on which literal the cursor is in.
 */
export class Lexer {
  readonly chars: CharStream;
  private readonly modes: LexerMode[] = [{ mode: "code" }];
  private peeked?: Token;

  constructor(chars: CharStream) {
    this.chars = chars;
  }

  get mode(): LexerMode {
    return this.modes[this.modes.length - 1];
  }

  /** Depth of the mode stack, the base code frame included */
  get modeDepth() {
    return this.modes.length;
  }

  peek(): Token {
    if (!this.peeked) this.peeked = this.tokenize();
    return this.peeked;
  }

  next(): Token {
    const token = this.peek();
    this.peeked = undefined;
    return token;
  }

  currentSourceLocation() {
    return this.peeked?.location.clone() ?? this.chars.currentSourceLocation();
  }

  private tokenize(): Token {
    const frame = this.mode;
    if (frame.mode === "template-text") {
      return frame.awaiting === "brace-open"
        ? this.consumeBraceOpen(frame)
        : this.consumeChunk(frame, false);
    }

    return this.tokenizeCode();
  }

  private tokenizeCode(): Token {
    this.skipWhitespaceAndComments();
    const chars = this.chars;
    const location = chars.currentSourceLocation();
    const char = chars.next;

    if (char === undefined) {
      return new Token({ kind: "end-of-input", location });
    }

    const delimiter = delimiterChars.get(char);
    if (delimiter) {
      chars.consumeChar();
      return this.finish({ kind: delimiter }, location);
    }

    const sigil = sigilChars.get(char);
    if (sigil) {
      chars.consumeChar();
      return this.finish({ kind: sigil }, location);
    }

    if (char === ".") {
      chars.consumeChar();
      if (chars.next === ".") {
        chars.consumeChar();
        return this.finish({ kind: "splay-sigil" }, location);
      }
      return this.finish({ kind: "dot-sigil" }, location);
    }

    if (char === '"') {
      chars.consumeChar();
      const frame: TemplateTextFrame = {
        mode: "template-text",
        awaiting: "chunk",
        start: location,
      };
      this.modes.push(frame);
      return this.consumeChunk(frame, true, location);
    }

    if (char === "}") {
      return this.consumeBraceClose(location);
    }

    if (this.nextIsRawString()) {
      return this.consumeRawString(location);
    }

    if (isSymbolStart(char)) {
      return this.consumeSymbolOrNumber(location);
    }

    throw new ParserSyntaxError(
      "InvalidToken",
      `Unexpected character \`${char}\``,
      location
    );
  }

  private finish(
    opts: {
      kind: TokenKind;
      value?: string;
      opensLiteral?: boolean;
      closesLiteral?: boolean;
    },
    location: SourceLocation
  ) {
    location.setEndToStartOf(this.chars.currentSourceLocation());
    return new Token({ ...opts, location });
  }

  private consumeSymbolOrNumber(location: SourceLocation): Token {
    const chars = this.chars;
    const isNumber = startsNumber(chars.next, chars.at(1));
    let value = "";
    while (isSymbolChar(chars.next)) {
      value += chars.consumeChar();
    }

    if (!isNumber) {
      return this.finish({ kind: "symbol", value }, location);
    }

    if (!isNumberText(value)) {
      throw new ParserSyntaxError(
        "InvalidToken",
        `Malformed number \`${value}\``,
        location
      );
    }

    return this.finish({ kind: "number", value }, location);
  }

  /**
   * Scans literal characters up to an unescaped `{` (left in the stream for
   * the next token) or the closing `"`.
   */
  private consumeChunk(
    frame: TemplateTextFrame,
    opensLiteral: boolean,
    location = this.chars.currentSourceLocation()
  ): Token {
    const chars = this.chars;
    let value = "";

    while (chars.hasCharacters) {
      const char = chars.next;

      if (char === '"') {
        chars.consumeChar();
        this.modes.pop();
        return this.finish(
          { kind: "string-chunk", value, opensLiteral, closesLiteral: true },
          location
        );
      }

      if (char === "{" && chars.at(1) === "{") {
        chars.consumeChar();
        chars.consumeChar();
        value += "{";
        continue;
      }

      if (char === "}" && chars.at(1) === "}") {
        chars.consumeChar();
        chars.consumeChar();
        value += "}";
        continue;
      }

      if (char === "{") {
        frame.awaiting = "brace-open";
        return this.finish(
          { kind: "string-chunk", value, opensLiteral },
          location
        );
      }

      if (char === "}") {
        throw new ParserSyntaxError(
          "UnexpectedCloseBrace",
          "Unmatched `}` in string literal, write `}}` for a literal brace",
          chars.currentSourceLocation()
        );
      }

      if (char === "\\") {
        value += this.consumeEscape();
        continue;
      }

      value += chars.consumeChar();
    }

    throw new ParserSyntaxError(
      "UnterminatedLiteral",
      `Unterminated string literal starting at ${frame.start}`,
      chars.currentSourceLocation()
    );
  }

  private consumeBraceOpen(frame: TemplateTextFrame): Token {
    const location = this.chars.currentSourceLocation();
    this.chars.consumeChar();
    frame.awaiting = "chunk";
    this.modes.push({ mode: "template-brace", start: location });
    return this.finish({ kind: "template-brace-open" }, location);
  }

  private consumeBraceClose(location: SourceLocation): Token {
    if (this.mode.mode !== "template-brace") {
      throw new ParserSyntaxError(
        "UnexpectedCloseBrace",
        "`}` outside of a template string",
        location
      );
    }

    this.chars.consumeChar();
    this.modes.pop();
    return this.finish({ kind: "template-brace-close" }, location);
  }

  private consumeEscape(): string {
    const chars = this.chars;
    const location = chars.currentSourceLocation();
    chars.consumeChar();
    const code = chars.hasCharacters ? chars.consumeChar() : undefined;

    const simple = code === undefined ? undefined : SIMPLE_ESCAPES.get(code);
    if (simple !== undefined) return simple;

    if (code === "u" && chars.next === "{") {
      chars.consumeChar();
      let hex = "";
      while (chars.next !== undefined && /[0-9a-fA-F]/.test(chars.next)) {
        hex += chars.consumeChar();
      }
      const point = Number.parseInt(hex, 16);
      if (chars.at(0) === "}" && hex.length >= 1 && hex.length <= 6) {
        chars.consumeChar();
        if (point <= 0x10ffff) return String.fromCodePoint(point);
      }
    }

    throw new ParserSyntaxError(
      "InvalidToken",
      `Invalid escape sequence \`\\${code ?? ""}\``,
      location
    );
  }

  private nextIsRawString() {
    const chars = this.chars;
    if (chars.next !== "r") return false;
    let offset = 1;
    while (chars.at(offset) === "#") offset += 1;
    return chars.at(offset) === '"';
  }

  /** `r"..."` or `r#"..."#`; braces and backslashes are plain characters */
  private consumeRawString(location: SourceLocation): Token {
    const chars = this.chars;
    chars.consumeChar();
    let hashes = "";
    while (chars.next === "#") hashes += chars.consumeChar();
    chars.consumeChar();

    const terminator = `"${hashes}`;
    let value = "";
    while (chars.hasCharacters) {
      if (chars.startsWith(terminator)) {
        for (let i = 0; i < terminator.length; i += 1) chars.consumeChar();
        return this.finish({ kind: "raw-string", value }, location);
      }
      value += chars.consumeChar();
    }

    throw new ParserSyntaxError(
      "UnterminatedLiteral",
      `Unterminated raw string literal starting at ${location}`,
      chars.currentSourceLocation()
    );
  }

  private skipWhitespaceAndComments() {
    const chars = this.chars;
    while (chars.hasCharacters) {
      if (isWhitespace(chars.next)) {
        chars.consumeChar();
        continue;
      }

      if (chars.next === ";") {
        while (chars.hasCharacters && chars.at(0) !== "\n") {
          chars.consumeChar();
        }
        continue;
      }

      if (chars.startsWith("#|")) {
        this.skipBlockComment();
        continue;
      }

      return;
    }
  }

  /** Block comments nest: `#| a #| b |# c |#` is one comment */
  private skipBlockComment() {
    const chars = this.chars;
    const start = chars.currentSourceLocation();
    let depth = 0;

    while (chars.hasCharacters) {
      if (chars.startsWith("#|")) {
        chars.consumeChar();
        chars.consumeChar();
        depth += 1;
        continue;
      }

      if (chars.startsWith("|#")) {
        chars.consumeChar();
        chars.consumeChar();
        depth -= 1;
        if (depth === 0) return;
        continue;
      }

      chars.consumeChar();
    }

    throw new ParserSyntaxError(
      "UnterminatedLiteral",
      `Unterminated block comment starting at ${start}`,
      chars.currentSourceLocation()
    );
  }
}
