import { describe, expect, test } from "vitest";
import { CharStream } from "../char-stream.js";
import { ParserSyntaxError } from "../errors.js";
import { Lexer } from "../lexer.js";
import type { Token } from "../token.js";

const VALUED = new Set(["symbol", "number", "string-chunk", "raw-string"]);

const show = (token: Token) =>
  VALUED.has(token.kind)
    ? `${token.kind} ${JSON.stringify(token.value)}`
    : token.kind;

const lex = (input: string) => {
  const lexer = new Lexer(new CharStream(input, "test"));
  const tokens: Token[] = [];
  while (!lexer.peek().isEnd) tokens.push(lexer.next());
  return tokens;
};

const tokenize = (input: string) => lex(input).map(show);

const lexError = (input: string) => {
  try {
    lex(input);
  } catch (error) {
    if (error instanceof ParserSyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected ${input} to fail`);
};

describe("code mode", () => {
  test("lexes prefix sigils", () => {
    expect(tokenize("`(a ~b 'c @d)")).toEqual([
      "backquote-sigil",
      "open-paren",
      'symbol "a"',
      "unquote-sigil",
      'symbol "b"',
      "quote-sigil",
      'symbol "c"',
      "atsign-sigil",
      'symbol "d"',
      "close-paren",
    ]);
  });

  test("lexes `..` before `.`", () => {
    expect(tokenize("..b .c ...d")).toEqual([
      "splay-sigil",
      'symbol "b"',
      "dot-sigil",
      'symbol "c"',
      "splay-sigil",
      "dot-sigil",
      'symbol "d"',
    ]);
  });

  test("keeps dots inside a symbol", () => {
    expect(tokenize("a.b")).toEqual(['symbol "a.b"']);
  });

  test("a leading dot is never part of a number", () => {
    expect(tokenize(".5")).toEqual(["dot-sigil", 'number "5"']);
  });

  test("lexes brackets", () => {
    expect(tokenize("[ar m]")).toEqual([
      "open-bracket",
      'symbol "ar"',
      'symbol "m"',
      "close-bracket",
    ]);
  });

  test("tells numbers from symbols", () => {
    expect(tokenize("1 -2 3.25 1e9 0x1F 1_000 - -x +")).toEqual([
      'number "1"',
      'number "-2"',
      'number "3.25"',
      'number "1e9"',
      'number "0x1F"',
      'number "1_000"',
      'symbol "-"',
      'symbol "-x"',
      'symbol "+"',
    ]);
  });

  test("rejects malformed numbers", () => {
    const error = lexError("(f 1abc)");
    expect(error.kind).toBe("InvalidToken");
    expect(error.location?.startIndex).toBe(3);
  });

  test("rejects characters that start no token", () => {
    const error = lexError("a {b}");
    expect(error.kind).toBe("InvalidToken");
    expect(error.location?.startIndex).toBe(2);
  });

  test("skips line and nested block comments", () => {
    expect(tokenize("a ; comment\nb #| x #| y |# z |# c")).toEqual([
      'symbol "a"',
      'symbol "b"',
      'symbol "c"',
    ]);
  });

  test("fails on an unterminated block comment", () => {
    expect(lexError("a #| b").kind).toBe("UnterminatedLiteral");
  });

  test("records token spans", () => {
    const [, symbol] = lex("(foo\n bar)").filter((t) => t.kind !== "close-paren");
    expect(symbol.location.toJSON()).toEqual({
      startIndex: 1,
      endIndex: 4,
      startLine: 1,
      endLine: 1,
      startColumn: 1,
      endColumn: 4,
      filePath: "test",
    });

    const bar = lex("(foo\n bar)")[2];
    expect(bar.location.startLine).toBe(2);
    expect(bar.location.startColumn).toBe(1);
  });

  test("a `}` outside a template fails", () => {
    const error = lexError("a }");
    expect(error.kind).toBe("UnexpectedCloseBrace");
    expect(error.location?.startIndex).toBe(2);
  });
});

describe("string literals", () => {
  test("a literal without braces is one chunk", () => {
    const [chunk] = lex('"hello"');
    expect(show(chunk)).toBe('string-chunk "hello"');
    expect(chunk.opensLiteral).toBe(true);
    expect(chunk.closesLiteral).toBe(true);
  });

  test("splits a template at its braces", () => {
    const tokens = lex('"a{b}c"');
    expect(tokens.map(show)).toEqual([
      'string-chunk "a"',
      "template-brace-open",
      'symbol "b"',
      "template-brace-close",
      'string-chunk "c"',
    ]);
    expect(tokens[0].opensLiteral).toBe(true);
    expect(tokens[0].closesLiteral).toBe(false);
    expect(tokens[4].opensLiteral).toBe(false);
    expect(tokens[4].closesLiteral).toBe(true);
  });

  test("keeps empty chunks between adjacent braces", () => {
    expect(tokenize('"{a}{b}"')).toEqual([
      'string-chunk ""',
      "template-brace-open",
      'symbol "a"',
      "template-brace-close",
      'string-chunk ""',
      "template-brace-open",
      'symbol "b"',
      "template-brace-close",
      'string-chunk ""',
    ]);
  });

  test("doubled braces are literal braces", () => {
    expect(tokenize('"a {{x}} b"')).toEqual(['string-chunk "a {x} b"']);
    expect(tokenize('"{{{x}}}"')).toEqual([
      'string-chunk "{"',
      "template-brace-open",
      'symbol "x"',
      "template-brace-close",
      'string-chunk "}"',
    ]);
  });

  test("nests literals inside braces", () => {
    expect(tokenize('"x{"y{z}"}w"')).toEqual([
      'string-chunk "x"',
      "template-brace-open",
      'string-chunk "y"',
      "template-brace-open",
      'symbol "z"',
      "template-brace-close",
      'string-chunk ""',
      "template-brace-close",
      'string-chunk "w"',
    ]);
  });

  test("tracks the mode stack", () => {
    const lexer = new Lexer(new CharStream('"a{b}c"', "test"));
    expect(lexer.modeDepth).toBe(1);
    lexer.next();
    expect(lexer.mode.mode).toBe("template-text");
    lexer.next();
    expect(lexer.mode.mode).toBe("template-brace");
    expect(lexer.modeDepth).toBe(3);
    lexer.next();
    lexer.next();
    expect(lexer.modeDepth).toBe(2);
    lexer.next();
    expect(lexer.mode.mode).toBe("code");
    expect(lexer.modeDepth).toBe(1);
  });

  test("decodes escapes", () => {
    expect(lex('"a\\nb\\t\\"\\\\\\u{41}"')[0].value).toBe('a\nb\t"\\A');
  });

  test("rejects unknown escapes", () => {
    const error = lexError('"a\\qb"');
    expect(error.kind).toBe("InvalidToken");
    expect(error.location?.startIndex).toBe(2);
  });

  test("a lone `}` inside a literal fails", () => {
    const error = lexError('"a}"');
    expect(error.kind).toBe("UnexpectedCloseBrace");
    expect(error.location?.startIndex).toBe(2);
  });

  test("fails on an unterminated literal at the end of input", () => {
    const error = lexError('"abc');
    expect(error.kind).toBe("UnterminatedLiteral");
    expect(error.location?.startIndex).toBe(4);
  });

  test("raw strings keep braces and backslashes", () => {
    expect(tokenize('r"a{b}\\n"')).toEqual(['raw-string "a{b}\\\\n"']);
    expect(tokenize('r#"say "hi""#')).toEqual(['raw-string "say \\"hi\\""']);
  });

  test("a symbol starting with r is not a raw string", () => {
    expect(tokenize("rest r")).toEqual(['symbol "rest"', 'symbol "r"']);
  });
});
