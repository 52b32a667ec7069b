import { describe, expect, it } from "vitest";
import { decodeForms } from "../../lib/form-codec.js";
import type { CliConfig } from "../../lib/config/types.js";
import { ParserSyntaxError } from "../../parser/errors.js";
import { formListsEqual } from "../../syntax-objects/form.js";
import { read } from "../../parser/parser.js";
import { RoundTripError, formatCliError, renderSource } from "../output.js";

const config = (overrides: Partial<CliConfig> = {}): CliConfig => ({
  canonical: false,
  emitParserAst: false,
  emitMsgpack: false,
  check: false,
  ...overrides,
});

const renderError = (source: string, overrides: Partial<CliConfig> = {}) => {
  try {
    renderSource(source, config(overrides));
  } catch (error) {
    return error;
  }
  throw new Error("Expected rendering to fail");
};

describe("renderSource", () => {
  it("prints abbreviated forms one per line", () => {
    expect(renderSource("(quote x)\n(access a b)", config())).toEqual({
      kind: "text",
      text: "'x\n[a b]",
    });
  });

  it("prints canonical forms", () => {
    expect(renderSource("'x .m", config({ canonical: true }))).toEqual({
      kind: "text",
      text: "(quote x)\n(met-name m)",
    });
  });

  it("emits the forms' JSON", () => {
    const output = renderSource("(f ..b)", config({ emitParserAst: true }));
    expect(output).toEqual({
      kind: "text",
      text: JSON.stringify([["f", { splay: "b" }]], undefined, 2),
    });
  });

  it("emits MessagePack", () => {
    const output = renderSource("'(a ..b)", config({ emitMsgpack: true }));
    if (output.kind !== "binary") throw new Error("expected bytes");
    expect(formListsEqual(decodeForms(output.bytes), read("'(a ..b)"))).toBe(
      true
    );
  });

  it("passes the round-trip check", () => {
    expect(
      renderSource('"a{b}" (f ..c)', config({ check: true }))
    ).toEqual({ kind: "text", text: '"a{b}"\n(f ..c)' });
  });

  it("locates syntax errors in the named file", () => {
    const error = renderError("(f", { file: "main.lisp" });
    expect(error).toBeInstanceOf(ParserSyntaxError);
    expect(formatCliError(error)).toBe(
      "UnbalancedDelimiter at main.lisp:1:3: Expected `)`, found end of input"
    );
  });

  it("applies the depth limit", () => {
    const error = renderError("((x))", { maxDepth: 2 });
    expect(formatCliError(error)).toBe(
      "RecursionDepthExceeded at stdin:1:3: Forms are nested more than 2 levels deep"
    );
  });
});

describe("formatCliError", () => {
  it("names other errors", () => {
    expect(formatCliError(new RoundTripError("mismatch"))).toBe(
      "RoundTripError: mismatch"
    );
  });

  it("stringifies thrown values", () => {
    expect(formatCliError("boom")).toBe("boom");
  });
});
