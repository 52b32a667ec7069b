import { Compound } from "../../syntax-objects/compound.js";
import { type Form, string, symbol } from "../../syntax-objects/form.js";
import { ParserSyntaxError } from "../errors.js";
import { TEMPLATE_STR } from "../grammar.js";
import type { Token } from "../token.js";
import type { ReaderContext, ReaderMacro } from "./types.js";

/**
 * `"a{b}c"` -> `(template-str "a" b "c")`. The segments around each brace
 * pair are kept even when empty, so `"{b}"` reads as
 * `(template-str "" b "")`. A literal without braces is a plain string.
 */
export const templateStringReader: ReaderMacro = {
  match: (t) => t.kind === "string-chunk" && t.opensLiteral,
  macro: (token, reader) => {
    if (token.closesLiteral) {
      return string(token.value, token.location);
    }

    const args: Form[] = [string(token.value, token.location)];
    let chunk = token;
    while (!chunk.closesLiteral) {
      args.push(readEmbeddedForm(reader));
      chunk = reader.expect("string-chunk");
      args.push(string(chunk.value, chunk.location));
    }

    return new Compound({
      elements: [symbol(TEMPLATE_STR, token.location), ...args],
      location: reader.spanFrom(token.location),
    });
  },
};

/** Reads `{ form }`, which must hold exactly one form */
const readEmbeddedForm = (reader: ReaderContext): Form => {
  const open = reader.expect("template-brace-open");

  if (reader.lexer.peek().is("template-brace-close")) {
    throw new ParserSyntaxError(
      "MalformedAbbreviation",
      "Empty `{}` in template string, write `{{}}` for literal braces",
      open.location
    );
  }

  const form = reader.readForm();
  const close = reader.lexer.peek();
  if (!close.is("template-brace-close")) {
    throw unclosedBrace(open, close);
  }

  reader.lexer.next();
  return form;
};

const unclosedBrace = (open: Token, found: Token) => {
  if (found.isEnd || found.isClose) {
    return new ParserSyntaxError(
      "UnbalancedDelimiter",
      `Expected \`}\` to close the \`{\` at ${open.location}, found ${found.describe()}`,
      found.location
    );
  }

  return new ParserSyntaxError(
    "MalformedAbbreviation",
    "A template `{...}` holds exactly one form",
    found.location
  );
};
