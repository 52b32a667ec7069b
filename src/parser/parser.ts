import type { Form } from "../syntax-objects/form.js";
import { CharStream } from "./char-stream.js";
import { ParserSyntaxError } from "./errors.js";
import { Lexer } from "./lexer.js";
import { Reader, type ReaderOptions } from "./reader.js";

export type ReadResult =
  | { ok: true; forms: Form[] }
  | { ok: false; error: ParserSyntaxError };

const createReader = (text: string, opts: ReaderOptions) => {
  const chars = new CharStream(text, opts.filePath ?? "raw");
  return new Reader(new Lexer(chars), opts);
};

/** Reads every top-level form in `text`, expanding all abbreviations */
export const read = (text: string, opts: ReaderOptions = {}): Form[] =>
  createReader(text, opts).readAll();

/** Fails at the second form, or at the end of input when there is none */
export const readOne = (text: string, opts: ReaderOptions = {}): Form => {
  const reader = createReader(text, opts);
  const forms = reader.readAll();
  const [form] = forms;
  if (forms.length !== 1 || !form) {
    throw new ParserSyntaxError(
      "ExpectedOneForm",
      `Expected exactly one form, found ${forms.length}`,
      forms[1]?.location ?? reader.lexer.currentSourceLocation()
    );
  }
  return form;
};

/**
 * Like `read`, but a syntax error comes back as a failed result. There is
 * no partial tree: either every form read, or none is returned.
 */
export const tryRead = (text: string, opts: ReaderOptions = {}): ReadResult => {
  try {
    return { ok: true, forms: read(text, opts) };
  } catch (error) {
    if (error instanceof ParserSyntaxError) return { ok: false, error };
    throw error;
  }
};
