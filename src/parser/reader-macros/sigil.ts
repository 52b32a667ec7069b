import { Compound } from "../../syntax-objects/compound.js";
import { symbol } from "../../syntax-objects/form.js";
import { sigilOperators } from "../grammar.js";
import type { ReaderMacro } from "./types.js";

/**
 * `'x`, `` `x ``, `~x`, `..x`, `@x` and `.x`. Each sigil takes exactly one
 * following form. A `..` met here is in a general position, so it expands
 * to `(splay x)`; argument lists catch theirs before reaching this macro.
 */
export const sigilReader: ReaderMacro = {
  match: (t) => sigilOperators.has(t.kind),
  macro: (token, reader) => {
    const operator = sigilOperators.get(token.kind);
    if (!operator) {
      throw new Error(`No operator for ${token.kind}`);
    }

    const operand = reader.readOperand(token);
    return new Compound({
      elements: [symbol(operator, token.location), operand],
      location: reader.spanFrom(token.location),
    });
  },
};
