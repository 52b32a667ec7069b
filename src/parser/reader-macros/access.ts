import { Compound } from "../../syntax-objects/compound.js";
import { symbol } from "../../syntax-objects/form.js";
import { ParserSyntaxError } from "../errors.js";
import { ACCESS, abbreviations } from "../grammar.js";
import type { ReaderMacro } from "./types.js";

const minArgs = () => {
  const rule = abbreviations.get(ACCESS);
  return rule?.shape === "access" ? rule.minArgs : 2;
};

/** `[coll key ...]` -> `(access coll key ...)` */
export const accessReader: ReaderMacro = {
  match: (t) => t.kind === "open-bracket",
  macro: (token, reader) => {
    const elements = reader.readElements("close-bracket");
    const location = reader.spanFrom(token.location);

    if (elements.length < minArgs()) {
      throw new ParserSyntaxError(
        "MalformedAbbreviation",
        "`[...]` needs a collection and at least one key",
        location
      );
    }

    return new Compound({
      elements: [symbol(ACCESS, token.location), ...elements],
      location,
    });
  },
};
