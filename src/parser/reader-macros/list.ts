import { Compound } from "../../syntax-objects/compound.js";
import type { ReaderMacro } from "./types.js";

export const listReader: ReaderMacro = {
  match: (t) => t.kind === "open-paren",
  macro: (token, reader) => {
    const elements = reader.readElements("close-paren");
    return new Compound({
      elements,
      location: reader.spanFrom(token.location),
    });
  },
};
