import type { Token } from "../token.js";
import { accessReader } from "./access.js";
import { numberReader, rawStringReader, symbolReader } from "./atom.js";
import { listReader } from "./list.js";
import { sigilReader } from "./sigil.js";
import { templateStringReader } from "./template-string.js";
import type { ReaderMacro } from "./types.js";

const MACROS: ReaderMacro[] = [
  listReader,
  accessReader,
  sigilReader,
  templateStringReader,
  rawStringReader,
  numberReader,
  symbolReader,
];

export const getReaderMacroForToken = (
  token: Token
): ReaderMacro["macro"] | undefined =>
  MACROS.find((m) => m.match(token))?.macro;
