import type { CliConfig } from "../lib/config/types.js";
import { encodeForms } from "../lib/form-codec.js";
import { ParserSyntaxError } from "../parser/errors.js";
import { read } from "../parser/parser.js";
import { printAll } from "../printer/printer.js";
import { type Form, formListsEqual } from "../syntax-objects/form.js";

export type CliOutput =
  | { kind: "text"; text: string }
  | { kind: "binary"; bytes: Uint8Array };

export class RoundTripError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RoundTripError";
  }
}

export const stringifyForms = (forms: readonly Form[]) =>
  JSON.stringify(forms, undefined, 2);

/** Reads `source` and renders it the way `config` asks */
export const renderSource = (source: string, config: CliConfig): CliOutput => {
  const filePath = config.file ?? "stdin";
  const { maxDepth } = config;
  const forms = read(source, { filePath, maxDepth });

  if (config.emitParserAst) {
    return { kind: "text", text: stringifyForms(forms) };
  }

  if (config.emitMsgpack) {
    return { kind: "binary", bytes: encodeForms(forms, { maxDepth }) };
  }

  const text = printAll(forms, { abbreviate: !config.canonical, maxDepth });
  if (config.check) {
    const reread = read(text, { filePath: `${filePath} (printed)`, maxDepth });
    if (!formListsEqual(forms, reread)) {
      throw new RoundTripError(
        `Printed text does not read back to the same forms:\n${text}`
      );
    }
  }

  return { kind: "text", text };
};

export const formatCliError = (error: unknown): string => {
  if (error instanceof ParserSyntaxError) {
    const where = error.location?.toString() ?? "unknown location";
    return `${error.kind} at ${where}: ${error.message}`;
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
};
