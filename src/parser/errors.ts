import type { SourceLocation } from "../syntax-objects/syntax.js";

export type SyntaxErrorKind =
  /** A string, template or raw literal (or block comment) never closed */
  | "UnterminatedLiteral"
  /** A mismatched or missing `)`, `]` or `}` */
  | "UnbalancedDelimiter"
  /** A prefix sigil with nothing after it to apply to */
  | "DanglingSigil"
  /** A `}` outside any template `{` */
  | "UnexpectedCloseBrace"
  | "RecursionDepthExceeded"
  /** Characters that start no token, or a malformed number or escape */
  | "InvalidToken"
  /** `[x]`, `"{}"`, or `"{a b}"` */
  | "MalformedAbbreviation"
  /** readOne got zero forms, or more than one */
  | "ExpectedOneForm";

export class ParserSyntaxError extends Error {
  readonly kind: SyntaxErrorKind;
  readonly location?: SourceLocation;

  constructor(
    kind: SyntaxErrorKind,
    message: string,
    location?: SourceLocation
  ) {
    super(message);
    this.name = "ParserSyntaxError";
    this.kind = kind;
    this.location = location?.clone();
  }
}

export const parserErrorLocation = (
  error: unknown
): SourceLocation | undefined =>
  error instanceof ParserSyntaxError ? error.location : undefined;

export class PrinterError extends Error {
  readonly kind: "RecursionDepthExceeded";

  constructor(message: string) {
    super(message);
    this.name = "PrinterError";
    this.kind = "RecursionDepthExceeded";
  }
}
