import type { Compound, Element } from "../syntax-objects/compound.js";
import { type Form, isCompound, isStringAtom } from "../syntax-objects/form.js";
import { PrinterError } from "../parser/errors.js";
import { getAbbreviationRule } from "../parser/grammar.js";
import { DEFAULT_MAX_DEPTH } from "../parser/reader.js";
import { escapeStringSegment, printStringLiteral } from "./string-literal.js";

export type PrinterOptions = {
  /** Print the abbreviated spelling where a form allows one. Defaults to true */
  abbreviate?: boolean;
  /** Deepest form nesting printed before failing */
  maxDepth?: number;
};

export const print = (form: Form, opts: PrinterOptions = {}): string =>
  new Printer(opts).print(form);

/** Prints top-level forms one per line */
export const printAll = (
  forms: readonly Form[],
  opts: PrinterOptions = {}
): string => {
  const printer = new Printer(opts);
  return forms.map((form) => printer.print(form)).join("\n");
};

/**
 * Where a form sits. In an argument list `..x` marks a splayed element, so
 * an explicit `(splay x)` there keeps its canonical spelling.
 */
export type Position = "general" | "element";

export class Printer {
  private readonly abbreviate: boolean;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(opts: PrinterOptions = {}) {
    this.abbreviate = opts.abbreviate ?? true;
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  print(form: Form, position: Position = "general"): string {
    this.depth += 1;
    try {
      if (this.depth > this.maxDepth) {
        throw new PrinterError(
          `Forms are nested more than ${this.maxDepth} levels deep`
        );
      }

      return this.printForm(form, position);
    } finally {
      this.depth -= 1;
    }
  }

  private printForm(form: Form, position: Position): string {
    switch (form.syntaxType) {
      case "symbol":
      case "number":
        return form.value;
      case "string":
        return printStringLiteral(form.value);
      case "compound":
        return this.printCompound(form, position);
    }
  }

  /** Splayed elements keep their `..` prefix, never `(splay ...)` */
  private printElement(el: Element): string {
    return el.splayed
      ? `..${this.print(el.form)}`
      : this.print(el.form, "element");
  }

  private printCompound(form: Compound, position: Position): string {
    const abbreviated = this.abbreviate
      ? this.contract(form, position)
      : undefined;
    if (abbreviated !== undefined) return abbreviated;
    return `(${form.elements.map((el) => this.printElement(el)).join(" ")})`;
  }

  /**
   * Returns the abbreviated spelling, or undefined when the compound's shape
   * doesn't match its operator's rule exactly.
   */
  private contract(form: Compound, position: Position): string | undefined {
    const rule = getAbbreviationRule(form.operator);
    if (!rule) return undefined;
    if (form.operator === "splay" && position === "element") return undefined;

    const args = form.argElements();
    if (rule.shape === "prefix") {
      const [operand] = args;
      if (args.length !== 1 || !operand || operand.splayed) return undefined;
      const text = this.print(operand.form);
      // `.` followed by `.` would lex as a splay sigil
      if (rule.sigil === "." && text.startsWith(".")) {
        return `(${form.operator} ${this.asElement(operand.form, text)})`;
      }
      return `${rule.sigil}${text}`;
    }

    if (rule.shape === "access") {
      if (args.length < rule.minArgs) return undefined;
      return `[${args.map((el) => this.printElement(el)).join(" ")}]`;
    }

    return this.contractTemplate(args, rule.minArgs);
  }

  private contractTemplate(
    args: Element[],
    minArgs: number
  ): string | undefined {
    if (args.length < minArgs || args.length % 2 === 0) return undefined;
    if (args.some((el) => el.splayed)) return undefined;

    const segments = args.filter((_, i) => i % 2 === 0).map((el) => el.form);
    const embedded = args.filter((_, i) => i % 2 === 1).map((el) => el.form);
    if (!segments.every(isStringAtom)) return undefined;

    let text = "";
    for (const [index, segment] of segments.entries()) {
      if (index > 0) text += `{${this.print(embedded[index - 1])}}`;
      text += escapeStringSegment(segment.value);
    }

    return `"${text}"`;
  }

  /**
   * Respells general-position `text` for an argument list, where a
   * contracted `..x` must go back to `(splay x)`.
   */
  private asElement(form: Form, text: string): string {
    if (!isCompound(form) || form.operator !== "splay") return text;
    if (!text.startsWith("..")) return text;

    const inner = form.at(1);
    const innerText = text.slice(2);
    return `(splay ${inner ? this.asElement(inner, innerText) : innerText})`;
  }
}
