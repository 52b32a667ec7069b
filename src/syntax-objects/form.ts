import { NumberAtom, StringAtom, SymbolAtom } from "./atom.js";
import { Compound, type Element, type ElementInit } from "./compound.js";
import type { SourceLocation } from "./syntax.js";
import { isNumberText } from "../parser/grammar.js";

export type AtomForm = SymbolAtom | NumberAtom | StringAtom;
export type Form = AtomForm | Compound;

export const isSymbolAtom = (form?: Form): form is SymbolAtom =>
  form?.syntaxType === "symbol";

export const isNumberAtom = (form?: Form): form is NumberAtom =>
  form?.syntaxType === "number";

export const isStringAtom = (form?: Form): form is StringAtom =>
  form?.syntaxType === "string";

export const isAtom = (form?: Form): form is AtomForm =>
  isSymbolAtom(form) || isNumberAtom(form) || isStringAtom(form);

export const isCompound = (form?: Form): form is Compound =>
  form?.syntaxType === "compound";

export const symbol = (name: string, location?: SourceLocation) =>
  new SymbolAtom({ value: name, location });

/** Throws a RangeError unless `raw` spells a number literal the reader accepts */
export const number = (raw: string | number, location?: SourceLocation) => {
  const value = String(raw);
  if (!isNumberText(value)) {
    throw new RangeError(`Not a number literal: ${value}`);
  }
  return new NumberAtom({ value, location });
};

export const string = (value: string, location?: SourceLocation) =>
  new StringAtom({ value, location });

export const compound = (...elements: ElementInit[]) => new Compound(elements);

/** Marks a compound element as written with a `..` prefix */
export const splayed = (form: Form): Element => ({ form, splayed: true });

/** A compound headed by the symbol `name` */
export const call = (name: string, ...args: ElementInit[]) =>
  new Compound([symbol(name), ...args]);

export const formsEqual = (a: Form, b: Form): boolean => {
  if (a.syntaxType === "compound" || b.syntaxType === "compound") {
    if (a.syntaxType !== "compound" || b.syntaxType !== "compound") {
      return false;
    }
    return (
      a.length === b.length &&
      a.elements.every((el, index) => {
        const other = b.elements[index];
        return (
          el.splayed === other.splayed && formsEqual(el.form, other.form)
        );
      })
    );
  }

  return a.eq(b);
};

export const formListsEqual = (a: readonly Form[], b: readonly Form[]) =>
  a.length === b.length && a.every((form, index) => formsEqual(form, b[index]));
