import { decode, encode } from "@msgpack/msgpack";
import { Compound, type Element } from "../syntax-objects/compound.js";
import { type Form, number, string, symbol } from "../syntax-objects/form.js";
import { isNumberText } from "../parser/grammar.js";
import { DEFAULT_MAX_DEPTH } from "../parser/reader.js";

/**
 * Each node is a tagged array:
 *   [0, name] symbol, [1, text] number, [2, value] string,
 *   [3, ...elements] compound, [4, node] splayed compound element.
 * Source locations are not encoded.
 */
const SYMBOL = 0;
const NUMBER = 1;
const STRING = 2;
const COMPOUND = 3;
const SPLAYED = 4;

type EncodedNode = [number, ...unknown[]];

export class FormDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormDecodeError";
  }
}

/**
 * A splayed element wraps its form in one more array, and the list of forms
 * is an array too, so the encoding nests up to twice as deep as the forms.
 */
const encodedDepth = (maxDepth: number) => maxDepth * 2 + 1;

export const encodeForms = (
  forms: readonly Form[],
  opts: { maxDepth?: number } = {}
): Uint8Array =>
  encode(forms.map(encodeForm), {
    maxDepth: encodedDepth(opts.maxDepth ?? DEFAULT_MAX_DEPTH),
  });

export const decodeForms = (
  bytes: Uint8Array,
  opts: { maxDepth?: number } = {}
): Form[] => {
  const decoded: unknown = decode(bytes);
  if (!Array.isArray(decoded)) {
    throw new FormDecodeError("Expected an array of forms");
  }

  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  return decoded.map((node: unknown) => decodeForm(node, 1, maxDepth));
};

const encodeForm = (form: Form): EncodedNode => {
  switch (form.syntaxType) {
    case "symbol":
      return [SYMBOL, form.value];
    case "number":
      return [NUMBER, form.value];
    case "string":
      return [STRING, form.value];
    case "compound":
      return [COMPOUND, ...form.elements.map(encodeElement)];
  }
};

const encodeElement = (el: Element): EncodedNode =>
  el.splayed ? [SPLAYED, encodeForm(el.form)] : encodeForm(el.form);

const decodeForm = (node: unknown, depth: number, maxDepth: number): Form => {
  if (depth > maxDepth) {
    throw new FormDecodeError(`Forms nested more than ${maxDepth} levels deep`);
  }

  if (!Array.isArray(node) || node.length === 0) {
    throw new FormDecodeError("Expected a tagged array");
  }

  const [tag, ...rest]: unknown[] = node;
  if (tag === COMPOUND) {
    return new Compound(
      rest.map((child) => decodeElement(child, depth + 1, maxDepth))
    );
  }

  const [value] = rest;
  if (rest.length !== 1 || typeof value !== "string") {
    throw new FormDecodeError(
      `Expected one string payload for tag ${String(tag)}`
    );
  }

  if (tag === SYMBOL) return symbol(value);
  if (tag === NUMBER) {
    if (!isNumberText(value)) {
      throw new FormDecodeError(`Malformed number \`${value}\``);
    }
    return number(value);
  }
  if (tag === STRING) return string(value);
  throw new FormDecodeError(`Unknown tag ${String(tag)}`);
};

const decodeElement = (
  node: unknown,
  depth: number,
  maxDepth: number
): Element => {
  if (Array.isArray(node) && node[0] === SPLAYED) {
    const [, inner]: unknown[] = node;
    if (node.length !== 2) {
      throw new FormDecodeError("Expected one form in a splayed element");
    }
    return { form: decodeForm(inner, depth, maxDepth), splayed: true };
  }
  return { form: decodeForm(node, depth, maxDepth), splayed: false };
};
