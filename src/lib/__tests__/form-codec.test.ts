import { encode } from "@msgpack/msgpack";
import { describe, expect, test } from "vitest";
import { read } from "../../parser/parser.js";
import { formListsEqual, isCompound } from "../../syntax-objects/form.js";
import { FormDecodeError, decodeForms, encodeForms } from "../form-codec.js";

describe("form codec", () => {
  test("round trips a form tree with splay flags", () => {
    const forms = read('(f ..\'x [a b]) "s{t}" 0x1F');
    const decoded = decodeForms(encodeForms(forms));
    expect(formListsEqual(decoded, forms)).toBe(true);

    const [head] = decoded;
    if (!isCompound(head)) throw new Error("expected a compound");
    expect(head.elementAt(1)?.splayed).toBe(true);
  });

  test("uses tagged arrays", () => {
    const bytes = encodeForms(read("(a ..1) \"s\""));
    expect(bytes).toEqual(
      encode([
        [3, [0, "a"], [4, [1, "1"]]],
        [2, "s"],
      ])
    );
  });

  test("encodes trees nested deeper than the library default", () => {
    const forms = read(`${"(f ..".repeat(150)}x${")".repeat(150)}`);
    const decoded = decodeForms(encodeForms(forms));
    expect(formListsEqual(decoded, forms)).toBe(true);
  });

  test("drops source locations", () => {
    const [form] = decodeForms(encodeForms(read("x")));
    expect(form.location).toBeUndefined();
  });

  test.each<[unknown, string]>([
    [{}, "Expected an array of forms"],
    [[5], "Expected a tagged array"],
    [[[]], "Expected a tagged array"],
    [[[9, "x"]], "Unknown tag 9"],
    [[[0]], "Expected one string payload for tag 0"],
    [[[1, 2]], "Expected one string payload for tag 1"],
    [[[1, "NaN"]], "Malformed number `NaN`"],
    [[[3, [4]]], "Expected one form in a splayed element"],
  ])("rejects %j", (value, message) => {
    const bytes = encode(value);
    expect(() => decodeForms(bytes)).toThrow(FormDecodeError);
    expect(() => decodeForms(bytes)).toThrow(message);
  });

  test("rejects trees deeper than the limit", () => {
    const bytes = encodeForms(read("((((x))))"));
    expect(decodeForms(bytes, { maxDepth: 5 })).toHaveLength(1);
    expect(() => decodeForms(bytes, { maxDepth: 4 })).toThrow(
      "Forms nested more than 4 levels deep"
    );
  });
});
