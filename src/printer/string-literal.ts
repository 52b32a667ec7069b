const ESCAPES = new Map([
  ["\\", "\\\\"],
  ['"', '\\"'],
  ["\n", "\\n"],
  ["\t", "\\t"],
  ["\r", "\\r"],
  ["\0", "\\0"],
  ["{", "{{"],
  ["}", "}}"],
]);

const isControl = (code: number) => code < 0x20 || code === 0x7f;

/**
 * Escapes a string segment for use between the quotes of a literal. Braces
 * are doubled because every `"..."` literal may hold template forms.
 */
export const escapeStringSegment = (value: string): string => {
  let out = "";
  for (const char of value) {
    const escaped = ESCAPES.get(char);
    if (escaped !== undefined) {
      out += escaped;
      continue;
    }

    const code = char.codePointAt(0) ?? 0;
    out += isControl(code) ? `\\u{${code.toString(16)}}` : char;
  }
  return out;
};

export const printStringLiteral = (value: string) =>
  `"${escapeStringSegment(value)}"`;
