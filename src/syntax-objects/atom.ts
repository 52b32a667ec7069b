import { type SourceLocation, Syntax } from "./syntax.js";

export type AtomOpts = {
  location?: SourceLocation;
  value: string;
};

export abstract class Atom extends Syntax {
  readonly value: string;

  constructor(opts: AtomOpts | string) {
    if (typeof opts === "string") {
      super();
      this.value = opts;
      return;
    }

    super(opts);
    this.value = opts.value;
  }

  eq(val: Atom | string): boolean {
    return val instanceof Atom
      ? this.syntaxType === val.syntaxType && this.value === val.value
      : this.value === val;
  }
}

export class SymbolAtom extends Atom {
  readonly syntaxType = "symbol";

  toJSON() {
    return this.value;
  }
}

/** Keeps the literal's source text, so `0x1f` prints back as `0x1f` */
export class NumberAtom extends Atom {
  readonly syntaxType = "number";

  toJSON() {
    return { number: this.value };
  }
}

/** Holds the decoded value, not the quoted source text */
export class StringAtom extends Atom {
  readonly syntaxType = "string";

  toJSON() {
    return { string: this.value };
  }
}
