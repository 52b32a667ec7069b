import type { Form } from "./form.js";
import { type SourceLocation, Syntax } from "./syntax.js";

/**
 * A child of a compound. `splayed` records a `..` prefix written directly in
 * an argument list, e.g. the `b` in `(f a ..b)`.
 */
export type Element = {
  readonly form: Form;
  readonly splayed: boolean;
};

export type ElementInit = Form | Element;

type CompoundOpts =
  | ElementInit[]
  | { elements: ElementInit[]; location?: SourceLocation };

export class Compound extends Syntax {
  readonly syntaxType = "compound";
  readonly elements: readonly Element[];

  constructor(opts: CompoundOpts) {
    opts = Array.isArray(opts) ? { elements: opts } : opts;
    super(opts);
    this.elements = Object.freeze(opts.elements.map(toElement));
  }

  get length() {
    return this.elements.length;
  }

  get hasChildren() {
    return this.elements.length > 0;
  }

  /** The forms of every element, without their splay flags */
  get children(): Form[] {
    return this.elements.map((el) => el.form);
  }

  at(index: number): Form | undefined {
    return this.elements.at(index)?.form;
  }

  elementAt(index: number): Element | undefined {
    return this.elements.at(index);
  }

  first(): Form | undefined {
    return this.at(0);
  }

  /** Returns all but the first element */
  argElements(): Element[] {
    return this.elements.slice(1);
  }

  /** The head's name, when the head is an unsplayed symbol */
  get operator(): string | undefined {
    const head = this.elements[0];
    if (!head || head.splayed || head.form.syntaxType !== "symbol") {
      return undefined;
    }
    return head.form.value;
  }

  calls(name: string) {
    return this.operator === name;
  }

  toJSON(): unknown[] {
    return this.elements.map((el) =>
      el.splayed ? { splay: el.form.toJSON() } : el.form.toJSON()
    );
  }
}

const isElement = (init: ElementInit): init is Element =>
  "form" in init && "splayed" in init;

const toElement = (init: ElementInit): Element =>
  Object.freeze(isElement(init) ? { ...init } : { form: init, splayed: false });
