export type SyntaxType = "symbol" | "number" | "string" | "compound";

export abstract class Syntax {
  /** For tagged unions */
  abstract readonly syntaxType: SyntaxType;
  readonly syntaxId = getSyntaxId();
  readonly location?: SourceLocation;

  constructor(opts: { location?: SourceLocation } = {}) {
    this.location = opts.location;
  }

  /** Plain JSON view of the tree. Locations are left out. */
  abstract toJSON(): unknown;
}

export type SourceLocationJSON = {
  startIndex: number;
  endIndex: number;
  startLine: number;
  endLine: number;
  startColumn: number;
  endColumn: number;
  filePath: string;
};

export class SourceLocation {
  /** The exact character index the syntax starts */
  startIndex: number;
  /** The exact character index the syntax ends */
  endIndex: number;
  /** The line the syntax is located in */
  startLine: number;
  endLine: number;
  /** The column within the line the syntax begins */
  startColumn: number;
  /** The column index in the line where the syntax ends  */
  endColumn: number;

  filePath: string;

  constructor(opts: SourceLocationJSON) {
    this.startIndex = opts.startIndex;
    this.endIndex = opts.endIndex;
    this.startLine = opts.startLine;
    this.endLine = opts.endLine;
    this.startColumn = opts.startColumn;
    this.endColumn = opts.endColumn;
    this.filePath = opts.filePath;
  }

  setEndToStartOf(location?: SourceLocation) {
    if (!location) return;
    this.endIndex = location.startIndex;
    this.endColumn = location.startColumn;
    this.endLine = location.startLine;
  }

  toString() {
    return `${this.filePath}:${this.startLine}:${this.startColumn + 1}`;
  }

  toJSON(): SourceLocationJSON {
    return {
      startIndex: this.startIndex,
      endIndex: this.endIndex,
      startLine: this.startLine,
      endLine: this.endLine,
      startColumn: this.startColumn,
      endColumn: this.endColumn,
      filePath: this.filePath,
    };
  }

  clone() {
    return new SourceLocation(this.toJSON());
  }
}

let currentSyntaxId = 0;
export const getSyntaxId = () => {
  const current = currentSyntaxId;
  currentSyntaxId += 1;
  return current;
};
