export type CliConfig = {
  /** Source file to read. Stdin when undefined */
  file?: string;
  /** Print every form in canonical call form */
  canonical: boolean;
  /** Write the forms' JSON to stdout instead of printing them */
  emitParserAst: boolean;
  /** Write the forms' MessagePack encoding to stdout */
  emitMsgpack: boolean;
  /** Fail unless printing and re-reading reproduces the same tree */
  check: boolean;
  maxDepth?: number;
};
