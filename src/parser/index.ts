export * from "./parser.js";
export * from "./errors.js";
export { Reader, DEFAULT_MAX_DEPTH, type ReaderOptions } from "./reader.js";
export { Lexer, type LexerMode } from "./lexer.js";
export { CharStream } from "./char-stream.js";
export * from "./token.js";
