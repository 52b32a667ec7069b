import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { CliConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../../package.json") as { version: string };

type CliOptions = {
  canonical?: boolean;
  emitParserAst?: boolean;
  emitMsgpack?: boolean;
  check?: boolean;
  maxDepth?: number;
};

const parseMaxDepth = (value: string): number => {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError(
      `invalid max depth "${value}" (expected a positive integer)`
    );
  }
  return depth;
};

const createCommand = (): Command =>
  new Command()
    .name("abbrev")
    .description(
      "Read forms and print them back, contracting canonical calls into their abbreviations"
    )
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("[file]", "source file to read (default: stdin)")
    .option("--canonical", "print every form in canonical call form")
    .option("--emit-parser-ast", "write the forms' JSON to stdout")
    .option("--emit-msgpack", "write the forms' MessagePack encoding to stdout")
    .option("--check", "exit 1 unless printing round-trips every form")
    .option(
      "--max-depth <n>",
      "deepest form nesting to read and print",
      parseMaxDepth
    );

/** Parses user arguments, without the node executable and script path */
export const parseCliArgs = (args: readonly string[]): CliConfig => {
  const program = createCommand();
  program.parse(args, { from: "user" });
  const opts = program.opts<CliOptions>();
  const [file] = program.args;

  return {
    file: file === undefined || file === "-" ? undefined : file,
    canonical: opts.canonical ?? false,
    emitParserAst: opts.emitParserAst ?? false,
    emitMsgpack: opts.emitMsgpack ?? false,
    check: opts.check ?? false,
    maxDepth: opts.maxDepth,
  };
};

export const getConfigFromCli = (): CliConfig =>
  parseCliArgs(process.argv.slice(2));
