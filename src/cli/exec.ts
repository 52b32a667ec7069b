import { readFile } from "node:fs/promises";
import { stdin, stdout } from "node:process";
import { getConfig } from "../lib/config/index.js";
import { type CliOutput, formatCliError, renderSource } from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const source = await readSource(config.file);
  emit(renderSource(source, config));
}

async function readSource(file?: string): Promise<string> {
  if (file) return readFile(file, "utf8");

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function emit(output: CliOutput) {
  if (output.kind === "binary") {
    stdout.write(output.bytes);
    return;
  }

  console.log(output.text);
}

function errorHandler(error: unknown) {
  console.error(formatCliError(error));
  process.exit(1);
}
