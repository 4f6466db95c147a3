import fs from "node:fs/promises";
import path from "node:path";
import { formatOutput, type OutputFormat } from "./format.js";

export async function outputResult(
  payload: unknown,
  lines: readonly string[],
  format: OutputFormat,
  outputPath?: string
): Promise<void> {
  const output = formatOutput(payload, lines, format);

  if (outputPath) {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, output + "\n", { encoding: "utf8", mode: 0o600 });
    process.stderr.write(`Output written to ${outputPath}\n`);
  } else {
    console.log(output);
  }
}
