import { Command, InvalidArgumentError } from "commander";
import type { OutputFormat } from "./format.js";

export function parsePositiveInt(value: string, name: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer.`);
  }
  return num;
}

export interface CommonOpts {
  headed: boolean;
  json: boolean;
  output?: string;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("--headed", "Run browser in headed mode (overrides config)", false)
    .option("--json", "Print results as JSON", false)
    .option("--output <file>", "Write output to a file instead of stdout");
}

export function resolveFormat(opts: CommonOpts): OutputFormat {
  return opts.json ? "json" : "text";
}
