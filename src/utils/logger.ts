import process from "node:process";

export type LogContext = Record<string, unknown>;

function renderValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === "string") {
    return /[\s="]/.test(value) || value === "" ? JSON.stringify(value) : value;
  }
  if (value === undefined) {
    return "undefined";
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatContext(context?: LogContext): string {
  if (!context) {
    return "";
  }
  return Object.entries(context)
    .map(([key, value]) => ` ${key}=${renderValue(value)}`)
    .join("");
}

export const logger = {
  verbose: false,

  debug(msg: string, context?: LogContext): void {
    if (this.verbose) {
      process.stderr.write(`[debug] ${msg}${formatContext(context)}\n`);
    }
  },

  info(msg: string, context?: LogContext): void {
    process.stderr.write(`${msg}${formatContext(context)}\n`);
  },

  warn(msg: string, context?: LogContext): void {
    process.stderr.write(`[warn] ${msg}${formatContext(context)}\n`);
  },

  error(msg: string, context?: LogContext): void {
    process.stderr.write(`[error] ${msg}${formatContext(context)}\n`);
  }
};
