function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Replaces `{{key}}` and `{{key.path}}` placeholders. Missing keys render as
 * an empty string.
 */
export function applyTemplate(template: string, data: Record<string, unknown>): string {
  return template.replace(/\{\{(\w+(?:\.\w+)*)\}\}/g, (_, keyPath: string) => {
    let current: unknown = data;
    for (const key of keyPath.split(".")) {
      if (!isRecord(current)) {
        return "";
      }
      current = current[key];
    }
    if (current === null || current === undefined) {
      return "";
    }
    return typeof current === "object" ? JSON.stringify(current) : String(current);
  });
}

export function firstNameOf(fullName: string, fallback = "there"): string {
  const first = fullName.trim().split(/\s+/)[0];
  return first ? first : fallback;
}

export type OutputFormat = "text" | "json";

/** JSON renders `payload`; text renders one line per entry of `lines`. */
export function formatOutput(payload: unknown, lines: readonly string[], format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(payload, null, 2);
  }
  return lines.length === 0 ? "No results." : lines.join("\n");
}
