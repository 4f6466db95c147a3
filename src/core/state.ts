import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";

export type MarkKind = "requestSent" | "messaged" | "connected";

/** The only persistence surface the action layer sees. */
export interface UrlStateStore {
  isMarked(url: string, kind: MarkKind): boolean;
  mark(url: string, kind: MarkKind): Promise<void>;
  close(): Promise<void>;
}

const stateFileSchema = z.object({
  requests: z.record(z.string()).default({}),
  messages: z.record(z.string()).default({}),
  connections: z.record(z.string()).default({})
});

type StateFile = z.infer<typeof stateFileSchema>;

const SECTION: Record<MarkKind, keyof StateFile> = {
  requestSent: "requests",
  messaged: "messages",
  connected: "connections"
};

/**
 * URL → ISO timestamp maps kept in memory and rewritten to one JSON document
 * on every mark. Writes run one at a time through a promise chain.
 */
export class JsonStateStore implements UrlStateStore {
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    readonly filePath: string,
    private readonly data: StateFile,
    private readonly now: () => Date
  ) {}

  static async open(filePath: string, now: () => Date = () => new Date()): Promise<JsonStateStore> {
    let raw: string | null = null;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw new Error(`Cannot read state file: ${filePath}`, { cause: error });
      }
    }

    if (raw === null) {
      logger.debug("No state file yet, starting empty", { path: filePath });
      return new JsonStateStore(filePath, stateFileSchema.parse({}), now);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new Error(`State file contains invalid JSON: ${filePath}`);
    }
    const parsed = stateFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`State file is corrupted or in an unexpected format: ${filePath}`);
    }
    return new JsonStateStore(filePath, parsed.data, now);
  }

  isMarked(url: string, kind: MarkKind): boolean {
    return Object.prototype.hasOwnProperty.call(this.data[SECTION[kind]], url);
  }

  markedUrls(kind: MarkKind): string[] {
    return Object.keys(this.data[SECTION[kind]]);
  }

  mark(url: string, kind: MarkKind): Promise<void> {
    this.data[SECTION[kind]][url] = this.now().toISOString();
    return this.enqueueWrite();
  }

  close(): Promise<void> {
    return this.enqueueWrite();
  }

  private enqueueWrite(): Promise<void> {
    const write = this.writeChain.then(() => this.persist());
    // Later writes still run after a failure; only this caller sees the rejection.
    this.writeChain = write.catch((error: unknown) => {
      logger.error("State file write failed", { path: this.filePath, error });
    });
    return write;
  }

  private async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    await fs.writeFile(this.filePath, JSON.stringify(this.data, null, 2), { mode: 0o600 });
  }
}
