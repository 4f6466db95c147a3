import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { PreconditionError } from "../core/errors.js";

const APP_DIR = path.join(os.homedir(), ".outreach-pilot");
const DEFAULT_CONFIG_PATH = path.join(APP_DIR, "config.json");

const configSchema = z
  .object({
    headless: z.boolean().default(true),
    userAgent: z.string().min(1).optional(),
    proxyUrl: z.string().min(1).optional(),
    userDataDir: z.string().min(1).optional(),
    channel: z.string().min(1).optional(),
    credentials: z
      .object({
        username: z.string().default(""),
        password: z.string().default("")
      })
      .default({}),
    limits: z
      .object({
        dailyConnections: z.number().int().min(0).default(20),
        dailyMessages: z.number().int().min(0).default(20)
      })
      .default({}),
    humanize: z
      .object({
        typoRate: z.number().min(0).max(1).default(0.05),
        intensity: z.number().positive().default(1)
      })
      .default({}),
    statePath: z.string().default(path.join(APP_DIR, "state.json")),
    screenshotDir: z.string().default("."),
    verbose: z.boolean().default(false)
  })
  .default({});

export type Config = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

let configPath = DEFAULT_CONFIG_PATH;
let cachedConfig: Config | null = null;

export function setConfigPath(filePath: string): void {
  configPath = path.resolve(filePath);
  cachedConfig = null;
}

export function getConfigPath(): string {
  return configPath;
}

function parseLimit(value: string): number | undefined {
  const num = Number(value);
  return Number.isInteger(num) && num >= 0 ? num : undefined;
}

/**
 * Environment variables win over file-provided values.
 */
export function applyEnvOverrides(config: Config, env: Env): Config {
  const next: Config = {
    ...config,
    credentials: { ...config.credentials },
    limits: { ...config.limits }
  };

  if (env.OUTREACH_HEADLESS) {
    next.headless = env.OUTREACH_HEADLESS === "true" || env.OUTREACH_HEADLESS === "1";
  }
  if (env.OUTREACH_USER_AGENT) {
    next.userAgent = env.OUTREACH_USER_AGENT;
  }
  if (env.OUTREACH_PROXY) {
    next.proxyUrl = env.OUTREACH_PROXY;
  }
  if (env.OUTREACH_USER_DATA) {
    next.userDataDir = env.OUTREACH_USER_DATA;
  }
  if (env.OUTREACH_USERNAME) {
    next.credentials.username = env.OUTREACH_USERNAME;
  }
  if (env.OUTREACH_PASSWORD) {
    next.credentials.password = env.OUTREACH_PASSWORD;
  }
  if (env.OUTREACH_STATE_PATH) {
    next.statePath = env.OUTREACH_STATE_PATH;
  }
  if (env.OUTREACH_LIMIT_CONNECT) {
    next.limits.dailyConnections = parseLimit(env.OUTREACH_LIMIT_CONNECT) ?? next.limits.dailyConnections;
  }
  if (env.OUTREACH_LIMIT_MESSAGE) {
    next.limits.dailyMessages = parseLimit(env.OUTREACH_LIMIT_MESSAGE) ?? next.limits.dailyMessages;
  }

  return next;
}

export function parseConfig(raw: unknown, env: Env = {}): Config {
  return applyEnvOverrides(configSchema.parse(raw), env);
}

async function readConfigFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new Error(`Cannot read config file: ${filePath}`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`Config file contains invalid JSON: ${filePath}`);
  }
}

export async function loadConfig(): Promise<Config> {
  if (cachedConfig) {
    return cachedConfig;
  }

  loadDotenv();
  const raw = await readConfigFile(configPath);
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid config file ${configPath}: ${issues}`);
  }

  cachedConfig = applyEnvOverrides(parsed.data, process.env);
  return cachedConfig;
}

/**
 * A run needs either a credential pair or a persistent profile that may
 * already hold a session.
 */
export function assertRunnable(config: Config): void {
  const { username, password } = config.credentials;
  if ((!username || !password) && !config.userDataDir) {
    throw new PreconditionError("credentials (username/password) or userDataDir are required");
  }
}

export async function saveConfigValue(key: string, value: unknown): Promise<void> {
  const current = await readConfigFile(configPath);
  const merged: Record<string, unknown> = typeof current === "object" && current !== null ? { ...current } : {};

  const dot = key.indexOf(".");
  if (dot > 0) {
    const parent = key.slice(0, dot);
    const child = key.slice(dot + 1);
    const existing = merged[parent];
    const nested: Record<string, unknown> =
      typeof existing === "object" && existing !== null && !Array.isArray(existing) ? { ...existing } : {};
    nested[child] = value;
    merged[parent] = nested;
  } else {
    merged[key] = value;
  }

  const validated = configSchema.safeParse(merged);
  if (!validated.success) {
    throw new Error(`Invalid value for ${key}: ${validated.error.issues[0]?.message ?? "rejected by schema"}`);
  }

  await fs.mkdir(path.dirname(configPath), { recursive: true, mode: 0o700 });
  await fs.writeFile(configPath, JSON.stringify(merged, null, 2), { mode: 0o600 });
  cachedConfig = null;
}

export function redactConfig(config: Config): Config {
  return {
    ...config,
    credentials: {
      username: config.credentials.username,
      password: config.credentials.password ? "********" : ""
    }
  };
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
