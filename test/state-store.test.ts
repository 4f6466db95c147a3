import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonStateStore } from "../src/core/state.js";

const PROFILE = "https://www.linkedin.com/in/test-person";
const fixedNow = () => new Date("2026-01-05T10:00:00.000Z");

describe("JsonStateStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "outreach-state-"));
    file = path.join(dir, "nested", "state.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = await JsonStateStore.open(file, fixedNow);
    expect(store.isMarked(PROFILE, "requestSent")).toBe(false);
    expect(store.markedUrls("messaged")).toEqual([]);
  });

  it("persists marks per kind with timestamps", async () => {
    const store = await JsonStateStore.open(file, fixedNow);
    await store.mark(PROFILE, "requestSent");

    expect(store.isMarked(PROFILE, "requestSent")).toBe(true);
    expect(store.isMarked(PROFILE, "messaged")).toBe(false);

    const written: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(written).toEqual({
      requests: { [PROFILE]: "2026-01-05T10:00:00.000Z" },
      messages: {},
      connections: {}
    });

    const reopened = await JsonStateStore.open(file, fixedNow);
    expect(reopened.isMarked(PROFILE, "requestSent")).toBe(true);
  });

  it("treats marking the same profile twice as one mark", async () => {
    const times = ["2026-01-05T10:00:00.000Z", "2026-01-06T09:30:00.000Z"];
    let call = 0;
    const store = await JsonStateStore.open(file, () => new Date(times[Math.min(call++, 1)]));
    await store.mark(PROFILE, "messaged");
    await store.mark(PROFILE, "messaged");

    expect(store.isMarked(PROFILE, "messaged")).toBe(true);
    expect(store.markedUrls("messaged")).toEqual([PROFILE]);

    const reopened = await JsonStateStore.open(file, fixedNow);
    expect(reopened.isMarked(PROFILE, "messaged")).toBe(true);
    expect(reopened.markedUrls("messaged")).toEqual([PROFILE]);
    expect(reopened.isMarked(PROFILE, "requestSent")).toBe(false);
    const written: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(written).toEqual({ requests: {}, messages: { [PROFILE]: "2026-01-06T09:30:00.000Z" }, connections: {} });
  });

  it("keeps every mark when writes overlap", async () => {
    const store = await JsonStateStore.open(file, fixedNow);
    await Promise.all([
      store.mark(`${PROFILE}-1`, "connected"),
      store.mark(`${PROFILE}-2`, "connected"),
      store.mark(`${PROFILE}-1`, "messaged")
    ]);
    await store.close();

    const reopened = await JsonStateStore.open(file, fixedNow);
    expect(reopened.markedUrls("connected")).toEqual([`${PROFILE}-1`, `${PROFILE}-2`]);
    expect(reopened.isMarked(`${PROFILE}-1`, "messaged")).toBe(true);
  });

  it("rejects a file that is not valid JSON", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "{not json");
    await expect(JsonStateStore.open(file)).rejects.toThrowError(`State file contains invalid JSON: ${file}`);
  });

  it("rejects a file with the wrong shape", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ requests: ["not", "a", "map"] }));
    await expect(JsonStateStore.open(file)).rejects.toThrowError(
      `State file is corrupted or in an unexpected format: ${file}`
    );
  });

  it("fills in sections missing from older files", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ requests: { [PROFILE]: "2025-12-01T00:00:00.000Z" } }));
    const store = await JsonStateStore.open(file);
    expect(store.isMarked(PROFILE, "requestSent")).toBe(true);
    expect(store.isMarked(PROFILE, "connected")).toBe(false);
  });
});
