import { describe, expect, it } from "vitest";
import { PolicyWallError } from "../src/core/errors.js";
import type { Probe } from "../src/core/probe.js";
import {
  ANY_ANCHOR,
  CONNECTION_CARD_LINK,
  DIRECT_CONNECT,
  MESSAGE_BUTTON,
  MESSAGE_INPUT,
  MESSAGE_SEND,
  PROFILE_LINK,
  PROFILE_MAIN,
  SEND_INVITATION
} from "../src/core/selectors.js";
import { isBusinessHours, runConnectWorkflow, runFollowUpWorkflow, selectCandidates } from "../src/core/workflow.js";
import { FakeControl, fakeSession } from "./fakes.js";
import { MemoryStore } from "./memory-store.js";

const A = "https://www.linkedin.com/in/ann/";
const B = "https://www.linkedin.com/in/bo/";
const C = "https://www.linkedin.com/in/cy/";
const MONDAY_NOON = new Date(2026, 0, 5, 12, 0);

function first(probes: readonly Probe[]) {
  const probe = probes[0];
  if (!probe) {
    throw new Error("empty probe list");
  }
  return probe.selector;
}

/** Search results listing ann, bo and cy; every profile offers a direct Connect. */
function outreachSite(): FakeControl {
  const control = new FakeControl();
  for (const url of [A, B, C]) {
    control.add(ANY_ANCHOR, url, { attributes: { href: url } });
    control.add(PROFILE_LINK, url, { attributes: { href: url } });
  }
  control.add(PROFILE_MAIN, "main");
  control.add(first(DIRECT_CONNECT), "connect");
  control.add(first(SEND_INVITATION), "send");
  return control;
}

describe("workflow helpers", () => {
  it("knows business hours", () => {
    expect(isBusinessHours(new Date(2026, 0, 5, 9, 0))).toBe(true);
    expect(isBusinessHours(new Date(2026, 0, 5, 17, 59))).toBe(true);
    expect(isBusinessHours(new Date(2026, 0, 5, 18, 0))).toBe(false);
    expect(isBusinessHours(new Date(2026, 0, 5, 8, 59))).toBe(false);
  });

  it("drops processed profiles and shuffles the rest", async () => {
    const store = new MemoryStore();
    await store.mark(B, "requestSent");
    await store.mark(C, "connected");
    const D = "https://www.linkedin.com/in/di/";

    expect(selectCandidates([A, B, C, D], store, () => 0)).toEqual([D, A]);
  });
});

describe("runConnectWorkflow", () => {
  it("sends to unprocessed candidates up to the run maximum", async () => {
    const control = outreachSite();
    const store = new MemoryStore();
    await store.mark(B, "requestSent");
    const slept: number[] = [];
    const session = fakeSession(control, {
      sleep: async (ms) => {
        slept.push(ms);
      }
    });

    const results = await runConnectWorkflow(session, store, {
      criteria: { keywords: "founder" },
      max: 5,
      now: MONDAY_NOON
    });

    expect(results).toEqual([
      { url: A, outcome: { kind: "sent", withNote: false } },
      { url: C, outcome: { kind: "sent", withNote: false } }
    ]);
    expect(store.isMarked(A, "requestSent")).toBe(true);
    expect(store.isMarked(C, "requestSent")).toBe(true);
    expect(session.counters.connections.sent).toBe(2);
    expect(slept).toContain(40_000);
  });

  it("attempts one profile by default", async () => {
    const results = await runConnectWorkflow(fakeSession(outreachSite()), new MemoryStore(), {
      criteria: { keywords: "founder" },
      now: MONDAY_NOON
    });
    expect(results.map((result) => result.url)).toEqual([A]);
  });

  it("keeps a sent request in the results when it cannot be recorded", async () => {
    class ReadOnlyStore extends MemoryStore {
      override async mark(): Promise<void> {
        throw new Error("disk full");
      }
    }
    const session = fakeSession(outreachSite());

    const results = await runConnectWorkflow(session, new ReadOnlyStore(), {
      criteria: { keywords: "founder" },
      now: MONDAY_NOON
    });

    expect(results).toEqual([{ url: A, outcome: { kind: "sent", withNote: false } }]);
    expect(session.counters.connections.sent).toBe(1);
  });

  it("logs a failing profile and moves on", async () => {
    const control = outreachSite();
    control.onNavigate = (url) => {
      control.remove(PROFILE_MAIN);
      if (url !== A) {
        control.add(PROFILE_MAIN, "main");
      }
    };
    const store = new MemoryStore();

    const results = await runConnectWorkflow(fakeSession(control), store, {
      criteria: { keywords: "founder" },
      max: 2,
      now: MONDAY_NOON
    });

    expect(results).toEqual([
      { url: A, error: "profile page not found (tried: main:missing)" },
      { url: C, outcome: { kind: "sent", withNote: false } }
    ]);
    expect(store.isMarked(A, "requestSent")).toBe(false);
  });

  it("stops the whole run at a policy wall", async () => {
    const control = outreachSite();
    control.remove(first(DIRECT_CONNECT));
    control.add(first(DIRECT_CONNECT), "connect", {
      onClick: () => {
        control.body = "You have reached the weekly limit";
      }
    });
    const store = new MemoryStore();

    await expect(
      runConnectWorkflow(fakeSession(control), store, { criteria: { keywords: "founder" }, max: 3, now: MONDAY_NOON })
    ).rejects.toBeInstanceOf(PolicyWallError);
    expect(store.marks).toEqual([]);
  });

  it("stops when the daily limit runs out", async () => {
    const session = fakeSession(outreachSite(), { limits: { connections: 1, messages: 20 } });
    const results = await runConnectWorkflow(session, new MemoryStore(), {
      criteria: { keywords: "founder" },
      max: 3,
      now: MONDAY_NOON
    });
    expect(results).toHaveLength(1);
  });
});

describe("runFollowUpWorkflow", () => {
  function connectionsSite(): FakeControl {
    const control = new FakeControl();
    control.add(CONNECTION_CARD_LINK, "card-ann", { attributes: { href: "/in/ann/" } });
    control.add(CONNECTION_CARD_LINK, "card-bo", { attributes: { href: "/in/bo/" } });
    control.add(first(MESSAGE_BUTTON), "message");
    control.add(first(MESSAGE_INPUT), "input");
    control.add(first(MESSAGE_SEND), "send");
    return control;
  }

  it("messages connections that have not been messaged yet", async () => {
    const store = new MemoryStore();
    await store.mark(B, "messaged");

    const results = await runFollowUpWorkflow(fakeSession(connectionsSite()), store, {
      template: "Thanks {{firstname}}!",
      now: MONDAY_NOON
    });

    expect(results).toEqual([{ url: A, outcome: { kind: "sent" } }]);
    expect(store.isMarked(A, "messaged")).toBe(true);
    expect(store.isMarked(A, "connected")).toBe(true);
  });

  it("sends nothing once the message limit is used up", async () => {
    const session = fakeSession(connectionsSite(), { limits: { connections: 20, messages: 0 } });
    const results = await runFollowUpWorkflow(session, new MemoryStore(), { now: MONDAY_NOON });
    expect(results).toEqual([]);
  });
});
