import { describe, expect, it } from "vitest";
import { TimingModel } from "../src/human/timing.js";
import { randomBetween, shuffle } from "../src/utils/delay.js";

function recordingModel(random: () => number, intensity?: number) {
  const slept: number[] = [];
  const model = new TimingModel({
    random,
    intensity,
    sleep: async (ms) => {
      slept.push(ms);
    }
  });
  return { model, slept };
}

describe("TimingModel", () => {
  it("draws contextual durations from the action's range", () => {
    expect(new TimingModel({ random: () => 0 }).contextualDuration("click")).toBe(100);
    expect(new TimingModel({ random: () => 0.5 }).contextualDuration("read")).toBe(3500);
    expect(new TimingModel({ random: () => 0.5 }).contextualDuration("think", 2)).toBe(4000);
  });

  it("uses the fallback range for unknown kinds", () => {
    const model = new TimingModel({ random: () => 0 });
    expect(model.rangeFor("wander")).toEqual({ minMs: 500, maxMs: 1000 });
    expect(model.contextualDuration("wander")).toBe(500);
  });

  it("applies the global intensity on top of the call's own", () => {
    const model = new TimingModel({ random: () => 0, intensity: 2 });
    expect(model.contextualDuration("click", 1.5)).toBe(300);
  });

  it("jitters around the base and never goes negative", () => {
    expect(new TimingModel({ random: () => 0 }).jitteredDuration(100, 0.2)).toBe(80);
    expect(new TimingModel({ random: () => 1 }).jitteredDuration(100, 0.2)).toBeCloseTo(120);
    expect(new TimingModel({ random: () => 0 }).jitteredDuration(100, 2)).toBe(0);
    expect(new TimingModel({ random: () => 0 }).jitteredDuration(-50, 0.5)).toBe(0);
  });

  it("sleeps for exactly the duration it reports", async () => {
    const { model, slept } = recordingModel(() => 0.5);
    expect(await model.contextualDelay("type")).toBe(100);
    expect(await model.jitteredDelay(300, 0.3)).toBe(300);
    expect(await model.randomDelay(20_000, 60_000)).toBe(40_000);
    expect(slept).toEqual([100, 300, 40_000]);
  });

  it("rejects waits once the signal is aborted", async () => {
    const controller = new AbortController();
    const model = new TimingModel({ signal: controller.signal });
    controller.abort();
    await expect(model.pause(10)).rejects.toMatchObject({ name: "AbortError" });
  });
});

describe("delay helpers", () => {
  it("returns the lower bound for an empty range", () => {
    expect(randomBetween(7, 7, () => 0.9)).toBe(7);
    expect(randomBetween(9, 3, () => 0.9)).toBe(9);
  });

  it("shuffles without losing or mutating items", () => {
    const items = ["a", "b", "c", "d"];
    const shuffled = shuffle(items, () => 0);
    expect(shuffled).toEqual(["b", "c", "d", "a"]);
    expect(items).toEqual(["a", "b", "c", "d"]);
  });
});
