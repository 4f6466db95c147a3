import { randomBetween, sleep as defaultSleep, type RandomSource, type Sleeper } from "../utils/delay.js";

export type ActionKind = "click" | "type" | "read" | "scroll" | "think";

export interface DurationRange {
  minMs: number;
  maxMs: number;
}

export type TimingProfile = Readonly<Record<ActionKind, Readonly<DurationRange>>>;

export const DEFAULT_TIMING_PROFILE: TimingProfile = Object.freeze({
  click: { minMs: 100, maxMs: 300 },
  type: { minMs: 50, maxMs: 150 },
  read: { minMs: 2000, maxMs: 5000 },
  scroll: { minMs: 500, maxMs: 1500 },
  think: { minMs: 1000, maxMs: 3000 }
});

const FALLBACK_RANGE: DurationRange = { minMs: 500, maxMs: 1000 };

export interface TimingOptions {
  profile?: TimingProfile;
  random?: RandomSource;
  sleep?: Sleeper;
  signal?: AbortSignal;
  /** Global multiplier applied on top of each call's own intensity. */
  intensity?: number;
}

function isActionKind(kind: string, profile: TimingProfile): kind is ActionKind {
  return Object.prototype.hasOwnProperty.call(profile, kind);
}

/**
 * Randomized, context-aware waits. Every wait suspends only the caller and
 * rejects as soon as the session's signal aborts.
 */
export class TimingModel {
  private readonly profile: TimingProfile;
  private readonly random: RandomSource;
  private readonly sleeper: Sleeper;
  private readonly signal?: AbortSignal;
  private readonly intensity: number;

  constructor(options: TimingOptions = {}) {
    this.profile = options.profile ?? DEFAULT_TIMING_PROFILE;
    this.random = options.random ?? Math.random;
    this.sleeper = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.intensity = options.intensity ?? 1;
  }

  rangeFor(kind: string): DurationRange {
    return isActionKind(kind, this.profile) ? this.profile[kind] : FALLBACK_RANGE;
  }

  contextualDuration(kind: ActionKind | string, intensity = 1): number {
    const range = this.rangeFor(kind);
    const factor = intensity * this.intensity;
    return randomBetween(range.minMs * factor, range.maxMs * factor, this.random);
  }

  /** Uniform in `[base*(1-d), base*(1+d)]`, never negative. */
  jitteredDuration(baseMs: number, deviation: number): number {
    const d = Math.max(0, deviation);
    const min = Math.max(0, baseMs * (1 - d));
    const max = Math.max(0, baseMs * (1 + d));
    return randomBetween(min, max, this.random);
  }

  async contextualDelay(kind: ActionKind | string, intensity = 1): Promise<number> {
    return this.pause(this.contextualDuration(kind, intensity));
  }

  async jitteredDelay(baseMs: number, deviation: number): Promise<number> {
    return this.pause(this.jitteredDuration(baseMs, deviation));
  }

  async randomDelay(minMs: number, maxMs: number): Promise<number> {
    return this.pause(randomBetween(minMs, maxMs, this.random));
  }

  async pause(ms: number): Promise<number> {
    await this.sleeper(ms, this.signal);
    return ms;
  }
}
