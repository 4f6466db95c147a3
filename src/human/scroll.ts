import type { BrowserControl } from "../core/control.js";
import { AutomationError } from "../core/errors.js";
import { logger } from "../utils/logger.js";
import type { RandomSource } from "../utils/delay.js";
import type { TimingModel } from "./timing.js";

const SINGLE_EVENT_THRESHOLD = 100;
const MIN_CHUNK = 100;
const MAX_CHUNK = 300;
const SUB_STEP_PX = 10;
const MIN_SUB_STEPS = 5;
const SCROLL_BACK_CHANCE = 0.1;
const SCROLL_BACK_AFTER_PX = 300;

/**
 * Splits a chunk into whole-pixel sub-steps of roughly 10px with ±20% jitter.
 * The last sub-step takes whatever is left, so the steps sum to `chunk`.
 */
export function splitChunk(chunk: number, random: RandomSource = Math.random): number[] {
  const magnitude = Math.abs(chunk);
  const sign = Math.sign(chunk);
  const count = Math.max(MIN_SUB_STEPS, Math.floor(magnitude / SUB_STEP_PX));
  const base = magnitude / count;

  const steps: number[] = [];
  let left = magnitude;
  for (let i = 0; i < count && left > 0; i += 1) {
    const jittered = Math.max(1, Math.round(base * (0.8 + random() * 0.4)));
    const size = i === count - 1 || jittered >= left ? left : jittered;
    steps.push(size * sign);
    left -= size;
  }
  return steps;
}

/**
 * Humanized wheel scrolling: flicks of 100–300px made of small jittered
 * steps, pauses between flicks, and the occasional scroll-back to re-read.
 */
export class ScrollSynthesizer {
  constructor(
    private readonly control: BrowserControl,
    private readonly timing: TimingModel,
    private readonly random: RandomSource = Math.random
  ) {}

  async scrollBy(deltaY: number): Promise<void> {
    if (!Number.isFinite(deltaY)) {
      throw new AutomationError(`scroll delta must be a finite number, got ${deltaY}`);
    }
    if (Math.abs(deltaY) < SINGLE_EVENT_THRESHOLD) {
      await this.control.scroll(0, deltaY);
      return;
    }

    const direction = Math.sign(deltaY);
    let remaining = deltaY;
    let scrolled = 0;

    while (remaining !== 0) {
      let chunk = Math.round(MIN_CHUNK + this.random() * (MAX_CHUNK - MIN_CHUNK)) * direction;
      if (Math.abs(chunk) >= Math.abs(remaining)) {
        chunk = remaining;
      }

      for (const step of splitChunk(chunk, this.random)) {
        await this.control.scroll(0, step);
        await this.timing.jitteredDelay(10, 0.5);
      }

      remaining -= chunk;
      scrolled += chunk;

      if (this.random() < SCROLL_BACK_CHANCE && Math.abs(scrolled) > SCROLL_BACK_AFTER_PX) {
        const back = -Math.round(chunk * 0.5);
        logger.debug("Scrolling back slightly before continuing", { px: back });
        await this.control.scroll(0, back);
        await this.timing.contextualDelay("read", 0.5);
        await this.control.scroll(0, -back);
        await this.timing.jitteredDelay(200, 0.2);
      }

      await this.timing.jitteredDelay(150, 0.4);
    }
  }
}
