import path from "node:path";
import { KeystrokeSynthesizer, DEFAULT_TYPO_RATE } from "../human/keyboard.js";
import { PointerSynthesizer } from "../human/pointer.js";
import { ScrollSynthesizer } from "../human/scroll.js";
import { TimingModel, type TimingProfile } from "../human/timing.js";
import type { RandomSource, Sleeper } from "../utils/delay.js";
import { logger } from "../utils/logger.js";
import { withBackoff } from "../utils/retry.js";
import type { BrowserControl, PageElement } from "./control.js";
import { errorMessage, isAbortError, PreconditionError } from "./errors.js";
import { IDLE_HOVER_TARGET } from "./selectors.js";

const NAV_RETRIES = 3;
const NAV_INITIAL_DELAY_MS = 2000;
const NAV_MAX_DELAY_MS = 10_000;
const IDLE_HOVER_CHANCE = 0.3;

/**
 * In-memory send counter for one run. Resets only with a new session.
 */
export class DailyCounter {
  private sentCount = 0;

  constructor(
    readonly label: string,
    readonly limit: number
  ) {}

  get sent(): number {
    return this.sentCount;
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.sentCount);
  }

  canSend(): boolean {
    return this.sentCount < this.limit;
  }

  assertAvailable(): void {
    if (!this.canSend()) {
      throw new PreconditionError(`daily ${this.label} limit reached (${this.limit})`);
    }
  }

  record(): number {
    this.sentCount += 1;
    return this.sentCount;
  }
}

export interface SessionOptions {
  random?: RandomSource;
  sleep?: Sleeper;
  signal?: AbortSignal;
  profile?: TimingProfile;
  typoRate?: number;
  intensity?: number;
  limits?: { connections: number; messages: number };
  screenshotDir?: string;
}

/**
 * Everything one browser page needs to act like a single person: its
 * synthesizers, tracked pointer position and daily counters. Sessions share
 * nothing with each other.
 */
export class Session {
  readonly timing: TimingModel;
  readonly pointer: PointerSynthesizer;
  readonly scroller: ScrollSynthesizer;
  readonly keyboard: KeystrokeSynthesizer;
  readonly counters: { connections: DailyCounter; messages: DailyCounter };
  readonly random: RandomSource;
  readonly signal?: AbortSignal;
  private readonly screenshotDir: string;

  constructor(
    readonly control: BrowserControl,
    options: SessionOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.signal = options.signal;
    this.timing = new TimingModel({
      profile: options.profile,
      random: this.random,
      sleep: options.sleep,
      signal: options.signal,
      intensity: options.intensity
    });
    this.pointer = new PointerSynthesizer(control, this.timing, this.random);
    this.scroller = new ScrollSynthesizer(control, this.timing, this.random);
    this.keyboard = new KeystrokeSynthesizer(control, this.timing, this.random, options.typoRate ?? DEFAULT_TYPO_RATE);
    this.counters = {
      connections: new DailyCounter("connection", options.limits?.connections ?? 20),
      messages: new DailyCounter("message", options.limits?.messages ?? 20)
    };
    this.screenshotDir = options.screenshotDir ?? ".";
  }

  async navigate(url: string): Promise<void> {
    logger.info("Navigating", { url });
    await withBackoff(() => this.control.navigate(url), NAV_RETRIES, NAV_INITIAL_DELAY_MS, NAV_MAX_DELAY_MS, {
      sleep: async (ms) => {
        await this.timing.pause(ms);
      },
      signal: this.signal,
      label: `navigation to ${url}`
    });
  }

  /**
   * Humanized move and click; falls back to a direct element click when the
   * element has no box to move to.
   */
  async click(element: PageElement): Promise<void> {
    try {
      await this.pointer.moveTo(element);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.debug("Humanized move failed, clicking directly", { error: errorMessage(error) });
      await element.click();
      return;
    }
    await this.timing.randomDelay(50, 150);
    await this.control.click("left");
  }

  async typeInto(element: PageElement, text: string): Promise<void> {
    await this.click(element);
    await this.keyboard.typeText(element, text);
  }

  /** Occasionally drifts the pointer onto a harmless element between steps. */
  async idleHover(): Promise<void> {
    if (this.random() >= IDLE_HOVER_CHANCE) {
      return;
    }
    const target = await this.control.findElement(IDLE_HOVER_TARGET);
    if (!target) {
      return;
    }
    try {
      await this.pointer.moveTo(target);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.debug("Idle hover skipped", { error: errorMessage(error) });
    }
  }

  async captureScreenshot(fileName: string): Promise<string | null> {
    const filePath = path.join(this.screenshotDir, fileName);
    try {
      await this.control.screenshot(filePath);
      logger.info("Saved diagnostic screenshot", { path: filePath });
      return filePath;
    } catch (error) {
      logger.warn("Could not capture screenshot", { path: filePath, error: errorMessage(error) });
      return null;
    }
  }
}
