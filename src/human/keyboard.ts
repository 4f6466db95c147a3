import { AutomationError } from "../core/errors.js";
import type { BrowserControl, PageElement } from "../core/control.js";
import type { RandomSource } from "../utils/delay.js";
import type { TimingModel } from "./timing.js";

const TYPO_POOL = "abcdefghijklmnopqrstuvwxyz0123456789";

export const DEFAULT_TYPO_RATE = 0.05;

export function pickWrongChar(intended: string, random: RandomSource = Math.random): string {
  for (;;) {
    const candidate = TYPO_POOL[Math.floor(random() * TYPO_POOL.length)] ?? "x";
    if (candidate !== intended) {
      return candidate;
    }
  }
}

/**
 * Character-by-character typing with per-key delays, longer gaps between
 * words and an occasional typo that gets noticed and corrected.
 *
 * Not atomic: if an insert fails midway, the text already entered stays.
 */
export class KeystrokeSynthesizer {
  constructor(
    private readonly control: BrowserControl,
    private readonly timing: TimingModel,
    private readonly random: RandomSource = Math.random,
    private readonly typoRate: number = DEFAULT_TYPO_RATE
  ) {}

  async typeText(element: PageElement, text: string): Promise<void> {
    try {
      await element.focus();
    } catch (error) {
      throw new AutomationError("could not focus element for typing", { cause: error });
    }

    for (const char of Array.from(text)) {
      if (this.random() < this.typoRate) {
        await this.control.insertText(pickWrongChar(char, this.random));
        await this.timing.jitteredDelay(300, 0.3);
        await this.control.press("Backspace");
        await this.timing.jitteredDelay(150, 0.2);
      }

      await this.control.insertText(char);
      await this.timing.contextualDelay("type");

      if (char === " ") {
        await this.timing.jitteredDelay(100, 0.2);
      }
    }
  }
}
