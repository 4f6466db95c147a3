import type { Locator, Page } from "playwright-core";
import { pollUntil } from "../utils/retry.js";

export interface Point {
  x: number;
  y: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type SelectorDialect = "css" | "xpath";

/**
 * A query in one of the two dialects the action layer needs. XPath carries the
 * text-content and attribute-substring predicates plain CSS cannot express.
 */
export interface Selector {
  dialect: SelectorDialect;
  query: string;
}

export function css(query: string): Selector {
  return { dialect: "css", query };
}

export function xpath(query: string): Selector {
  return { dialect: "xpath", query };
}

export function describeSelector(selector: Selector): string {
  return `${selector.dialect}=${selector.query}`;
}

export type MouseButton = "left" | "right" | "middle";

export interface PageElement {
  isVisible(): Promise<boolean>;
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** Null when the element is detached or not rendered. */
  boundingBox(): Promise<Box | null>;
  focus(): Promise<void>;
  /** Non-humanized click, used when a synthesized move is impossible. */
  click(): Promise<void>;
}

/**
 * The browser capability the core drives. Navigation, element queries and
 * synthetic input; nothing here knows about humanization.
 */
export interface BrowserControl {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  title(): Promise<string>;
  bodyText(): Promise<string>;
  /** Resolves to null instead of throwing when nothing matches within `timeoutMs`. */
  findElement(selector: Selector, timeoutMs?: number): Promise<PageElement | null>;
  findElements(selector: Selector): Promise<PageElement[]>;
  insertText(text: string): Promise<void>;
  pointerMove(x: number, y: number): Promise<void>;
  click(button?: MouseButton): Promise<void>;
  scroll(deltaX: number, deltaY: number): Promise<void>;
  press(key: string): Promise<void>;
  /** Rejects on timeout, or with the abort reason once `signal` fires. */
  waitForCountAtLeast(selector: Selector, count: number, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  screenshot(filePath: string): Promise<void>;
}

function toEngineSelector(selector: Selector): string {
  return `${selector.dialect}=${selector.query}`;
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async text(): Promise<string> {
    return (await this.locator.innerText()).trim();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name);
  }

  boundingBox(): Promise<Box | null> {
    return this.locator.boundingBox();
  }

  focus(): Promise<void> {
    return this.locator.focus();
  }

  click(): Promise<void> {
    return this.locator.click();
  }
}

const POLL_INTERVAL_MS = 250;

export class PlaywrightControl implements BrowserControl {
  constructor(readonly page: Page) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  currentUrl(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async bodyText(): Promise<string> {
    return this.page.locator("body").innerText();
  }

  async findElement(selector: Selector, timeoutMs?: number): Promise<PageElement | null> {
    const locator = this.page.locator(toEngineSelector(selector)).first();
    if (timeoutMs !== undefined && timeoutMs > 0) {
      const attached = await locator
        .waitFor({ state: "attached", timeout: timeoutMs })
        .then(() => true)
        .catch(() => false);
      return attached ? new PlaywrightElement(locator) : null;
    }
    return (await locator.count()) > 0 ? new PlaywrightElement(locator) : null;
  }

  async findElements(selector: Selector): Promise<PageElement[]> {
    const locators = await this.page.locator(toEngineSelector(selector)).all();
    return locators.map((locator) => new PlaywrightElement(locator));
  }

  insertText(text: string): Promise<void> {
    return this.page.keyboard.insertText(text);
  }

  pointerMove(x: number, y: number): Promise<void> {
    return this.page.mouse.move(x, y);
  }

  async click(button: MouseButton = "left"): Promise<void> {
    await this.page.mouse.down({ button });
    await this.page.mouse.up({ button });
  }

  scroll(deltaX: number, deltaY: number): Promise<void> {
    return this.page.mouse.wheel(deltaX, deltaY);
  }

  press(key: string): Promise<void> {
    return this.page.keyboard.press(key);
  }

  async waitForCountAtLeast(selector: Selector, count: number, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const locator = this.page.locator(toEngineSelector(selector));
    const found = await pollUntil(async () => (await locator.count()) >= count, timeoutMs, POLL_INTERVAL_MS, { signal });
    if (!found) {
      throw new Error(`timed out waiting for ${count} matches of ${describeSelector(selector)}`);
    }
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }
}
