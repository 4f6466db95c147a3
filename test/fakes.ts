import type { Box, BrowserControl, MouseButton, PageElement, Selector } from "../src/core/control.js";
import { Session, type SessionOptions } from "../src/core/session.js";

export type FakeEvent =
  | { type: "navigate"; url: string }
  | { type: "move"; x: number; y: number }
  | { type: "click"; target: string | null }
  | { type: "insert"; text: string }
  | { type: "press"; key: string }
  | { type: "scroll"; dx: number; dy: number }
  | { type: "screenshot"; path: string };

export interface FakeElementInit {
  visible?: boolean;
  text?: string;
  attributes?: Record<string, string>;
  box?: Box | null;
  onClick?: () => void;
}

export class FakeElement implements PageElement {
  visible: boolean;
  readonly textContent: string;
  readonly attributes: Record<string, string>;
  readonly box: Box | null;
  onClick?: () => void;
  focused = false;

  constructor(
    readonly name: string,
    private readonly control: FakeControl,
    init: FakeElementInit = {}
  ) {
    this.visible = init.visible ?? true;
    this.textContent = init.text ?? "";
    this.attributes = init.attributes ?? {};
    this.box = init.box === undefined ? { x: 100, y: 100, width: 80, height: 30 } : init.box;
    this.onClick = init.onClick;
  }

  async isVisible(): Promise<boolean> {
    return this.visible;
  }

  async text(): Promise<string> {
    return this.textContent;
  }

  async attribute(name: string): Promise<string | null> {
    return Object.prototype.hasOwnProperty.call(this.attributes, name) ? this.attributes[name] ?? null : null;
  }

  async boundingBox(): Promise<Box | null> {
    this.control.hovered = this;
    return this.box;
  }

  async focus(): Promise<void> {
    this.focused = true;
  }

  async click(): Promise<void> {
    this.control.events.push({ type: "click", target: this.name });
    this.onClick?.();
  }
}

/**
 * In-memory page: elements registered per selector query, every input
 * recorded as an event. A pointer click lands on the element whose box was
 * read last, which is what the pointer synthesizer moved to.
 */
export class FakeControl implements BrowserControl {
  readonly events: FakeEvent[] = [];
  private readonly elements = new Map<string, FakeElement[]>();
  hovered: FakeElement | null = null;
  url = "about:blank";
  pageTitle = "";
  body = "";
  navigateFailures = 0;
  onNavigate?: (url: string) => void;

  add(selector: Selector, name: string, init: FakeElementInit = {}): FakeElement {
    const element = new FakeElement(name, this, init);
    const list = this.elements.get(selector.query) ?? [];
    list.push(element);
    this.elements.set(selector.query, list);
    return element;
  }

  remove(selector: Selector): void {
    this.elements.delete(selector.query);
  }

  clicked(): string[] {
    return this.events.flatMap((event) => (event.type === "click" && event.target ? [event.target] : []));
  }

  typed(): string {
    return this.events.map((event) => (event.type === "insert" ? event.text : "")).join("");
  }

  navigations(): string[] {
    return this.events.flatMap((event) => (event.type === "navigate" ? [event.url] : []));
  }

  async navigate(url: string): Promise<void> {
    if (this.navigateFailures > 0) {
      this.navigateFailures -= 1;
      throw new Error("net::ERR_CONNECTION_RESET");
    }
    this.events.push({ type: "navigate", url });
    this.url = url;
    this.onNavigate?.(url);
  }

  currentUrl(): string {
    return this.url;
  }

  async title(): Promise<string> {
    return this.pageTitle;
  }

  async bodyText(): Promise<string> {
    return this.body;
  }

  async findElement(selector: Selector): Promise<PageElement | null> {
    return this.elements.get(selector.query)?.[0] ?? null;
  }

  async findElements(selector: Selector): Promise<PageElement[]> {
    return [...(this.elements.get(selector.query) ?? [])];
  }

  async insertText(text: string): Promise<void> {
    this.events.push({ type: "insert", text });
  }

  async pointerMove(x: number, y: number): Promise<void> {
    this.events.push({ type: "move", x, y });
  }

  async click(_button?: MouseButton): Promise<void> {
    const target = this.hovered;
    this.events.push({ type: "click", target: target ? target.name : null });
    target?.onClick?.();
  }

  async scroll(dx: number, dy: number): Promise<void> {
    this.events.push({ type: "scroll", dx, dy });
  }

  async press(key: string): Promise<void> {
    this.events.push({ type: "press", key });
  }

  async waitForCountAtLeast(selector: Selector, count: number, _timeoutMs: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const found = this.elements.get(selector.query)?.length ?? 0;
    if (found < count) {
      throw new Error(`only ${found} matches`);
    }
  }

  async screenshot(filePath: string): Promise<void> {
    this.events.push({ type: "screenshot", path: filePath });
  }
}

export const noSleep = async (): Promise<void> => {};

/** Session with a fixed 0.5 random source: no typos, no idle hovers, no scroll-backs. */
export function fakeSession(control: FakeControl, options: SessionOptions = {}): Session {
  return new Session(control, { random: () => 0.5, sleep: noSleep, ...options });
}
