import { logger } from "../utils/logger.js";
import { describeSelector, type BrowserControl, type PageElement, type Selector } from "./control.js";
import { ElementNotFoundError, errorMessage } from "./errors.js";

/** One candidate query for an element that serves a known purpose. */
export interface Probe {
  name: string;
  selector: Selector;
  /** How long to wait for the element to attach before calling it missing. */
  timeoutMs?: number;
}

export type ProbeResult =
  | { status: "visible"; probe: Probe; element: PageElement }
  | { status: "hidden"; probe: Probe; element: PageElement }
  | { status: "missing"; probe: Probe };

export type VisibleMatch = Extract<ProbeResult, { status: "visible" }>;

export interface Resolution {
  match: VisibleMatch | null;
  tried: ProbeResult[];
}

export async function runProbe(control: BrowserControl, probe: Probe): Promise<ProbeResult> {
  const element = await control.findElement(probe.selector, probe.timeoutMs);
  if (!element) {
    return { status: "missing", probe };
  }

  try {
    return (await element.isVisible()) ? { status: "visible", probe, element } : { status: "hidden", probe, element };
  } catch (error) {
    logger.debug("Probe element detached during visibility check", {
      probe: probe.name,
      error: errorMessage(error)
    });
    return { status: "missing", probe };
  }
}

/**
 * Evaluates probes in priority order and stops at the first visible element.
 * Misses are expected and never raised here.
 */
export async function resolveFirstVisible(control: BrowserControl, probes: readonly Probe[]): Promise<Resolution> {
  const tried: ProbeResult[] = [];
  for (const probe of probes) {
    const result = await runProbe(control, probe);
    tried.push(result);
    if (result.status === "visible") {
      logger.debug("Probe matched", { probe: probe.name, selector: describeSelector(probe.selector) });
      return { match: result, tried };
    }
  }
  return { match: null, tried };
}

export function triedNames(tried: readonly ProbeResult[]): string[] {
  return tried.map((result) => `${result.probe.name}:${result.status}`);
}

/** Like {@link resolveFirstVisible}, but exhaustion is an error naming every probe. */
export async function requireVisible(
  control: BrowserControl,
  goal: string,
  probes: readonly Probe[]
): Promise<PageElement> {
  const { match, tried } = await resolveFirstVisible(control, probes);
  if (!match) {
    const names = triedNames(tried);
    logger.warn(`${goal} not found`, { tried: names.join(","), url: control.currentUrl() });
    throw new ElementNotFoundError(goal, names);
  }
  return match.element;
}
