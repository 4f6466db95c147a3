import { logger } from "../utils/logger.js";
import { errorMessage, isAbortError } from "./errors.js";
import type { PageElement } from "./control.js";
import { ANY_ANCHOR, NEXT_PAGE, PROFILE_LINK } from "./selectors.js";
import type { Session } from "./session.js";
import { normalizeProfileHref, PEOPLE_SEARCH_URL } from "./urls.js";

export interface SearchCriteria {
  keywords?: string;
  title?: string;
  company?: string;
  location?: string;
}

const LAZY_LOAD_BURSTS = 8;
const BURST_PX = 400;
const RESULTS_WAIT_MS = 30_000;

export function buildSearchUrl(criteria: SearchCriteria): string {
  const parts = [criteria.keywords, criteria.title, criteria.company, criteria.location]
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0);
  return `${PEOPLE_SEARCH_URL}?keywords=${encodeURIComponent(parts.join(" "))}`;
}

/** Profile URLs among `hrefs` not yet in `seen`, in page order. Adds them to `seen`. */
export function collectProfileUrls(hrefs: readonly (string | null)[], seen: Set<string>): string[] {
  const fresh: string[] = [];
  for (const href of hrefs) {
    const url = href ? normalizeProfileHref(href) : null;
    if (url && !seen.has(url)) {
      seen.add(url);
      fresh.push(url);
    }
  }
  return fresh;
}

export class SearchService {
  constructor(private readonly session: Session) {}

  async searchPeople(criteria: SearchCriteria, maxPages = 1): Promise<string[]> {
    const { control, timing } = this.session;
    const url = buildSearchUrl(criteria);
    await this.session.navigate(url);

    try {
      await control.waitForCountAtLeast(PROFILE_LINK, 2, RESULTS_WAIT_MS, this.session.signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.warn("Search results did not load in time, continuing", { url, error: errorMessage(error) });
      await this.session.captureScreenshot("search_warning.png");
    }

    const seen = new Set<string>();
    const results: string[] = [];
    for (let page = 1; page <= maxPages; page += 1) {
      for (let burst = 0; burst < LAZY_LOAD_BURSTS; burst += 1) {
        await this.session.scroller.scrollBy(BURST_PX);
        await timing.randomDelay(500, 1500);
      }

      const anchors = await control.findElements(ANY_ANCHOR);
      const hrefs = await Promise.all(anchors.map((anchor) => anchor.attribute("href")));
      const fresh = collectProfileUrls(hrefs, seen);
      results.push(...fresh);
      logger.info("Collected profiles from results page", { page, found: fresh.length, total: results.length });

      if (page === maxPages) {
        break;
      }
      const next = await this.nextPageButton();
      if (!next) {
        logger.debug("No further result pages", { page });
        break;
      }
      await this.session.click(next);
      await timing.contextualDelay("think", 1.0);
      await timing.contextualDelay("read", 1.5);
    }

    return results;
  }

  private async nextPageButton(): Promise<PageElement | null> {
    const next = await this.session.control.findElement(NEXT_PAGE);
    if (!next || !(await next.isVisible())) {
      return null;
    }
    return (await next.attribute("disabled")) === null ? next : null;
  }
}
