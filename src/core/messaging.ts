import { applyTemplate, firstNameOf } from "../utils/format.js";
import { logger } from "../utils/logger.js";
import { requireVisible } from "./probe.js";
import { CONNECTION_CARD_LINK, MESSAGE_BUTTON, MESSAGE_INPUT, MESSAGE_SEND, PROFILE_HEADING } from "./selectors.js";
import type { Session } from "./session.js";
import type { UrlStateStore } from "./state.js";
import { CONNECTIONS_URL, normalizeProfileHref } from "./urls.js";

export type FollowUpOutcome = { kind: "sent" } | { kind: "skipped"; reason: "already-messaged" };

export const DEFAULT_FOLLOW_UP_TEMPLATE = "Hi {{firstname}}, thanks for connecting! Great to have you in my network.";

export class MessagingService {
  constructor(
    private readonly session: Session,
    private readonly store: UrlStateStore
  ) {}

  /**
   * Sends a templated message to a 1st-degree connection. Recorded as
   * messaged once the send control is clicked; delivery is not confirmed.
   */
  async sendFollowUp(profileUrl: string, template: string = DEFAULT_FOLLOW_UP_TEMPLATE): Promise<FollowUpOutcome> {
    if (this.store.isMarked(profileUrl, "messaged")) {
      logger.debug("Already messaged, skipping", { url: profileUrl });
      return { kind: "skipped", reason: "already-messaged" };
    }

    const counter = this.session.counters.messages;
    counter.assertAvailable();

    const { control, timing } = this.session;
    await this.session.navigate(profileUrl);
    await timing.contextualDelay("read", 1.0);

    const messageButton = await requireVisible(control, "message button", MESSAGE_BUTTON);
    await this.session.click(messageButton);
    await timing.contextualDelay("think", 1.0);

    const input = await requireVisible(control, "message input", MESSAGE_INPUT);
    const heading = await control.findElement(PROFILE_HEADING);
    const fullName = heading ? await heading.text() : "";
    const firstName = firstNameOf(fullName);
    const text = applyTemplate(template, { name: fullName || firstName, firstname: firstName });
    await this.session.typeInto(input, text);

    const send = await requireVisible(control, "message send button", MESSAGE_SEND);
    await timing.contextualDelay("think", 0.5);
    await this.session.click(send);

    await this.store.mark(profileUrl, "messaged");
    const total = counter.record();
    logger.info("Follow-up message sent", { url: profileUrl, sentToday: total });
    return { kind: "sent" };
  }

  /**
   * Up to `max` profile URLs from the most recent connection cards. URLs not
   * yet recorded as connected are recorded.
   */
  async detectNewConnections(max = 20): Promise<string[]> {
    const { control, timing } = this.session;
    await this.session.navigate(CONNECTIONS_URL);
    await timing.contextualDelay("read", 1.5);
    await this.session.scroller.scrollBy(500);

    const found: string[] = [];
    const seen = new Set<string>();
    for (const link of await control.findElements(CONNECTION_CARD_LINK)) {
      if (found.length >= max) {
        break;
      }
      const href = await link.attribute("href");
      const url = href ? normalizeProfileHref(href) : null;
      if (!url || seen.has(url)) {
        continue;
      }
      seen.add(url);
      found.push(url);
    }

    let fresh = 0;
    for (const url of found) {
      if (!this.store.isMarked(url, "connected")) {
        await this.store.mark(url, "connected");
        fresh += 1;
      }
    }
    logger.info("Detected connections", { count: found.length, new: fresh });
    return found;
  }
}
