import { applyTemplate, firstNameOf } from "../utils/format.js";
import { logger } from "../utils/logger.js";
import { ElementNotFoundError, PolicyWallError } from "./errors.js";
import { requireVisible, resolveFirstVisible, triedNames, type ProbeResult } from "./probe.js";
import {
  ADD_NOTE,
  CHAT_TEXTBOX,
  DIRECT_CONNECT,
  EMAIL_REQUIRED,
  FOLLOW_ACTION,
  FORM_SUBMIT,
  MENU_CONNECT,
  MESSAGE_FALLBACK,
  MORE_ACTIONS,
  NOTE_TEXTAREA,
  PENDING_BUTTON,
  PROFILE_HEADING,
  PROFILE_MAIN,
  SEND_INVITATION
} from "./selectors.js";
import type { Session } from "./session.js";

export type ConnectOutcome =
  | { kind: "sent"; withNote: boolean }
  | { kind: "followed" }
  | { kind: "messaged" }
  | { kind: "pending" }
  | { kind: "skipped"; reason: "email-required" | "how-do-you-know" };

export const DEFAULT_NOTE_TEMPLATE = "Hi {{name}}, I noticed your profile and would love to connect!";

const PROFILE_LOAD_TIMEOUT_MS = 15_000;
const WEEKLY_LIMIT_TEXT = "weekly limit";
const HOW_DO_YOU_KNOW_TEXT = "how do you know";

export function describeOutcome(outcome: ConnectOutcome): string {
  switch (outcome.kind) {
    case "sent":
      return outcome.withNote ? "connection request sent with note" : "connection request sent";
    case "followed":
      return "followed (connect unavailable)";
    case "messaged":
      return "messaged (connect unavailable)";
    case "pending":
      return "request already pending";
    case "skipped":
      return `skipped: ${outcome.reason}`;
  }
}

export class ConnectService {
  constructor(private readonly session: Session) {}

  /**
   * Opens the profile and sends a connection request, falling back to Follow
   * and then Message when no Connect action exists. Every send-equivalent
   * outcome counts against the daily connection limit.
   */
  async sendConnectionRequest(profileUrl: string, noteTemplate: string = DEFAULT_NOTE_TEMPLATE): Promise<ConnectOutcome> {
    const counter = this.session.counters.connections;
    counter.assertAvailable();

    const { control, timing } = this.session;
    await this.session.navigate(profileUrl);
    if (!(await control.findElement(PROFILE_MAIN, PROFILE_LOAD_TIMEOUT_MS))) {
      logger.warn("Profile content did not load in time, probing anyway", { url: profileUrl });
    }

    await timing.contextualDelay("read", 2.0);
    await this.session.scroller.scrollBy(300);

    const pending = await resolveFirstVisible(control, PENDING_BUTTON);
    if (pending.match) {
      logger.info("Connection request already pending", { url: profileUrl });
      return { kind: "pending" };
    }

    const tried: ProbeResult[] = [];
    const direct = await resolveFirstVisible(control, DIRECT_CONNECT);
    tried.push(...direct.tried);
    let connectButton = direct.match?.element ?? null;

    if (!connectButton) {
      const more = await resolveFirstVisible(control, MORE_ACTIONS);
      tried.push(...more.tried);
      if (more.match) {
        await this.session.click(more.match.element);
        await timing.contextualDelay("think", 0.5);
        const menu = await resolveFirstVisible(control, MENU_CONNECT);
        tried.push(...menu.tried);
        connectButton = menu.match?.element ?? null;
      }
    }

    if (!connectButton) {
      logger.info("No Connect action, trying fallbacks", { url: profileUrl, tried: triedNames(tried).join(",") });
      return this.tryFallbacks(profileUrl, noteTemplate, tried);
    }

    await this.session.click(connectButton);
    await timing.contextualDelay("think", 0.8);

    const body = (await control.bodyText()).toLowerCase();
    if (body.includes(WEEKLY_LIMIT_TEXT)) {
      throw new PolicyWallError("weekly-limit", "weekly invitation limit reached");
    }
    const emailLabel = await control.findElement(EMAIL_REQUIRED);
    if (emailLabel && (await emailLabel.isVisible())) {
      logger.info("Invitation requires the recipient's email, skipping", { url: profileUrl });
      await control.press("Escape");
      return { kind: "skipped", reason: "email-required" };
    }
    if (body.includes(HOW_DO_YOU_KNOW_TEXT)) {
      logger.info("Invitation asks how we know the recipient, skipping", { url: profileUrl });
      await control.press("Escape");
      return { kind: "skipped", reason: "how-do-you-know" };
    }

    let withNote = false;
    const addNote = await resolveFirstVisible(control, ADD_NOTE);
    if (addNote.match) {
      await this.session.click(addNote.match.element);
      const textarea = await resolveFirstVisible(control, NOTE_TEXTAREA);
      if (textarea.match) {
        const name = await this.profileFirstName();
        await this.session.typeInto(textarea.match.element, applyTemplate(noteTemplate, { name, firstname: name }));
        await timing.contextualDelay("think", 0.5);
        withNote = true;
      } else {
        logger.warn("Note field did not appear, sending without a note", {
          url: profileUrl,
          tried: triedNames(textarea.tried).join(",")
        });
      }
    }

    const send = await requireVisible(control, "send invitation button", SEND_INVITATION);
    await this.session.click(send);
    await timing.pause(1000);

    const total = counter.record();
    logger.info("Connection request sent", { url: profileUrl, note: withNote, sentToday: total });
    return { kind: "sent", withNote };
  }

  private async tryFallbacks(profileUrl: string, noteTemplate: string, tried: ProbeResult[]): Promise<ConnectOutcome> {
    const { control, timing } = this.session;
    const counter = this.session.counters.connections;

    const follow = await resolveFirstVisible(control, FOLLOW_ACTION);
    tried.push(...follow.tried);
    if (follow.match) {
      await this.session.click(follow.match.element);
      await timing.contextualDelay("think", 0.5);
      counter.record();
      logger.info("Followed profile instead of connecting", { url: profileUrl });
      return { kind: "followed" };
    }

    const message = await resolveFirstVisible(control, MESSAGE_FALLBACK);
    tried.push(...message.tried);
    if (message.match) {
      await this.session.click(message.match.element);
      const textbox = await requireVisible(control, "chat textbox", CHAT_TEXTBOX);
      await this.session.typeInto(textbox, applyTemplate(noteTemplate, { name: "there", firstname: "there" }));
      await timing.contextualDelay("think", 0.5);
      const submit = await requireVisible(control, "chat send button", FORM_SUBMIT);
      await this.session.click(submit);
      counter.record();
      logger.info("Messaged profile instead of connecting", { url: profileUrl });
      return { kind: "messaged" };
    }

    throw new ElementNotFoundError("connect action", triedNames(tried));
  }

  private async profileFirstName(): Promise<string> {
    const heading = await this.session.control.findElement(PROFILE_HEADING);
    return firstNameOf(heading ? await heading.text() : "");
  }
}
