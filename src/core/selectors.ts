import { css, xpath, type Selector } from "./control.js";
import type { Probe } from "./probe.js";

// Probe tables. Ordered by priority; update selectors here when the site's
// markup changes, the services only walk the lists.

const PROBE_WAIT_MS = 2000;

export const LOGGED_IN_INDICATOR: Selector = css(".global-nav__content");
export const LOGIN_ERROR: Selector = css("#error-for-username, #error-for-password, .alert-content");
export const CHALLENGE_TITLE_MARKERS = ["Security Verification", "Challenge"] as const;

export const USERNAME_FIELD: readonly Probe[] = [
  { name: "username-id", selector: css("#username"), timeoutMs: 10_000 },
  { name: "username-name", selector: css('input[name="session_key"]'), timeoutMs: PROBE_WAIT_MS }
];

export const PASSWORD_FIELD: readonly Probe[] = [
  { name: "password-id", selector: css("#password"), timeoutMs: 10_000 },
  { name: "password-name", selector: css('input[name="session_password"]'), timeoutMs: PROBE_WAIT_MS }
];

export const SIGN_IN_BUTTON: readonly Probe[] = [
  { name: "submit", selector: css('button[type="submit"]'), timeoutMs: PROBE_WAIT_MS }
];

export const PROFILE_MAIN: Selector = css("main");
export const PROFILE_HEADING: Selector = css("h1");

export const PENDING_BUTTON: readonly Probe[] = [
  { name: "pending", selector: xpath('//button[contains(., "Pending")]') }
];

export const DIRECT_CONNECT: readonly Probe[] = [
  {
    name: "primary-connect",
    selector: xpath('//main//button[contains(@class, "artdeco-button--primary")][contains(., "Connect")]'),
    timeoutMs: PROBE_WAIT_MS
  },
  {
    name: "aria-connect",
    selector: xpath('//button[contains(@aria-label, "Connect")][not(contains(@aria-label, "Invite"))]'),
    timeoutMs: PROBE_WAIT_MS
  }
];

export const MORE_ACTIONS: readonly Probe[] = [
  { name: "more-in-main", selector: xpath('//main//button[contains(@aria-label, "More actions")]'), timeoutMs: PROBE_WAIT_MS },
  { name: "more-generic", selector: css('button[aria-label="More actions"]'), timeoutMs: PROBE_WAIT_MS }
];

export const MENU_CONNECT: readonly Probe[] = [
  { name: "menu-connect", selector: xpath('//div[contains(@class, "artdeco-dropdown")]//span[text()="Connect"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "menu-add", selector: xpath('//div[contains(@class, "artdeco-dropdown")]//span[text()="Add"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "menu-invite", selector: xpath('//div[contains(@class, "artdeco-dropdown")]//span[contains(text(), "Invite")]'), timeoutMs: PROBE_WAIT_MS },
  { name: "role-connect", selector: xpath('//div[@role="button"]//span[text()="Connect"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "role-add", selector: xpath('//div[@role="button"]//span[text()="Add"]'), timeoutMs: PROBE_WAIT_MS }
];

export const FOLLOW_ACTION: readonly Probe[] = [
  { name: "aria-follow", selector: xpath('//button[contains(@aria-label, "Follow")]'), timeoutMs: PROBE_WAIT_MS },
  { name: "text-follow", selector: xpath('//button//span[text()="Follow"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "menu-follow", selector: xpath('//div[contains(@class, "artdeco-dropdown")]//span[text()="Follow"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "role-follow", selector: xpath('//div[@role="button"]//span[text()="Follow"]'), timeoutMs: PROBE_WAIT_MS }
];

export const MESSAGE_FALLBACK: readonly Probe[] = [
  { name: "aria-message", selector: xpath('//button[contains(@aria-label, "Message")]'), timeoutMs: PROBE_WAIT_MS },
  { name: "main-message", selector: xpath('//main//button[contains(., "Message")]'), timeoutMs: PROBE_WAIT_MS }
];

export const CHAT_TEXTBOX: readonly Probe[] = [
  { name: "chat-textbox", selector: xpath('//div[@role="textbox"][@contenteditable="true"]'), timeoutMs: 5000 }
];

export const FORM_SUBMIT: readonly Probe[] = [{ name: "form-submit", selector: css('button[type="submit"]') }];

export const EMAIL_REQUIRED: Selector = xpath('//label[contains(., "Email")]');

export const ADD_NOTE: readonly Probe[] = [
  { name: "add-note", selector: xpath('//button[contains(@aria-label, "Add a note") or contains(., "Add a note")]') }
];

export const NOTE_TEXTAREA: readonly Probe[] = [
  { name: "note-textarea", selector: css("textarea[name='message']"), timeoutMs: PROBE_WAIT_MS }
];

export const SEND_INVITATION: readonly Probe[] = [
  { name: "send-now", selector: css('button[aria-label="Send now"]'), timeoutMs: PROBE_WAIT_MS },
  { name: "dialog-send", selector: xpath('//div[@role="dialog"]//button[contains(., "Send")]'), timeoutMs: PROBE_WAIT_MS }
];

export const MESSAGE_BUTTON: readonly Probe[] = [
  { name: "message", selector: xpath('//button[contains(., "Message")]'), timeoutMs: PROBE_WAIT_MS }
];

export const MESSAGE_INPUT: readonly Probe[] = [
  { name: "write-a-message", selector: css('div[role="textbox"][aria-label^="Write a message"]'), timeoutMs: 5000 },
  { name: "msg-form-editable", selector: css(".msg-form__contenteditable"), timeoutMs: PROBE_WAIT_MS }
];

export const MESSAGE_SEND: readonly Probe[] = [
  { name: "submit", selector: css('button[type="submit"]') },
  { name: "text-send", selector: xpath('//button[contains(., "Send")]') }
];

export const CONNECTION_CARD_LINK: Selector = css(".mn-connection-card__link");

export const PROFILE_LINK: Selector = css("a[href*='/in/']");
export const ANY_ANCHOR: Selector = css("a");
export const NEXT_PAGE: Selector = css('button[aria-label="Next"]');

export const IDLE_HOVER_TARGET: Selector = css("h1, .global-nav__content, img");
