import { logger } from "../utils/logger.js";
import type { BrowserControl } from "./control.js";
import {
  errorMessage,
  isAbortError,
  LoginFailedError,
  LoginTimeoutError,
  PolicyWallError,
  PreconditionError
} from "./errors.js";
import { requireVisible } from "./probe.js";
import {
  CHALLENGE_TITLE_MARKERS,
  LOGGED_IN_INDICATOR,
  LOGIN_ERROR,
  PASSWORD_FIELD,
  SIGN_IN_BUTTON,
  USERNAME_FIELD
} from "./selectors.js";
import type { Session } from "./session.js";
import { FEED_URL, LOGIN_URL } from "./urls.js";

export type LoginState =
  | { kind: "success" }
  | { kind: "error"; message: string }
  | { kind: "challenge"; title: string }
  | { kind: "pending" };

export interface Credentials {
  username?: string;
  password?: string;
}

export interface AuthOptions {
  pollTimeoutMs?: number;
  pollIntervalMs?: number;
  sessionCheckTimeoutMs?: number;
}

export type LoginOutcome = "already-authenticated" | "logged-in";

/**
 * One look at the page after submitting credentials. Precedence is fixed:
 * success, then an error message, then a challenge title.
 */
export async function classifyLoginState(control: BrowserControl): Promise<LoginState> {
  if (await control.findElement(LOGGED_IN_INDICATOR)) {
    return { kind: "success" };
  }

  const errorElement = await control.findElement(LOGIN_ERROR);
  if (errorElement && (await errorElement.isVisible())) {
    return { kind: "error", message: await errorElement.text() };
  }

  const title = await control.title();
  if (CHALLENGE_TITLE_MARKERS.some((marker) => title.includes(marker))) {
    return { kind: "challenge", title };
  }
  return { kind: "pending" };
}

export class AuthService {
  private readonly pollTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly sessionCheckTimeoutMs: number;

  constructor(
    private readonly session: Session,
    private readonly credentials: Credentials,
    options: AuthOptions = {}
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs ?? 30_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.sessionCheckTimeoutMs = options.sessionCheckTimeoutMs ?? 5000;
  }

  async login(): Promise<LoginOutcome> {
    try {
      return await this.runLogin();
    } catch (error) {
      if (!isAbortError(error) && !(error instanceof PreconditionError)) {
        logger.error("Login failed", { url: this.session.control.currentUrl(), error: errorMessage(error) });
        await this.session.captureScreenshot("login_failed.png");
      }
      throw error;
    }
  }

  private async runLogin(): Promise<LoginOutcome> {
    const { control } = this.session;

    await this.session.navigate(FEED_URL);
    if (await control.findElement(LOGGED_IN_INDICATOR, this.sessionCheckTimeoutMs)) {
      logger.info("Already logged in");
      return "already-authenticated";
    }

    const { username, password } = this.credentials;
    if (!username || !password) {
      throw new PreconditionError("not logged in and no credentials configured");
    }

    if (!(await control.findElement(USERNAME_FIELD[0].selector))) {
      await this.session.navigate(LOGIN_URL);
    }

    logger.info("Entering credentials", { username });
    const usernameField = await requireVisible(control, "username field", USERNAME_FIELD);
    await this.session.typeInto(usernameField, username);
    await this.session.timing.contextualDelay("think", 0.5);

    const passwordField = await requireVisible(control, "password field", PASSWORD_FIELD);
    await this.session.typeInto(passwordField, password);
    await this.session.timing.contextualDelay("think", 0.5);

    const submit = await requireVisible(control, "sign-in button", SIGN_IN_BUTTON);
    await this.session.click(submit);

    await this.awaitResult();
    logger.info("Login successful");
    return "logged-in";
  }

  private async awaitResult(): Promise<void> {
    const ticks = Math.ceil(this.pollTimeoutMs / this.pollIntervalMs);
    for (let tick = 0; tick < ticks; tick += 1) {
      const state = await classifyLoginState(this.session.control);
      switch (state.kind) {
        case "success":
          return;
        case "error":
          throw new LoginFailedError(state.message);
        case "challenge":
          logger.warn("Security challenge detected", { title: state.title });
          throw new PolicyWallError("challenge", "manual intervention required: 2FA/checkpoint detected");
        case "pending":
          await this.session.timing.pause(this.pollIntervalMs);
          break;
      }
    }
    throw new LoginTimeoutError(this.pollTimeoutMs);
  }
}
