/**
 * Base error for every failure raised by the automation layer.
 */
export class AutomationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AutomationError";
  }
}

/**
 * Raised before any browser interaction when a run cannot start
 * (missing credentials, daily limit already consumed).
 */
export class PreconditionError extends AutomationError {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export type PolicyWall = "weekly-limit" | "challenge";

/**
 * A state the site puts in front of automated-looking behaviour.
 * Terminal for the current run and never retried.
 */
export class PolicyWallError extends AutomationError {
  readonly wall: PolicyWall;

  constructor(wall: PolicyWall, message: string) {
    super(message);
    this.name = "PolicyWallError";
    this.wall = wall;
  }
}

/**
 * Every probe strategy for a goal came back empty or hidden.
 */
export class ElementNotFoundError extends AutomationError {
  readonly goal: string;
  readonly tried: string[];

  constructor(goal: string, tried: string[]) {
    super(`${goal} not found (tried: ${tried.join(", ") || "nothing"})`);
    this.name = "ElementNotFoundError";
    this.goal = goal;
    this.tried = tried;
  }
}

export class LoginFailedError extends AutomationError {
  readonly pageMessage: string;

  constructor(pageMessage: string) {
    super(`login failed: ${pageMessage}`);
    this.name = "LoginFailedError";
    this.pageMessage = pageMessage;
  }
}

export class LoginTimeoutError extends AutomationError {
  constructor(timeoutMs: number) {
    super(`timeout waiting for login result after ${timeoutMs}ms`);
    this.name = "LoginTimeoutError";
  }
}

export class RetryExhaustedError extends AutomationError {
  readonly retries: number;
  readonly lastError: unknown;

  constructor(retries: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`operation failed after ${retries} retries: ${detail}`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.retries = retries;
    this.lastError = lastError;
  }
}

/**
 * Browser launch or viewport setup failed. Fatal to the run.
 */
export class LaunchError extends AutomationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause } : undefined);
    this.name = "LaunchError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
