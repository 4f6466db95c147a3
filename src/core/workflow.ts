import { shuffle, type RandomSource } from "../utils/delay.js";
import { logger } from "../utils/logger.js";
import { ConnectService, describeOutcome, type ConnectOutcome } from "./connect.js";
import { errorMessage, isAbortError, PolicyWallError } from "./errors.js";
import { MessagingService, type FollowUpOutcome } from "./messaging.js";
import { SearchService, type SearchCriteria } from "./search.js";
import type { Session } from "./session.js";
import type { UrlStateStore } from "./state.js";

const BUSINESS_HOURS_START = 9;
const BUSINESS_HOURS_END = 18;
const BETWEEN_PROFILES_MIN_MS = 20_000;
const BETWEEN_PROFILES_MAX_MS = 60_000;

export interface ProfileResult<T> {
  url: string;
  outcome?: T;
  error?: string;
}

export interface ConnectRunOptions {
  criteria: SearchCriteria;
  maxPages?: number;
  /** Candidates to attempt this run. */
  max?: number;
  noteTemplate?: string;
  now?: Date;
}

export interface FollowUpRunOptions {
  template?: string;
  /** Recent connections to look at. */
  scanLimit?: number;
  now?: Date;
}

export function isBusinessHours(now: Date): boolean {
  const hour = now.getHours();
  return hour >= BUSINESS_HOURS_START && hour < BUSINESS_HOURS_END;
}

/** Unprocessed profiles in random order. */
export function selectCandidates(urls: readonly string[], store: UrlStateStore, random: RandomSource): string[] {
  const fresh = urls.filter((url) => !store.isMarked(url, "requestSent") && !store.isMarked(url, "connected"));
  return shuffle(fresh, random);
}

function warnOutsideBusinessHours(now: Date): void {
  if (!isBusinessHours(now)) {
    logger.warn("Running outside business hours (09:00-18:00)", { hour: now.getHours() });
  }
}

async function pauseBetweenProfiles(session: Session): Promise<void> {
  const waited = await session.timing.randomDelay(BETWEEN_PROFILES_MIN_MS, BETWEEN_PROFILES_MAX_MS);
  logger.debug("Paused between profiles", { ms: Math.round(waited) });
  await session.idleHover();
}

/**
 * Per-profile failures are logged and recorded; a policy wall or an abort
 * ends the run.
 */
function recordFailure<T>(results: ProfileResult<T>[], url: string, error: unknown): void {
  if (error instanceof PolicyWallError || isAbortError(error)) {
    throw error;
  }
  logger.error("Profile failed, moving on", { url, error: errorMessage(error) });
  results.push({ url, error: errorMessage(error) });
}

export async function runConnectWorkflow(
  session: Session,
  store: UrlStateStore,
  options: ConnectRunOptions
): Promise<ProfileResult<ConnectOutcome>[]> {
  warnOutsideBusinessHours(options.now ?? new Date());

  const found = await new SearchService(session).searchPeople(options.criteria, options.maxPages ?? 1);
  const candidates = selectCandidates(found, store, session.random);
  logger.info("Candidates selected", { found: found.length, fresh: candidates.length });

  const connect = new ConnectService(session);
  const counter = session.counters.connections;
  const max = options.max ?? 1;
  const results: ProfileResult<ConnectOutcome>[] = [];

  for (const url of candidates) {
    if (results.length >= max || !counter.canSend()) {
      break;
    }
    if (results.length > 0) {
      await pauseBetweenProfiles(session);
    }
    let outcome: ConnectOutcome;
    try {
      outcome = await connect.sendConnectionRequest(url, options.noteTemplate);
    } catch (error) {
      recordFailure(results, url, error);
      continue;
    }
    if (outcome.kind !== "skipped") {
      try {
        await store.mark(url, "requestSent");
      } catch (error) {
        // The invitation is already out.
        logger.error("Could not record the request", { url, error: errorMessage(error) });
      }
    }
    logger.info("Profile processed", { url, result: describeOutcome(outcome) });
    results.push({ url, outcome });
  }
  return results;
}

export async function runFollowUpWorkflow(
  session: Session,
  store: UrlStateStore,
  options: FollowUpRunOptions = {}
): Promise<ProfileResult<FollowUpOutcome>[]> {
  warnOutsideBusinessHours(options.now ?? new Date());

  const messaging = new MessagingService(session, store);
  const connections = await messaging.detectNewConnections(options.scanLimit ?? 20);
  const pending = connections.filter((url) => !store.isMarked(url, "messaged"));
  const counter = session.counters.messages;
  const results: ProfileResult<FollowUpOutcome>[] = [];

  for (const url of pending) {
    if (!counter.canSend()) {
      logger.info("Daily message limit reached, stopping", { limit: counter.limit });
      break;
    }
    if (results.length > 0) {
      await pauseBetweenProfiles(session);
    }
    try {
      results.push({ url, outcome: await messaging.sendFollowUp(url, options.template) });
    } catch (error) {
      recordFailure(results, url, error);
    }
  }
  return results;
}
