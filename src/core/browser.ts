import { chromium, type Browser, type BrowserContext } from "playwright-core";
import type { Config } from "../utils/config.js";
import { randomInt, type RandomSource, type Sleeper } from "../utils/delay.js";
import { trackResource, untrackResource, type Closable } from "../utils/lifecycle.js";
import { logger } from "../utils/logger.js";
import { PlaywrightControl } from "./control.js";
import { LaunchError, errorMessage } from "./errors.js";
import { Session } from "./session.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface Viewport {
  width: number;
  height: number;
}

export function randomViewport(random: RandomSource = Math.random): Viewport {
  return {
    width: randomInt(1024, 1919, random),
    height: randomInt(768, 1079, random)
  };
}

/** Runs before any page script: hides the automation flag and pins the UA string. */
export function fingerprintScript(userAgent: string): string {
  return [
    "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });",
    `Object.defineProperty(navigator, 'userAgent', { get: () => ${JSON.stringify(userAgent)} });`
  ].join("\n");
}

export interface LaunchOptions {
  signal?: AbortSignal;
  random?: RandomSource;
  sleep?: Sleeper;
}

export interface LaunchedSession {
  session: Session;
  close(): Promise<void>;
}

async function openContext(config: Config, viewport: Viewport, userAgent: string): Promise<{ context: BrowserContext; browser: Browser | null }> {
  const proxy = config.proxyUrl ? { server: config.proxyUrl } : undefined;

  if (config.userDataDir) {
    logger.debug("Launching persistent Chromium profile", { dir: config.userDataDir, headless: config.headless });
    const context = await chromium.launchPersistentContext(config.userDataDir, {
      headless: config.headless,
      channel: config.channel,
      proxy,
      viewport,
      userAgent
    });
    return { context, browser: null };
  }

  logger.debug("Launching Chromium", { headless: config.headless });
  const browser = await chromium.launch({ headless: config.headless, channel: config.channel, proxy });
  try {
    return { context: await browser.newContext({ viewport, userAgent }), browser };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

/**
 * Launches Chromium with a randomized viewport and fingerprint tweaks and
 * wraps its first page in a fresh {@link Session}.
 */
export async function launchSession(config: Config, options: LaunchOptions = {}): Promise<LaunchedSession> {
  const random = options.random ?? Math.random;
  const viewport = randomViewport(random);
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT;

  let opened: { context: BrowserContext; browser: Browser | null };
  try {
    opened = await openContext(config, viewport, userAgent);
  } catch (error) {
    throw new LaunchError(`failed to launch browser: ${errorMessage(error)}`, error);
  }

  const { context, browser } = opened;
  const handle: Closable = browser ?? context;
  trackResource(handle);

  const close = async (): Promise<void> => {
    untrackResource(handle);
    await context.close();
    if (browser) {
      await browser.close();
    }
  };

  try {
    await context.addInitScript({ content: fingerprintScript(userAgent) });
    const page = context.pages()[0] ?? (await context.newPage());
    await page.setViewportSize(viewport);
    logger.debug("Browser ready", { width: viewport.width, height: viewport.height });

    const session = new Session(new PlaywrightControl(page), {
      random,
      sleep: options.sleep,
      signal: options.signal,
      typoRate: config.humanize.typoRate,
      intensity: config.humanize.intensity,
      limits: { connections: config.limits.dailyConnections, messages: config.limits.dailyMessages },
      screenshotDir: config.screenshotDir
    });
    return { session, close };
  } catch (error) {
    await close();
    throw new LaunchError(`failed to prepare browser page: ${errorMessage(error)}`, error);
  }
}

/** Launches, runs `work`, and always closes the browser afterwards. */
export async function withSession<T>(
  config: Config,
  options: LaunchOptions,
  work: (session: Session) => Promise<T>
): Promise<T> {
  const launched = await launchSession(config, options);
  try {
    return await work(launched.session);
  } finally {
    await launched.close();
  }
}
