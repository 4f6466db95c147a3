import { AuthService } from "../core/auth.js";
import { withSession } from "../core/browser.js";
import type { Session } from "../core/session.js";
import { JsonStateStore } from "../core/state.js";
import { assertRunnable, loadConfig, type Config } from "../utils/config.js";
import { startRun } from "../utils/lifecycle.js";
import type { CommonOpts } from "../utils/options.js";

export interface CommandContext {
  config: Config;
  session: Session;
}

async function resolveRunConfig(opts: Pick<CommonOpts, "headed">): Promise<Config> {
  const loaded = await loadConfig();
  const config = opts.headed ? { ...loaded, headless: false } : loaded;
  assertRunnable(config);
  return config;
}

/**
 * Validates config, launches a browser, makes sure the account is logged in,
 * then hands over. The browser is closed however `work` ends.
 */
export async function runLoggedIn<T>(
  opts: Pick<CommonOpts, "headed">,
  work: (context: CommandContext) => Promise<T>
): Promise<T> {
  const config = await resolveRunConfig(opts);
  const run = startRun();
  try {
    return await withSession(config, { signal: run.signal }, async (session) => {
      await new AuthService(session, config.credentials).login();
      return work({ config, session });
    });
  } finally {
    run.release();
  }
}

/** Opens the URL-state store for the duration of `work`. */
export async function withStateStore<T>(config: Config, work: (store: JsonStateStore) => Promise<T>): Promise<T> {
  const store = await JsonStateStore.open(config.statePath);
  try {
    return await work(store);
  } finally {
    await store.close();
  }
}
