import { logger } from "./logger.js";

export interface Closable {
  close(): Promise<void>;
}

const activeResources = new Set<Closable>();
const activeRuns = new Set<AbortController>();

export function trackResource(resource: Closable): void {
  activeResources.add(resource);
}

export function untrackResource(resource: Closable): void {
  activeResources.delete(resource);
}

export async function cleanupAllResources(): Promise<void> {
  const resources = Array.from(activeResources);
  activeResources.clear();
  for (const resource of resources) {
    try {
      await resource.close();
    } catch (error) {
      logger.debug("Ignoring close error during cleanup", { error: error instanceof Error ? error.message : String(error) });
    }
  }
}

/**
 * An AbortController the signal handlers abort on SIGINT/SIGTERM. Call the
 * returned `release` once the run is over.
 */
export function startRun(): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  activeRuns.add(controller);
  return {
    signal: controller.signal,
    release: () => {
      activeRuns.delete(controller);
    }
  };
}

let signalHandlersInstalled = false;

export function installSignalHandlers(): void {
  if (signalHandlersInstalled) {
    return;
  }
  signalHandlersInstalled = true;

  const handler = (signal: NodeJS.Signals) => {
    logger.debug(`Received ${signal}, stopping runs and closing browsers...`);
    for (const run of activeRuns) {
      run.abort();
    }
    activeRuns.clear();
    cleanupAllResources()
      .catch((error: unknown) => {
        logger.error("Cleanup failed", { error: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => {
        process.exit(signal === "SIGINT" ? 130 : 143);
      });
  };

  process.on("SIGINT", () => handler("SIGINT"));
  process.on("SIGTERM", () => handler("SIGTERM"));
}
