#!/usr/bin/env node
import { Command } from "commander";
import { registerAuthCommands } from "./commands/auth.js";
import { registerConnectCommands } from "./commands/connect.js";
import { registerMessageCommands } from "./commands/message.js";
import { registerRunCommands } from "./commands/run.js";
import { registerSearchCommands } from "./commands/search.js";
import { loadConfig, setConfigPath } from "./utils/config.js";
import { installSignalHandlers } from "./utils/lifecycle.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  installSignalHandlers();

  const program = new Command();

  program
    .name("outreach")
    .description("Browser-driven outreach with humanized input")
    .version("0.1.0")
    .option("-v, --verbose", "Enable verbose debug logging")
    .option("-c, --config <path>", "Path to the config file")
    .showHelpAfterError()
    .hook("preAction", async (thisCommand) => {
      const globalOpts = thisCommand.optsWithGlobals<{ verbose?: boolean; config?: string }>();
      if (globalOpts.verbose) {
        logger.verbose = true;
      }
      if (globalOpts.config) {
        setConfigPath(globalOpts.config);
      }

      const config = await loadConfig();
      if (config.verbose) {
        logger.verbose = true;
      }
    });

  registerAuthCommands(program);
  registerSearchCommands(program);
  registerConnectCommands(program);
  registerMessageCommands(program);
  registerRunCommands(program);

  await program.parseAsync();
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
