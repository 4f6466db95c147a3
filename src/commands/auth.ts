import { Command } from "commander";
import { getConfigPath, loadConfig, redactConfig, saveConfigValue } from "../utils/config.js";
import type { CommonOpts } from "../utils/options.js";
import { runLoggedIn } from "./context.js";

/** `true`/`false` become booleans and numeric strings numbers; the schema decides the rest. */
function parseConfigValue(value: string): unknown {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  const num = Number(value);
  return value.trim() !== "" && !Number.isNaN(num) ? num : value;
}

export function registerAuthCommands(program: Command): void {
  const auth = program.command("auth").description("Manage the site session");

  auth
    .command("login")
    .description("Log in (or confirm an existing session) and exit")
    .option("--headed", "Run browser in headed mode (overrides config)", false)
    .action(async (opts: Pick<CommonOpts, "headed">) => {
      await runLoggedIn(opts, async () => {
        console.log("Logged in.");
      });
    });

  const config = program.command("config").description("Manage CLI configuration");

  config
    .command("show")
    .description("Show the resolved configuration (password masked)")
    .action(async () => {
      const cfg = await loadConfig();
      console.log(`Config path: ${getConfigPath()}\n`);
      console.log(JSON.stringify(redactConfig(cfg), null, 2));
    });

  config
    .command("set")
    .description("Set a configuration value (e.g. config set limits.dailyConnections 10)")
    .argument("<key>", "Config key (e.g. headless, userDataDir, limits.dailyMessages)")
    .argument("<value>", "Config value")
    .action(async (key: string, value: string) => {
      await saveConfigValue(key, parseConfigValue(value));
      console.log(`Set ${key} = ${key.endsWith("password") ? "********" : value}`);
    });
}
