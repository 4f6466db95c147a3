import { Command } from "commander";
import { ConnectService, describeOutcome } from "../core/connect.js";
import { assertProfileUrl } from "../core/urls.js";
import { addCommonOptions, resolveFormat, type CommonOpts } from "../utils/options.js";
import { outputResult } from "../utils/output.js";
import { runLoggedIn, withStateStore } from "./context.js";

interface ConnectOpts extends CommonOpts {
  to: string;
  note?: string;
}

export function registerConnectCommands(program: Command): void {
  const connect = program
    .command("connect")
    .description("Send a connection request to one profile")
    .requiredOption("--to <profileUrl>", "Target profile URL")
    .option("--note <template>", "Note template; {{name}} becomes the profile's first name");

  addCommonOptions(connect).action(async (opts: ConnectOpts) => {
    const url = assertProfileUrl(opts.to);
    const outcome = await runLoggedIn(opts, ({ config, session }) =>
      withStateStore(config, async (store) => {
        const result = await new ConnectService(session).sendConnectionRequest(url, opts.note);
        if (result.kind !== "skipped") {
          await store.mark(url, "requestSent");
        }
        return result;
      })
    );
    await outputResult({ url, ...outcome }, [`${url}\t${describeOutcome(outcome)}`], resolveFormat(opts), opts.output);
  });
}
