import { Command } from "commander";
import { MessagingService } from "../core/messaging.js";
import { assertProfileUrl } from "../core/urls.js";
import { addCommonOptions, parsePositiveInt, resolveFormat, type CommonOpts } from "../utils/options.js";
import { outputResult } from "../utils/output.js";
import { runLoggedIn, withStateStore } from "./context.js";

interface MessageSendOpts extends CommonOpts {
  to: string;
  template?: string;
}

interface MessageDetectOpts extends CommonOpts {
  limit: string;
}

export function registerMessageCommands(program: Command): void {
  const message = program.command("message").description("Follow-up messaging");

  const send = message
    .command("send")
    .description("Send a follow-up message to a connection (skipped if already messaged)")
    .requiredOption("--to <profileUrl>", "Target profile URL")
    .option("--template <text>", "Message template; supports {{firstname}} and {{name}}");

  addCommonOptions(send).action(async (opts: MessageSendOpts) => {
    const url = assertProfileUrl(opts.to);
    const outcome = await runLoggedIn(opts, ({ config, session }) =>
      withStateStore(config, (store) => new MessagingService(session, store).sendFollowUp(url, opts.template))
    );
    const line = outcome.kind === "sent" ? `${url}\tmessage sent` : `${url}\tskipped: ${outcome.reason}`;
    await outputResult({ url, ...outcome }, [line], resolveFormat(opts), opts.output);
  });

  const detect = message
    .command("detect")
    .description("List recent connections and record them as connected")
    .option("--limit <n>", "Max connections to read", "20");

  addCommonOptions(detect).action(async (opts: MessageDetectOpts) => {
    const limit = parsePositiveInt(opts.limit, "--limit");
    const urls = await runLoggedIn(opts, ({ config, session }) =>
      withStateStore(config, (store) => new MessagingService(session, store).detectNewConnections(limit))
    );
    await outputResult(urls, urls, resolveFormat(opts), opts.output);
  });
}
