import { Command } from "commander";
import { describeOutcome } from "../core/connect.js";
import { runConnectWorkflow, runFollowUpWorkflow, type ProfileResult } from "../core/workflow.js";
import { addCommonOptions, parsePositiveInt, resolveFormat, type CommonOpts } from "../utils/options.js";
import { outputResult } from "../utils/output.js";
import { runLoggedIn, withStateStore } from "./context.js";

interface RunConnectOpts extends CommonOpts {
  keywords?: string;
  title?: string;
  company?: string;
  location?: string;
  pages: string;
  max: string;
  note?: string;
}

interface RunMessageOpts extends CommonOpts {
  template?: string;
  scan: string;
}

function resultLines<T>(results: readonly ProfileResult<T>[], describe: (outcome: T) => string): string[] {
  return results.map(({ url, outcome, error }) =>
    outcome === undefined ? `${url}\tfailed: ${error ?? "unknown error"}` : `${url}\t${describe(outcome)}`
  );
}

export function registerRunCommands(program: Command): void {
  const run = program.command("run").description("Unattended outreach workflows");

  const connect = run
    .command("connect")
    .description("Search, pick unprocessed profiles and send connection requests")
    .option("--keywords <text>", "Keywords to search")
    .option("--title <text>", "Job title")
    .option("--company <text>", "Company name")
    .option("--location <text>", "Location")
    .option("--pages <n>", "Result pages to walk", "1")
    .option("--max <n>", "Profiles to attempt this run", "1")
    .option("--note <template>", "Note template; {{name}} becomes the profile's first name");

  addCommonOptions(connect).action(async (opts: RunConnectOpts) => {
    const maxPages = parsePositiveInt(opts.pages, "--pages");
    const max = parsePositiveInt(opts.max, "--max");
    const results = await runLoggedIn(opts, ({ config, session }) =>
      withStateStore(config, (store) =>
        runConnectWorkflow(session, store, {
          criteria: { keywords: opts.keywords, title: opts.title, company: opts.company, location: opts.location },
          maxPages,
          max,
          noteTemplate: opts.note
        })
      )
    );
    await outputResult(results, resultLines(results, describeOutcome), resolveFormat(opts), opts.output);
  });

  const message = run
    .command("message")
    .description("Send follow-up messages to recent connections not yet messaged")
    .option("--template <text>", "Message template; supports {{firstname}} and {{name}}")
    .option("--scan <n>", "Recent connections to look at", "20");

  addCommonOptions(message).action(async (opts: RunMessageOpts) => {
    const scanLimit = parsePositiveInt(opts.scan, "--scan");
    const results = await runLoggedIn(opts, ({ config, session }) =>
      withStateStore(config, (store) => runFollowUpWorkflow(session, store, { template: opts.template, scanLimit }))
    );
    const lines = resultLines(results, (outcome) => (outcome.kind === "sent" ? "message sent" : `skipped: ${outcome.reason}`));
    await outputResult(results, lines, resolveFormat(opts), opts.output);
  });
}
