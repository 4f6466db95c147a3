import { Command } from "commander";
import { SearchService } from "../core/search.js";
import { addCommonOptions, parsePositiveInt, resolveFormat, type CommonOpts } from "../utils/options.js";
import { outputResult } from "../utils/output.js";
import { runLoggedIn } from "./context.js";

interface SearchOpts extends CommonOpts {
  keywords?: string;
  title?: string;
  company?: string;
  location?: string;
  pages: string;
}

export function registerSearchCommands(program: Command): void {
  const search = program.command("search").description("Search the site");

  const people = search
    .command("people")
    .description("Collect profile URLs from a people search")
    .option("--keywords <text>", "Keywords to search")
    .option("--title <text>", "Job title")
    .option("--company <text>", "Company name")
    .option("--location <text>", "Location")
    .option("--pages <n>", "Result pages to walk", "1");

  addCommonOptions(people).action(async (opts: SearchOpts) => {
    const maxPages = parsePositiveInt(opts.pages, "--pages");
    const urls = await runLoggedIn(opts, ({ session }) =>
      new SearchService(session).searchPeople(
        { keywords: opts.keywords, title: opts.title, company: opts.company, location: opts.location },
        maxPages
      )
    );
    await outputResult(urls, urls, resolveFormat(opts), opts.output);
  });
}
