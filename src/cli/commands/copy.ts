/**
 * `flowvault copy <target> [filter...]`: write matching flows to a new database file.
 */

import * as path from "node:path";
import { Command } from "commander";
import { joinFilter, withStore } from "./helpers.js";

export const copyCommand = new Command("copy")
  .description("Copy flows matching a filter into a new flow database")
  .argument("<target>", "path of the database file to create")
  .argument("[filter...]", "filter expression; copies every flow when omitted")
  .action((target: string, words: string[], _opts: unknown, command: Command) => {
    const filter = joinFilter(words);
    withStore(
      command,
      (store) => {
        const result = store.copyTo(path.resolve(target), filter);
        console.log(`Copied ${result.flows} flow${result.flows === 1 ? "" : "s"} (${result.chunks} chunks) to ${target}`);
      },
      filter
    );
  });
