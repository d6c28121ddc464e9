import { Command } from "commander";
import { joinFilter, withStore } from "./helpers.js";

export const countCommand = new Command("count")
  .description("Count captured flows matching a filter")
  .argument("[filter...]", "filter expression")
  .action((words: string[], _opts: unknown, command: Command) => {
    const filter = joinFilter(words);
    withStore(
      command,
      (store) => {
        console.log(String(store.count(filter)));
      },
      filter
    );
  });
