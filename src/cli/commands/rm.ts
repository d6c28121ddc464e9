import { Command } from "commander";
import { withStore } from "./helpers.js";
import { resolveFlowId } from "./show.js";

export const rmCommand = new Command("rm")
  .description("Remove flows by id or unique prefix")
  .argument("<ids...>", "flow ids")
  .action((prefixes: string[], _opts: unknown, command: Command) => {
    withStore(command, (store) => {
      const ids = prefixes.map((prefix) => resolveFlowId(store, prefix));
      store.remove(ids);
      console.log(`Removed ${ids.length} flow${ids.length === 1 ? "" : "s"}`);
    });
  });
