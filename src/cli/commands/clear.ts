import { Command } from "commander";
import { withStore } from "./helpers.js";

export const clearCommand = new Command("clear")
  .description("Delete every captured flow")
  .action((_opts: unknown, command: Command) => {
    withStore(command, (store) => {
      store.clear();
      console.log("Flows cleared");
    });
  });
