import { Command } from "commander";
import { withStore } from "./helpers.js";

export const rebuildCommand = new Command("rebuild")
  .description("Drop and recreate the derived views and indexes (stored flows are untouched)")
  .action((_opts: unknown, command: Command) => {
    withStore(command, (store) => {
      store.rebuildDerivedSchema();
      console.log(`Derived schema rebuilt (${store.count()} flows indexed)`);
    });
  });
