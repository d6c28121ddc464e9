#!/usr/bin/env node

import { program } from "commander";
import { captureCommand } from "./commands/capture.js";
import { clearCommand } from "./commands/clear.js";
import { copyCommand } from "./commands/copy.js";
import { countCommand } from "./commands/count.js";
import { filtersCommand } from "./commands/filters.js";
import { flowsCommand } from "./commands/flows.js";
import { rebuildCommand } from "./commands/rebuild.js";
import { rmCommand } from "./commands/rm.js";
import { showCommand } from "./commands/show.js";
import { getFlowVaultVersion } from "../shared/version.js";

program
  .name("flowvault")
  .description("Record HTTP traffic into a queryable SQLite flow store")
  .version(getFlowVaultVersion())
  .option(
    "-v, --verbose",
    "increase verbosity (use -vv or -vvv for more)",
    (_, prev: number) => prev + 1,
    0
  )
  .option("-d, --dir <path>", "override project root directory");

program.addCommand(captureCommand);
program.addCommand(flowsCommand);
program.addCommand(countCommand);
program.addCommand(showCommand);
program.addCommand(copyCommand);
program.addCommand(rmCommand);
program.addCommand(clearCommand);
program.addCommand(rebuildCommand);
program.addCommand(filtersCommand);

program.addHelpText(
  "after",
  `
Quick start:
  flowvault capture            Record traffic through a local proxy
  flowvault flows '~m post'    List recorded POST requests`
);

await program.parseAsync();
