/**
 * `flowvault flows [filter...]`: list stored flows matching a filter.
 */

import { Command } from "commander";
import type { FlowQuery } from "../../shared/types.js";
import { SORT_KEYS, isSortKey, isSortOrder } from "../../store/query.js";
import { formatHint } from "../formatters/hints.js";
import { formatFlowTable } from "../formatters/table.js";
import { joinFilter, parseIntFlag, withStore } from "./helpers.js";

export interface FlowsFlags {
  sort?: string;
  order?: string;
  limit?: string;
  offset?: string;
  json?: boolean;
}

/**
 * Turn CLI flags into a store query. Throws on values the store would not accept.
 */
export function buildQuery(filter: string | undefined, opts: FlowsFlags): FlowQuery {
  const query: FlowQuery = {};
  if (filter !== undefined) {
    query.filter = filter;
  }

  if (opts.sort !== undefined) {
    if (!isSortKey(opts.sort)) {
      throw new Error(`Invalid --sort: "${opts.sort}". Use one of: ${SORT_KEYS.join(", ")}.`);
    }
    query.sort = opts.sort;
  }

  if (opts.order !== undefined) {
    if (!isSortOrder(opts.order)) {
      throw new Error(`Invalid --order: "${opts.order}". Use asc or desc.`);
    }
    query.order = opts.order;
  }

  if (opts.limit !== undefined) {
    query.limit = parseIntFlag(opts.limit, "--limit");
  }
  if (opts.offset !== undefined) {
    query.offset = parseIntFlag(opts.offset, "--offset");
  }

  return query;
}

export const flowsCommand = new Command("flows")
  .description("List captured flows, optionally filtered (e.g. flowvault flows '~m post & ~c 201')")
  .argument("[filter...]", "filter expression; run 'flowvault filters' for the syntax")
  .option("--sort <key>", `sort key (${SORT_KEYS.join(", ")})`)
  .option("--order <order>", "asc or desc")
  .option("--limit <n>", "max results (defaults to pageSize from config)")
  .option("--offset <n>", "skip results")
  .option("--json", "JSON output")
  .action((words: string[], opts: FlowsFlags, command: Command) => {
    const filter = joinFilter(words);
    withStore(
      command,
      (store) => {
        const query = buildQuery(filter, opts);
        const summaries = store.summaries(query);
        const total = store.count(filter);

        if (opts.json) {
          console.log(JSON.stringify({ flows: summaries, total }, null, 2));
          return;
        }

        if (summaries.length === 0) {
          console.log(filter === undefined ? "  No flows captured" : "  No flows match the filter");
          const hint = formatHint(["flowvault capture to record traffic"]);
          if (hint) console.log(hint);
          return;
        }

        console.log(formatFlowTable(summaries, total));
        const hint = formatHint(["flowvault show <id> for details", "--json for scripting"]);
        if (hint) console.log(hint);
      },
      filter
    );
  });
