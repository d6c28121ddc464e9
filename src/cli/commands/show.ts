/**
 * `flowvault show <id>`: view a single flow in detail, or dump one of its bodies.
 */

import { Command } from "commander";
import type { FlowStore } from "../../store/flow-store.js";
import { formatFlowDetail } from "../formatters/detail.js";
import { formatHint } from "../formatters/hints.js";
import { flowToJson } from "../formatters/json.js";
import { SHORT_ID_LENGTH } from "../formatters/table.js";
import { withStore } from "./helpers.js";

const BODY_TARGETS = ["request", "response"] as const;
type BodyTarget = (typeof BODY_TARGETS)[number];

/** Candidates listed when a prefix is ambiguous */
const MAX_LISTED_MATCHES = 10;

function isBodyTarget(value: string): value is BodyTarget {
  return (BODY_TARGETS as readonly string[]).includes(value);
}

/**
 * Resolve a full flow id from an exact id or a unique prefix.
 */
export function resolveFlowId(store: FlowStore, idPrefix: string): string {
  const ids = store.query({ limit: Number.MAX_SAFE_INTEGER });
  if (ids.includes(idPrefix)) {
    return idPrefix;
  }

  const matches = ids.filter((id) => id.startsWith(idPrefix));
  const [first] = matches;
  if (first === undefined) {
    throw new Error(`No flow found matching "${idPrefix}"`);
  }
  if (matches.length > 1) {
    const listed = matches.slice(0, MAX_LISTED_MATCHES).map((id) => `    ${id.slice(0, SHORT_ID_LENGTH * 2)}`);
    const more = matches.length > MAX_LISTED_MATCHES ? [`    ... and ${matches.length - MAX_LISTED_MATCHES} more`] : [];
    throw new Error(
      [`Ambiguous ID "${idPrefix}" matches ${matches.length} flows:`, ...listed, ...more].join("\n")
    );
  }
  return first;
}

export const showCommand = new Command("show")
  .description("Show a captured flow in detail")
  .argument("<id>", "flow id or unique prefix")
  .option("--body <target>", "dump the raw request or response body to stdout")
  .option("--json", "JSON output")
  .action((idPrefix: string, opts: { body?: string; json?: boolean }, command: Command) => {
    withStore(command, (store) => {
      if (opts.body !== undefined && !isBodyTarget(opts.body)) {
        throw new Error(`Invalid --body: "${opts.body}". Use request or response.`);
      }

      const id = resolveFlowId(store, idPrefix);
      const flow = store.get(id);
      if (!flow) {
        throw new Error(`Flow ${id} not found`);
      }

      if (opts.body !== undefined) {
        const content = opts.body === "request" ? flow.request.content : (flow.response?.content ?? null);
        if (content === null) {
          throw new Error(`No ${opts.body} body captured for flow ${id}`);
        }
        process.stdout.write(content);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(flowToJson(flow), null, 2));
        return;
      }

      console.log(formatFlowDetail(flow));
      const hint = formatHint([`flowvault show ${id.slice(0, SHORT_ID_LENGTH)} --body response`, "--json"]);
      if (hint) console.log(hint);
    });
  });
