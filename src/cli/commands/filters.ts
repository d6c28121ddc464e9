import { Command } from "commander";
import { FILTER_FIELDS, listFilterCodes } from "../../filter/fields.js";
import { BOLD, paint } from "../formatters/colour.js";

const ARGUMENT_HINTS = { unary: "", regex: " <regex>", int: " <int>" } as const;

/**
 * Reference text for the filter language.
 */
export function formatFilterHelp(colour?: boolean): string {
  const entries = listFilterCodes().map((code) => {
    const field = FILTER_FIELDS[code];
    return { usage: `~${code}${ARGUMENT_HINTS[field.arity]}`, help: field.help };
  });
  const width = Math.max(...entries.map((entry) => entry.usage.length));

  return [
    paint("  Filters", BOLD, colour),
    ...entries.map((entry) => `    ${entry.usage.padEnd(width)}  ${entry.help}`),
    "",
    paint("  Operators", BOLD, colour),
    "    !f        not",
    "    f & g     and (also: f g)",
    "    f | g     or",
    "    (f)       grouping",
    "",
    "  A bare word matches the URL. Quote arguments with spaces: ~h \"accept=.*json\"",
  ].join("\n");
}

export const filtersCommand = new Command("filters")
  .description("List the filter expressions accepted by flows, count and copy")
  .action(() => {
    console.log(formatFilterHelp());
  });
