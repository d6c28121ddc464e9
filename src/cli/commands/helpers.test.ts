import { describe, expect, it } from "vitest";
import { parseFilter } from "../../filter/parser.js";
import { ParseError, StoreError } from "../../shared/errors.js";
import { formatCommandError, joinFilter } from "./helpers.js";

function parseErrorOf(filter: string): unknown {
  try {
    parseFilter(filter);
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("formatCommandError", () => {
  it("points at the failing position of a filter", () => {
    const filter = "~m get & ~nope";
    const err = parseErrorOf(filter);
    expect(err).toBeInstanceOf(ParseError);
    expect(formatCommandError(err, filter).split("\n")).toEqual([
      'Error: Unknown filter "~nope"',
      "  ~m get & ~nope",
      "           ^",
    ]);
  });

  it("prints other errors on one line", () => {
    expect(formatCommandError(new StoreError("Failed to open x: locked"), "~q")).toBe(
      "Error: Failed to open x: locked"
    );
  });
});

describe("joinFilter", () => {
  it("joins words and drops blank filters", () => {
    expect(joinFilter(["~m", "post", "&", "~c", "201"])).toBe("~m post & ~c 201");
    expect(joinFilter([])).toBeUndefined();
    expect(joinFilter(["  "])).toBeUndefined();
  });
});
