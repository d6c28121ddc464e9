import { describe, expect, it } from "vitest";
import { ParseError } from "../shared/errors.js";
import { and, formatFilter, int, not, or, regex, unary } from "./ast.js";
import { parseFilter } from "./parser.js";

function parseError(text: string): ParseError {
  try {
    parseFilter(text);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`Expected "${text}" to fail`);
}

describe("parseFilter", () => {
  describe("atoms", () => {
    it("parses a unary flag", () => {
      expect(parseFilter("~q")).toEqual(unary("q"));
    });

    it("parses a regex flag with its argument", () => {
      expect(parseFilter("~m GET")).toEqual(regex("m", "GET"));
    });

    it("parses an int flag", () => {
      expect(parseFilter("~c 404")).toEqual(int("c", 404));
    });

    it("ends an integer argument at the first non-digit", () => {
      expect(parseFilter("~c 200|~c 201")).toEqual(or(int("c", 200), int("c", 201)));
      expect(parseFilter("~c 200&~marked")).toEqual(and(int("c", 200), unary("marked")));
      expect(parseFilter("(~c 200&~marked)")).toEqual(and(int("c", 200), unary("marked")));
      expect(parseFilter("!~c 404|~e")).toEqual(or(not(int("c", 404)), unary("e")));
    });

    it("treats a bare argument as a URL regex", () => {
      expect(parseFilter("example.com")).toEqual(regex("u", "example.com"));
    });

    it("reads flag codes as whole words", () => {
      expect(parseFilter("~marked")).toEqual(unary("marked"));
      expect(parseFilter("~marker todo")).toEqual(regex("marker", "todo"));
      expect(parseFilter("~replayq")).toEqual(unary("replayq"));
    });

    it("keeps regex characters in unquoted arguments", () => {
      expect(parseFilter("~u api/v[0-9]+|health")).toEqual(regex("u", "api/v[0-9]+|health"));
    });
  });

  describe("quoting", () => {
    it("accepts double and single quotes", () => {
      expect(parseFilter('~h "content-type=application/json"')).toEqual(
        regex("h", "content-type=application/json")
      );
      expect(parseFilter("~b 'hello world'")).toEqual(regex("b", "hello world"));
    });

    it("unescapes quotes and backslashes", () => {
      expect(parseFilter("~b 'it\\'s'")).toEqual(regex("b", "it's"));
      expect(parseFilter('~b "a\\\\b"')).toEqual(regex("b", "a\\b"));
    });

    it("keeps other escapes for the regex engine", () => {
      expect(parseFilter('~u "/users/\\d+"')).toEqual(regex("u", "/users/\\d+"));
    });

    it("allows operators and parentheses inside quotes", () => {
      expect(parseFilter('~u "(a|b)"')).toEqual(regex("u", "(a|b)"));
    });
  });

  describe("operators", () => {
    it("treats juxtaposition as AND", () => {
      expect(parseFilter("~marked ~c 200")).toEqual(and(unary("marked"), int("c", 200)));
    });

    it("binds implicit AND tighter than OR", () => {
      expect(parseFilter("~marked ~c 200 | ~c 201")).toEqual(
        or(and(unary("marked"), int("c", 200)), int("c", 201))
      );
    });

    it("binds & tighter than |", () => {
      expect(parseFilter("~q | ~s & ~e")).toEqual(or(unary("q"), and(unary("s"), unary("e"))));
    });

    it("binds ! tighter than AND", () => {
      expect(parseFilter("!~c 200 ~d api")).toEqual(and(not(int("c", 200)), regex("d", "api")));
    });

    it("nests negation", () => {
      expect(parseFilter("!!~e")).toEqual(not(not(unary("e"))));
    });

    it("groups with parentheses", () => {
      expect(parseFilter("~a & (~c 200 | ~c 304)")).toEqual(
        and(unary("a"), or(int("c", 200), int("c", 304)))
      );
      expect(parseFilter("!(~q | ~e)")).toEqual(not(or(unary("q"), unary("e"))));
    });

    it("flattens chains into one node", () => {
      const node = parseFilter("~u a & ~u b ~u c");
      expect(node.kind).toBe("and");
      expect(node).toEqual(and(regex("u", "a"), regex("u", "b"), regex("u", "c")));
      expect(parseFilter("(~u a & ~u b) & ~u c")).toEqual(node);
    });

    it("returns frozen nodes", () => {
      const node = parseFilter("~q | ~s");
      expect(Object.isFrozen(node)).toBe(true);
    });
  });

  describe("errors", () => {
    it("rejects empty input", () => {
      const err = parseError("   ");
      expect(err.message).toBe("Empty filter");
      expect(err.position).toBe(0);
    });

    it("rejects unknown flags", () => {
      const err = parseError("~q ~zz");
      expect(err.message).toBe('Unknown filter "~zz"');
      expect(err.position).toBe(3);
    });

    it("rejects a tilde without a name", () => {
      expect(parseError("~ foo").message).toBe('Expected a filter name after "~"');
    });

    it("rejects a non-integer status code", () => {
      const err = parseError("~c abc");
      expect(err.message).toBe('"~c" expects an integer');
      expect(err.position).toBe(3);
    });

    it("rejects a regex flag without a pattern", () => {
      const err = parseError("~d");
      expect(err.message).toBe('"~d" expects a pattern');
      expect(err.position).toBe(2);
    });

    it("rejects a dangling operator", () => {
      const err = parseError("~q |");
      expect(err.message).toBe("Unexpected end of filter");
      expect(err.position).toBe(4);
    });

    it("rejects unbalanced parentheses", () => {
      expect(parseError("(~q").message).toBe('Missing closing ")"');
      const err = parseError("~q)");
      expect(err.message).toBe('Unexpected ")"');
      expect(err.position).toBe(2);
    });

    it("rejects unterminated quotes", () => {
      const err = parseError('~u "abc');
      expect(err.message).toBe("Unterminated quoted string");
      expect(err.position).toBe(3);
    });

    it("rejects invalid regexes", () => {
      const err = parseError('~u "[a"');
      expect(err.message).toContain('Invalid regex pattern "[a"');
      expect(err.position).toBe(3);
    });

    it("rejects patterns prone to catastrophic backtracking", () => {
      expect(parseError('~b "(a+)+$"').message).toContain("potential catastrophic backtracking");
    });
  });
});

describe("formatFilter", () => {
  it("renders text that parses back to the same tree", () => {
    const inputs = [
      "~marked ~c 200 | ~c 201",
      '!(~q | ~h "x-\\"quoted\\"")',
      "~a & !~d internal",
      '~u "/users/\\d+"',
    ];
    for (const input of inputs) {
      const node = parseFilter(input);
      expect(parseFilter(formatFilter(node))).toEqual(node);
    }
  });

  it("parenthesises OR inside AND", () => {
    expect(formatFilter(and(unary("a"), or(unary("q"), unary("e"))))).toBe("~a & (~q | ~e)");
  });
});
