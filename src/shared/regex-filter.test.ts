import { describe, expect, it } from "vitest";
import { RegexCache, validateRegexFilter } from "./regex-filter.js";

describe("validateRegexFilter", () => {
  it("accepts a valid pattern without flags", () => {
    expect(validateRegexFilter("users/\\d+")).toEqual({ pattern: "users/\\d+", flags: "" });
  });

  it("accepts valid flags", () => {
    expect(validateRegexFilter("users", "im")).toEqual({ pattern: "users", flags: "im" });
  });

  it("throws on invalid patterns", () => {
    expect(() => validateRegexFilter("users([")).toThrow('Invalid regex pattern "users(["');
  });

  it("throws on duplicate flags", () => {
    expect(() => validateRegexFilter("users", "ii")).toThrow('Duplicate regex flag "i".');
  });

  it("rejects stateful flags", () => {
    expect(() => validateRegexFilter("users", "g")).toThrow('Unsupported regex flag "g".');
  });

  it("rejects patterns with catastrophic backtracking", () => {
    expect(() => validateRegexFilter("(a+)+$")).toThrow("potential catastrophic backtracking");
  });
});

describe("RegexCache", () => {
  it("returns the same compiled instance for a repeated pattern", () => {
    const cache = new RegexCache();
    const first = cache.get("api", "i");
    expect(cache.get("api", "i")).toBe(first);
    expect(cache.size).toBe(1);
  });

  it("keys entries by flags as well as pattern", () => {
    const cache = new RegexCache();
    expect(cache.get("api", "i")).not.toBe(cache.get("api", ""));
  });

  it("evicts the oldest entry once full", () => {
    const cache = new RegexCache(2);
    const a = cache.get("a", "");
    cache.get("b", "");
    cache.get("c", "");

    expect(cache.size).toBe(2);
    expect(cache.get("a", "")).not.toBe(a);
  });
});
