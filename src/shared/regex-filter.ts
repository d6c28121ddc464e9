/**
 * Validation and caching for the regular expressions used by filters.
 */

import safe from "safe-regex2";
import { getErrorMessage } from "./errors.js";

const VALID_REGEX_FLAGS = new Set(["i", "m", "s", "u"]);
const DEFAULT_CACHE_MAX_ENTRIES = 100;

export interface RegexFilterSpec {
  pattern: string;
  flags: string;
}

function validateRegexFlags(flags: string): void {
  const seen = new Set<string>();

  for (const flag of flags) {
    if (!VALID_REGEX_FLAGS.has(flag)) {
      throw new Error(`Unsupported regex flag "${flag}".`);
    }

    if (seen.has(flag)) {
      throw new Error(`Duplicate regex flag "${flag}".`);
    }

    seen.add(flag);
  }
}

/**
 * Validate a regex pattern and flags, throwing a descriptive error on failure.
 * Stateful flags (`g`, `y`) are rejected because a filter match is a plain test.
 */
export function validateRegexFilter(pattern: string, flags = ""): RegexFilterSpec {
  validateRegexFlags(flags);

  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, flags);
  } catch (err) {
    throw new Error(`Invalid regex pattern "${pattern}": ${getErrorMessage(err)}`);
  }

  if (!safe(compiled)) {
    throw new Error(
      `Regex pattern "${pattern}" is rejected: potential catastrophic backtracking. Simplify the pattern.`
    );
  }

  return { pattern, flags };
}

/**
 * Compiled-pattern cache keyed by (flags, pattern), evicting the oldest entry
 * once full. The SQL `search` function hits the same pattern once per row.
 */
export class RegexCache {
  private readonly entries = new Map<string, RegExp>();

  constructor(private readonly maxEntries: number = DEFAULT_CACHE_MAX_ENTRIES) {}

  get size(): number {
    return this.entries.size;
  }

  get(pattern: string, flags: string): RegExp {
    const key = `${flags}\u0000${pattern}`;

    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const validated = validateRegexFilter(pattern, flags);
    const regex = new RegExp(validated.pattern, validated.flags);
    this.entries.set(key, regex);

    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (typeof oldest === "string") {
        this.entries.delete(oldest);
      }
    }

    return regex;
  }
}
