/**
 * Lowers a filter tree into a parameterised SQL condition over `flow_view`.
 * User-supplied values only ever travel as bound parameters.
 */

import type { FilterNode } from "./ast.js";
import { INT_FIELDS, REGEX_FIELDS, UNARY_FIELDS, type RegexField } from "./fields.js";

export type SqlParam = string | number;

export interface CompiledPredicate {
  sql: string;
  params: SqlParam[];
}

/** Condition used when no filter is given */
export const MATCH_ALL: Readonly<CompiledPredicate> = Object.freeze({ sql: "1", params: [] });

function regexCondition(field: RegexField): string {
  const call = `search(?, ${field.target}, '${field.flags}')`;
  if (field.source === "flow_headers") {
    return `flow_id IN (SELECT flow_id FROM flow_headers WHERE ${call})`;
  }
  return call;
}

function join(operator: "AND" | "OR", children: readonly FilterNode[]): CompiledPredicate {
  const compiled = children.map(compileFilter);
  return {
    sql: compiled.map((child) => `(${child.sql})`).join(` ${operator} `),
    params: compiled.flatMap((child) => child.params),
  };
}

/**
 * Compile a filter tree. The same tree always yields the same SQL and params.
 */
export function compileFilter(node: FilterNode): CompiledPredicate {
  switch (node.kind) {
    case "unary":
      return { sql: UNARY_FIELDS[node.code].sql, params: [] };
    case "regex":
      return { sql: regexCondition(REGEX_FIELDS[node.code]), params: [node.pattern] };
    case "int":
      // IS rather than = so a flow without the column compares false, not NULL
      return { sql: `${INT_FIELDS[node.code].column} IS ?`, params: [node.value] };
    case "and":
      return join("AND", node.children);
    case "or":
      return join("OR", node.children);
    case "not": {
      const inner = compileFilter(node.child);
      return { sql: `NOT (${inner.sql})`, params: inner.params };
    }
  }
}
