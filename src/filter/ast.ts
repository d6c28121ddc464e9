/**
 * Filter expression tree. Nodes are immutable once built.
 */

import type { IntCode, RegexCode, UnaryCode } from "./fields.js";

export interface UnaryNode {
  readonly kind: "unary";
  readonly code: UnaryCode;
}

export interface RegexNode {
  readonly kind: "regex";
  readonly code: RegexCode;
  readonly pattern: string;
}

export interface IntNode {
  readonly kind: "int";
  readonly code: IntCode;
  readonly value: number;
}

export interface AndNode {
  readonly kind: "and";
  readonly children: readonly FilterNode[];
}

export interface OrNode {
  readonly kind: "or";
  readonly children: readonly FilterNode[];
}

export interface NotNode {
  readonly kind: "not";
  readonly child: FilterNode;
}

export type FilterNode = UnaryNode | RegexNode | IntNode | AndNode | OrNode | NotNode;
export type FilterNodeKind = FilterNode["kind"];

export function unary(code: UnaryCode): UnaryNode {
  return Object.freeze({ kind: "unary", code });
}

export function regex(code: RegexCode, pattern: string): RegexNode {
  return Object.freeze({ kind: "regex", code, pattern });
}

export function int(code: IntCode, value: number): IntNode {
  return Object.freeze({ kind: "int", code, value });
}

/**
 * Conjunction. Nested conjunctions are flattened into one node.
 */
export function and(...children: FilterNode[]): FilterNode {
  return combine("and", children);
}

/**
 * Disjunction. Nested disjunctions are flattened into one node.
 */
export function or(...children: FilterNode[]): FilterNode {
  return combine("or", children);
}

export function not(child: FilterNode): NotNode {
  return Object.freeze({ kind: "not", child });
}

function combine(kind: "and" | "or", children: FilterNode[]): FilterNode {
  const flat: FilterNode[] = [];
  for (const child of children) {
    if (child.kind === kind) {
      flat.push(...child.children);
    } else {
      flat.push(child);
    }
  }

  const [only] = flat;
  if (flat.length === 1 && only) {
    return only;
  }
  if (flat.length === 0) {
    throw new Error(`"${kind}" needs at least one operand`);
  }
  return Object.freeze({ kind, children: Object.freeze(flat) });
}

/**
 * Render a node back to filter text. Parsing the result yields an equal tree.
 */
export function formatFilter(node: FilterNode): string {
  switch (node.kind) {
    case "unary":
      return `~${node.code}`;
    case "regex":
      return `~${node.code} ${quote(node.pattern)}`;
    case "int":
      return `~${node.code} ${node.value}`;
    case "and":
      return node.children.map((child) => wrap(child, "and")).join(" & ");
    case "or":
      return node.children.map((child) => wrap(child, "or")).join(" | ");
    case "not":
      return `!${wrap(node.child, "not")}`;
  }
}

function wrap(node: FilterNode, parent: "and" | "or" | "not"): string {
  const text = formatFilter(node);
  const needsParens =
    (node.kind === "or" && parent !== "or") || (node.kind === "and" && parent === "not");
  return needsParens ? `(${text})` : text;
}

function quote(text: string): string {
  return `"${text.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}
