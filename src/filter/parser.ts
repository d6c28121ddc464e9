/**
 * Filter text parser.
 *
 *   orExpr  := andExpr ("|" andExpr)*
 *   andExpr := unary (["&"] unary)*
 *   unary   := "!" unary | primary
 *   primary := "(" orExpr ")" | "~" code [argument] | argument
 *
 * A bare argument with no flag matches the URL.
 */

import { ParseError, getErrorMessage } from "../shared/errors.js";
import { validateRegexFilter } from "../shared/regex-filter.js";
import { and, int, not, or, regex, unary, type FilterNode } from "./ast.js";
import { DEFAULT_REGEX_CODE, REGEX_FIELDS, resolveField, type RegexCode } from "./fields.js";

type TokenKind = "flag" | "arg" | "and" | "or" | "not" | "lparen" | "rparen" | "eof";

interface Token {
  kind: TokenKind;
  /** Flag code or argument value (quotes and escapes removed) */
  text: string;
  pos: number;
}

const OPERATOR_TOKENS: Record<string, TokenKind> = {
  "&": "and",
  "|": "or",
  "!": "not",
  "(": "lparen",
  ")": "rparen",
};

const ARG_TERMINATORS = new Set(["(", ")", "~", "'", '"']);
const FLAG_CHAR = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  // An int flag's argument is just its digits, so "~c 200|~c 201" splits at "|"
  let intArgument = false;

  while (pos < input.length) {
    const ch = input.charAt(pos);

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    const expectsInt = intArgument;
    intArgument = false;

    const operator = OPERATOR_TOKENS[ch];
    if (operator !== undefined) {
      tokens.push({ kind: operator, text: ch, pos });
      pos++;
      continue;
    }

    if (ch === "~") {
      const start = pos;
      pos++;
      while (pos < input.length && FLAG_CHAR.test(input.charAt(pos))) {
        pos++;
      }
      const code = input.slice(start + 1, pos);
      if (code === "") {
        throw new ParseError("Expected a filter name after \"~\"", start);
      }
      tokens.push({ kind: "flag", text: code, pos: start });
      intArgument = resolveField(code)?.arity === "int";
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = pos;
      const [text, end] = readQuoted(input, pos, ch);
      tokens.push({ kind: "arg", text, pos: start });
      pos = end;
      continue;
    }

    // Unquoted argument
    const start = pos;
    if (expectsInt && DIGIT.test(ch)) {
      while (pos < input.length && DIGIT.test(input.charAt(pos))) {
        pos++;
      }
      tokens.push({ kind: "arg", text: input.slice(start, pos), pos: start });
      continue;
    }
    while (pos < input.length) {
      const c = input.charAt(pos);
      if (isWhitespace(c) || ARG_TERMINATORS.has(c)) break;
      pos++;
    }
    tokens.push({ kind: "arg", text: input.slice(start, pos), pos: start });
  }

  tokens.push({ kind: "eof", text: "", pos: input.length });
  return tokens;
}

/**
 * Read a quoted argument starting at the opening quote. A backslash escapes
 * the quote character or another backslash; any other backslash is kept so
 * regex escapes like `\d` pass through.
 */
function readQuoted(input: string, start: number, quote: string): [string, number] {
  let pos = start + 1;
  let text = "";

  while (pos < input.length) {
    const ch = input.charAt(pos);
    if (ch === "\\" && pos + 1 < input.length) {
      const next = input.charAt(pos + 1);
      text += next === quote || next === "\\" ? next : ch + next;
      pos += 2;
      continue;
    }
    if (ch === quote) {
      return [text, pos + 1];
    }
    text += ch;
    pos++;
  }

  throw new ParseError("Unterminated quoted string", start);
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): FilterNode {
    const node = this.parseOr();
    const token = this.peek();
    if (token.kind !== "eof") {
      throw this.unexpected(token);
    }
    return node;
  }

  private peek(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new ParseError("Unexpected end of filter", this.endPosition());
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  private endPosition(): number {
    const last = this.tokens[this.tokens.length - 1];
    return last ? last.pos : 0;
  }

  private unexpected(token: Token): ParseError {
    if (token.kind === "eof") {
      return new ParseError("Unexpected end of filter", token.pos);
    }
    return new ParseError(`Unexpected "${token.text}"`, token.pos);
  }

  private parseOr(): FilterNode {
    const children = [this.parseAnd()];
    while (this.peek().kind === "or") {
      this.next();
      children.push(this.parseAnd());
    }
    return or(...children);
  }

  private parseAnd(): FilterNode {
    const children = [this.parseUnary()];
    for (;;) {
      const token = this.peek();
      if (token.kind === "and") {
        this.next();
        children.push(this.parseUnary());
      } else if (startsOperand(token)) {
        children.push(this.parseUnary());
      } else {
        break;
      }
    }
    return and(...children);
  }

  private parseUnary(): FilterNode {
    if (this.peek().kind === "not") {
      this.next();
      return not(this.parseUnary());
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FilterNode {
    const token = this.next();

    switch (token.kind) {
      case "lparen": {
        const inner = this.parseOr();
        const closing = this.next();
        if (closing.kind !== "rparen") {
          throw new ParseError('Missing closing ")"', token.pos);
        }
        return inner;
      }
      case "flag":
        return this.parseFlag(token);
      case "arg":
        return regexNode(DEFAULT_REGEX_CODE, token);
      default:
        throw this.unexpected(token);
    }
  }

  private parseFlag(token: Token): FilterNode {
    const field = resolveField(token.text);
    if (!field) {
      throw new ParseError(`Unknown filter "~${token.text}"`, token.pos);
    }

    switch (field.arity) {
      case "unary":
        return unary(field.code);
      case "regex": {
        const argument = this.next();
        if (argument.kind !== "arg") {
          throw new ParseError(`"~${field.code}" expects a pattern`, argument.pos);
        }
        return regexNode(field.code, argument);
      }
      case "int": {
        const argument = this.next();
        if (argument.kind !== "arg" || !/^\d+$/.test(argument.text)) {
          throw new ParseError(`"~${field.code}" expects an integer`, argument.pos);
        }
        const value = Number(argument.text);
        if (!Number.isSafeInteger(value)) {
          throw new ParseError(`"~${field.code}" value ${argument.text} is out of range`, argument.pos);
        }
        return int(field.code, value);
      }
    }
  }
}

function startsOperand(token: Token): boolean {
  return token.kind === "not" || token.kind === "lparen" || token.kind === "flag" || token.kind === "arg";
}

function regexNode(code: RegexCode, token: Token): FilterNode {
  try {
    validateRegexFilter(token.text, REGEX_FIELDS[code].flags);
  } catch (err) {
    throw new ParseError(getErrorMessage(err), token.pos);
  }
  return regex(code, token.text);
}

/**
 * Parse filter text into a tree.
 *
 * @throws ParseError with the offset of the offending character
 */
export function parseFilter(text: string): FilterNode {
  if (text.trim() === "") {
    throw new ParseError("Empty filter", 0);
  }
  return new Parser(tokenize(text)).parse();
}
