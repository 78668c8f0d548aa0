/**
 * Row filter expressions for `--where`:
 *
 *   Curso == 'A' and SKIP != '1'
 *   `Tipo de curso` == "Online" or Edad == 30
 *
 * Comparisons are `==` and `!=`; `and` binds tighter than `or`; parentheses
 * group. Identifiers are bare words or backtick-quoted; values are quoted
 * strings or bare words/numbers. A bare numeric value compares numerically
 * against a numeric cell.
 */

import { RowLookup } from "../tokens/resolver.js";
import type { FieldMatching, RowValues } from "../tokens/resolver.js";

type Tok =
  | { t: "ident"; v: string }
  | { t: "str"; v: string }
  | { t: "op"; v: "==" | "!=" }
  | { t: "and" | "or" | "(" | ")" };

type Node =
  | { kind: "cmp"; column: string; op: "==" | "!="; value: string; numeric: boolean }
  | { kind: "and" | "or"; left: Node; right: Node };

export type RowPredicate = (row: RowValues) => boolean;

export type WhereOutcome = { ok: true; predicate: RowPredicate } | { ok: false; error: string };

function tokenize(src: string): Tok[] {
  const out: Tok[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "(" || ch === ")") {
      out.push({ t: ch });
      i++;
    } else if (src.startsWith("==", i) || src.startsWith("!=", i)) {
      out.push({ t: "op", v: src[i] === "=" ? "==" : "!=" });
      i += 2;
    } else if (ch === "'" || ch === '"' || ch === "`") {
      const end = src.indexOf(ch, i + 1);
      if (end === -1) throw new Error(`Unterminated ${ch} at position ${i}`);
      const v = src.slice(i + 1, end);
      out.push(ch === "`" ? { t: "ident", v } : { t: "str", v });
      i = end + 1;
    } else {
      const m = /^[^\s()=!'"`]+/.exec(src.slice(i));
      if (!m) throw new Error(`Unexpected "${ch}" at position ${i}`);
      const word = m[0];
      const lower = word.toLowerCase();
      if (lower === "and" || lower === "&" || lower === "&&") out.push({ t: "and" });
      else if (lower === "or" || lower === "|" || lower === "||") out.push({ t: "or" });
      else out.push({ t: "ident", v: word });
      i += word.length;
    }
  }
  return out;
}

class Parser {
  private pos = 0;

  constructor(private readonly toks: Tok[]) {}

  parse(): Node {
    const node = this.or();
    if (this.pos < this.toks.length) throw new Error("Unexpected trailing input");
    return node;
  }

  private peek(): Tok | undefined {
    return this.toks[this.pos];
  }

  private or(): Node {
    let left = this.and();
    while (this.peek()?.t === "or") {
      this.pos++;
      left = { kind: "or", left, right: this.and() };
    }
    return left;
  }

  private and(): Node {
    let left = this.primary();
    while (this.peek()?.t === "and") {
      this.pos++;
      left = { kind: "and", left, right: this.primary() };
    }
    return left;
  }

  private primary(): Node {
    const tok = this.toks[this.pos++];
    if (tok?.t === "(") {
      const inner = this.or();
      if (this.toks[this.pos++]?.t !== ")") throw new Error('Expected ")"');
      return inner;
    }
    if (tok?.t !== "ident") throw new Error("Expected a column name");

    const op = this.toks[this.pos++];
    if (op?.t !== "op") throw new Error(`Expected == or != after ${tok.v}`);

    const value = this.toks[this.pos++];
    if (value?.t === "str") return { kind: "cmp", column: tok.v, op: op.v, value: value.v, numeric: false };
    if (value?.t === "ident") {
      return { kind: "cmp", column: tok.v, op: op.v, value: value.v, numeric: isNumeric(value.v) };
    }
    throw new Error(`Expected a value after ${tok.v} ${op.v}`);
  }
}

function isNumeric(s: string): boolean {
  return s.trim() !== "" && Number.isFinite(Number(s));
}

function columnsOf(node: Node): string[] {
  return node.kind === "cmp" ? [node.column] : [...columnsOf(node.left), ...columnsOf(node.right)];
}

function evaluate(node: Node, row: RowLookup): boolean {
  switch (node.kind) {
    case "and":
      return evaluate(node.left, row) && evaluate(node.right, row);
    case "or":
      return evaluate(node.left, row) || evaluate(node.right, row);
    case "cmp": {
      const cell = row.get(node.column) ?? "";
      const equal =
        node.numeric && isNumeric(cell) ? Number(cell) === Number(node.value) : cell === node.value;
      return node.op === "==" ? equal : !equal;
    }
  }
}

/**
 * Compile an expression against the table's columns. Unknown columns and
 * syntax errors come back as `{ ok: false }`.
 */
export function compileWhere(
  expression: string,
  columns: readonly string[],
  matching: FieldMatching = "insensitive",
): WhereOutcome {
  let root: Node;
  try {
    root = new Parser(tokenize(expression)).parse();
  } catch (err) {
    return { ok: false, error: `Invalid --where expression "${expression}": ${err instanceof Error ? err.message : String(err)}` };
  }

  const known = new RowLookup(Object.fromEntries(columns.map((c) => [c, c])), matching);
  const unknown = columnsOf(root).filter((c) => !known.has(c));
  if (unknown.length > 0) {
    return { ok: false, error: `Invalid --where expression "${expression}": unknown column(s) ${unknown.join(", ")}` };
  }

  return { ok: true, predicate: (row) => evaluate(root, new RowLookup(row, matching)) };
}
