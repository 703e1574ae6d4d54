import type { ParticleDataset } from "@/types/dataset";
import { ExpressionError } from "@/types/errors";

/*
 * Grammar:
 *   expr    := term (("+" | "-") term)*
 *   term    := unary (("*" | "/") unary)*
 *   unary   := ("+" | "-") unary | primary
 *   primary := NUMBER | "pos" "(" expr ")" | "(" expr ("," expr)* ")" | "[" expr ("," expr)* "]"
 *
 * A parenthesized or bracketed list with a comma is a vector literal.
 */

export type ExprNode =
  | { type: "number"; value: number }
  | { type: "pos"; arg: ExprNode; at: number }
  | { type: "vector"; items: ExprNode[]; at: number }
  | { type: "unary"; op: "+" | "-"; operand: ExprNode }
  | { type: "binary"; op: "+" | "-" | "*" | "/"; left: ExprNode; right: ExprNode; at: number };

type Token =
  | { kind: "number"; value: number; at: number }
  | { kind: "ident"; name: string; at: number }
  | { kind: "punct"; value: string; at: number }
  | { kind: "end"; at: number };

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const PUNCT = new Set(["+", "-", "*", "/", "(", ")", "[", "]", ","]);

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const rest = source.slice(i);
    const num = NUMBER_RE.exec(rest);
    if (num) {
      tokens.push({ kind: "number", value: Number(num[0]), at: i });
      i += num[0].length;
      continue;
    }
    const ident = IDENT_RE.exec(rest);
    if (ident) {
      tokens.push({ kind: "ident", name: ident[0], at: i });
      i += ident[0].length;
      continue;
    }
    if (PUNCT.has(ch)) {
      tokens.push({ kind: "punct", value: ch, at: i });
      i++;
      continue;
    }
    throw new ExpressionError("SyntaxError", `Unexpected character '${ch}'.`, i);
  }
  tokens.push({ kind: "end", at: source.length });
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    this.pos++;
    return tok;
  }

  private isPunct(value: string): boolean {
    const tok = this.peek();
    return tok.kind === "punct" && tok.value === value;
  }

  private expect(value: string) {
    const tok = this.next();
    if (tok.kind !== "punct" || tok.value !== value) {
      throw new ExpressionError("SyntaxError", `Expected '${value}'.`, tok.at);
    }
  }

  parse(): ExprNode {
    const node = this.expr();
    const tok = this.peek();
    if (tok.kind !== "end") {
      throw new ExpressionError("SyntaxError", "Unexpected input after expression.", tok.at);
    }
    return node;
  }

  private expr(): ExprNode {
    let left = this.term();
    for (;;) {
      const tok = this.peek();
      if (tok.kind !== "punct" || (tok.value !== "+" && tok.value !== "-")) return left;
      this.next();
      left = { type: "binary", op: tok.value, left, right: this.term(), at: tok.at };
    }
  }

  private term(): ExprNode {
    let left = this.unary();
    for (;;) {
      const tok = this.peek();
      if (tok.kind !== "punct" || (tok.value !== "*" && tok.value !== "/")) return left;
      this.next();
      left = { type: "binary", op: tok.value, left, right: this.unary(), at: tok.at };
    }
  }

  private unary(): ExprNode {
    const tok = this.peek();
    if (tok.kind === "punct" && (tok.value === "+" || tok.value === "-")) {
      this.next();
      return { type: "unary", op: tok.value, operand: this.unary() };
    }
    return this.primary();
  }

  private list(close: string, at: number): ExprNode {
    const items = [this.expr()];
    while (this.isPunct(",")) {
      this.next();
      // trailing comma, as in "(1, 2,)"
      if (this.isPunct(close)) break;
      items.push(this.expr());
    }
    this.expect(close);
    return items.length === 1 && close === ")" ? items[0] : { type: "vector", items, at };
  }

  private primary(): ExprNode {
    const tok = this.next();
    switch (tok.kind) {
      case "number":
        return { type: "number", value: tok.value };
      case "ident": {
        if (tok.name !== "pos") {
          throw new ExpressionError("SyntaxError", `Unknown name '${tok.name}'; only pos(id) is available.`, tok.at);
        }
        this.expect("(");
        const arg = this.expr();
        this.expect(")");
        return { type: "pos", arg, at: tok.at };
      }
      case "punct":
        if (tok.value === "(") return this.list(")", tok.at);
        if (tok.value === "[") return this.list("]", tok.at);
        throw new ExpressionError("SyntaxError", `Unexpected '${tok.value}'.`, tok.at);
      case "end":
        throw new ExpressionError("SyntaxError", "Unexpected end of expression.", tok.at);
    }
  }
}

export function parseExpression(source: string): ExprNode {
  return new Parser(tokenize(source)).parse();
}

// ---------- Evaluation ----------

export type ExprValue = { kind: "scalar"; value: number } | { kind: "vector"; values: number[] };

const idIndexCache = new WeakMap<ParticleDataset, Map<number, number>>();

/** id -> dataset index, built once per dataset. Duplicate ids map to their last index. */
export function buildIdIndex(dataset: ParticleDataset): Map<number, number> {
  const cached = idIndexCache.get(dataset);
  if (cached) return cached;
  const index = new Map<number, number>();
  dataset.ids.forEach((id, i) => index.set(id, i));
  idIndexCache.set(dataset, index);
  return index;
}

function combine(op: "+" | "-" | "*" | "/", a: number, b: number): number {
  switch (op) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      return a / b;
  }
}

function components(value: ExprValue): number[] {
  return value.kind === "scalar" ? [value.value] : value.values;
}

function evaluateNode(node: ExprNode, dataset: ParticleDataset, ids: Map<number, number>): ExprValue {
  switch (node.type) {
    case "number":
      return { kind: "scalar", value: node.value };
    case "pos": {
      const arg = evaluateNode(node.arg, dataset, ids);
      if (arg.kind !== "scalar" || !Number.isInteger(arg.value)) {
        throw new ExpressionError("NonNumericResult", "pos() takes a single integer atom id.", node.at);
      }
      const index = ids.get(arg.value);
      if (index === undefined) {
        throw new ExpressionError("UnknownAtomId", `Atom id ${arg.value} not found in dataset.`, node.at);
      }
      return { kind: "vector", values: [dataset.x[index], dataset.y[index]] };
    }
    case "vector": {
      const values = node.items.map((item) => {
        const v = evaluateNode(item, dataset, ids);
        if (v.kind !== "scalar") {
          throw new ExpressionError("NonNumericResult", "Vector components must be numbers.", node.at);
        }
        return v.value;
      });
      return { kind: "vector", values };
    }
    case "unary": {
      const v = evaluateNode(node.operand, dataset, ids);
      if (node.op === "+") return v;
      return v.kind === "scalar"
        ? { kind: "scalar", value: -v.value }
        : { kind: "vector", values: v.values.map((c) => -c) };
    }
    case "binary": {
      const left = evaluateNode(node.left, dataset, ids);
      const right = evaluateNode(node.right, dataset, ids);
      if (left.kind === "scalar" && right.kind === "scalar") {
        return { kind: "scalar", value: combine(node.op, left.value, right.value) };
      }
      const a = components(left);
      const b = components(right);
      // scalars broadcast over vectors
      if (a.length !== b.length && a.length !== 1 && b.length !== 1) {
        throw new ExpressionError(
          "NonNumericResult",
          `Cannot combine vectors of length ${a.length} and ${b.length}.`,
          node.at,
        );
      }
      const n = Math.max(a.length, b.length);
      const values: number[] = [];
      for (let i = 0; i < n; i++) {
        values.push(combine(node.op, a.length === 1 ? a[0] : a[i], b.length === 1 ? b[0] : b[i]));
      }
      return { kind: "vector", values };
    }
  }
}

export function evaluateExpression(source: string, dataset: ParticleDataset): ExprValue {
  return evaluateNode(parseExpression(source), dataset, buildIdIndex(dataset));
}

/**
 * Resolve a center point such as `pos(12)` or `(pos(10) + pos(20)) / 2`.
 * Extra components beyond x and y are ignored.
 */
export function evaluateCenter(source: string, dataset: ParticleDataset): [number, number] {
  if (!source.trim()) {
    throw new ExpressionError("SyntaxError", "Enter an expression such as pos(12) or (pos(1)+pos(2))/2.");
  }
  const values = components(evaluateExpression(source, dataset));
  if (values.some((v) => !Number.isFinite(v))) {
    throw new ExpressionError("NonNumericResult", "Result is not a finite number.");
  }
  if (values.length < 2) {
    throw new ExpressionError("InsufficientComponents", "Result must have at least two components (x and y).");
  }
  return [values[0], values[1]];
}
