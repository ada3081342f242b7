import { ResourceProgramError } from "../errors/engine.errors";
import {
  isCallName,
  type BinaryOperator,
  type CompareOperator,
  type ExpressionNode,
  type ParsedExpression,
} from "./expression.ast";

type TokenKind = "number" | "string" | "name" | "op" | "eof";

interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly pos: number;
  readonly number?: number;
}

const OPERATORS = [
  "//",
  "<<",
  ">>",
  "<=",
  ">=",
  "==",
  "!=",
  "**",
  "+",
  "-",
  "*",
  "/",
  "%",
  "&",
  "|",
  "^",
  "~",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  ",",
  ".",
  "=",
  ":",
  ";",
  "{",
  "}",
  "@",
] as const;

const FORBIDDEN_KEYWORDS = new Set([
  "lambda",
  "if",
  "else",
  "elif",
  "for",
  "while",
  "import",
  "from",
  "def",
  "class",
  "return",
  "yield",
  "await",
  "async",
  "del",
  "global",
  "nonlocal",
  "assert",
  "pass",
  "with",
  "try",
  "except",
  "finally",
  "raise",
  "is",
  "as",
]);

const RESERVED_OPERATOR_WORDS = new Set(["and", "or", "not", "in"]);

const STRING_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
});

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === " " || ch === "\t") {
      i += 1;
      continue;
    }

    const numberMatch = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/.exec(text.slice(i));
    if (numberMatch && !(ch === "." && tokens.length > 0 && tokens[tokens.length - 1].kind === "name")) {
      const value = Number(numberMatch[0]);
      if (/^\d+$/.test(numberMatch[0]) && !Number.isSafeInteger(value)) {
        throw new ResourceProgramError(text, `integer literal ${numberMatch[0]} is out of range at column ${String(i + 1)}`);
      }
      tokens.push({
        kind: "number",
        text: numberMatch[0],
        pos: i,
        number: value,
      });
      i += numberMatch[0].length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      let value = "";
      let j = i + 1;
      let closed = false;
      while (j < text.length) {
        const c = text[j];
        if (c === "\\") {
          const next = text[j + 1];
          if (next === undefined) {
            break;
          }
          value += STRING_ESCAPES[next] ?? `\\${next}`;
          j += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          break;
        }
        value += c;
        j += 1;
      }
      if (!closed) {
        throw new ResourceProgramError(text, `unterminated string at column ${String(i + 1)}`);
      }
      tokens.push({ kind: "string", text: value, pos: i });
      i = j + 1;
      continue;
    }

    const nameMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (nameMatch) {
      tokens.push({ kind: "name", text: nameMatch[0], pos: i });
      i += nameMatch[0].length;
      continue;
    }

    const op = OPERATORS.find((candidate) => text.startsWith(candidate, i));
    if (op) {
      tokens.push({ kind: "op", text: op, pos: i });
      i += op.length;
      continue;
    }

    throw new ResourceProgramError(text, `unexpected character '${ch}' at column ${String(i + 1)}`);
  }

  tokens.push({ kind: "eof", text: "", pos: text.length });
  return tokens;
}

/**
 * Recursive-descent parser for one resource expression line. The accepted
 * language is a small side-effect-free expression grammar; every construct
 * outside it is rejected here, before any job runs.
 */
class ExpressionParser {
  private idx = 0;
  private readonly names: string[] = [];

  constructor(
    private readonly tokens: readonly Token[],
    private readonly text: string
  ) {}

  parse(): ParsedExpression {
    const ast = this.parseOr();
    const trailing = this.peek();
    if (trailing.kind !== "eof") {
      if (trailing.kind === "op" && trailing.text === "=") {
        this.fail("assignment is not allowed");
      }
      this.fail(`unexpected '${trailing.text}' at column ${String(trailing.pos + 1)}`);
    }
    if (this.names.length === 0) {
      this.fail("expression does not reference any resource");
    }
    return { text: this.text, ast, names: [...this.names] };
  }

  private parseOr(): ExpressionNode {
    const operands = [this.parseAnd()];
    while (this.matchWord("or")) {
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { type: "logical", op: "or", operands };
  }

  private parseAnd(): ExpressionNode {
    const operands = [this.parseNot()];
    while (this.matchWord("and")) {
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : { type: "logical", op: "and", operands };
  }

  private parseNot(): ExpressionNode {
    if (this.matchWord("not")) {
      return { type: "unary", op: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const first = this.parseBitOr();
    const rest: { op: CompareOperator; right: ExpressionNode }[] = [];

    while (true) {
      const op = this.matchCompareOperator();
      if (op === undefined) {
        break;
      }
      rest.push({ op, right: this.parseBitOr() });
    }

    return rest.length === 0 ? first : { type: "compare", first, rest };
  }

  private matchCompareOperator(): CompareOperator | undefined {
    const token = this.peek();
    if (token.kind === "op") {
      switch (token.text) {
        case "==":
        case "!=":
        case "<":
        case "<=":
        case ">":
        case ">=":
          this.idx += 1;
          return token.text;
        default:
          return undefined;
      }
    }
    if (token.kind === "name") {
      if (token.text === "in") {
        this.idx += 1;
        return "in";
      }
      if (token.text === "not" && this.peekAt(1).kind === "name" && this.peekAt(1).text === "in") {
        this.idx += 2;
        return "not in";
      }
      if (token.text === "is") {
        this.fail("operator 'is' is not allowed");
      }
    }
    return undefined;
  }

  private parseBitOr(): ExpressionNode {
    return this.parseBinaryLevel(["|"], () => this.parseBitXor());
  }

  private parseBitXor(): ExpressionNode {
    return this.parseBinaryLevel(["^"], () => this.parseBitAnd());
  }

  private parseBitAnd(): ExpressionNode {
    return this.parseBinaryLevel(["&"], () => this.parseShift());
  }

  private parseShift(): ExpressionNode {
    return this.parseBinaryLevel(["<<", ">>"], () => this.parseArith());
  }

  private parseArith(): ExpressionNode {
    return this.parseBinaryLevel(["+", "-"], () => this.parseTerm());
  }

  private parseTerm(): ExpressionNode {
    return this.parseBinaryLevel(["*", "/", "//", "%"], () => this.parseUnary());
  }

  private parseBinaryLevel(
    operators: readonly BinaryOperator[],
    next: () => ExpressionNode
  ): ExpressionNode {
    let left = next();
    while (true) {
      const token = this.peek();
      const op = operators.find((candidate) => token.kind === "op" && token.text === candidate);
      if (op === undefined) {
        return left;
      }
      this.idx += 1;
      left = { type: "binary", op, left, right: next() };
    }
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.kind === "op" && (token.text === "-" || token.text === "+" || token.text === "~")) {
      this.idx += 1;
      return { type: "unary", op: token.text, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    if (this.matchOp("**")) {
      return { type: "binary", op: "**", left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();

    if (token.kind === "number") {
      this.idx += 1;
      return this.rejectPostfix({ type: "literal", value: token.number ?? Number.NaN });
    }

    if (token.kind === "string") {
      this.idx += 1;
      let value = token.text;
      while (this.peek().kind === "string") {
        value += this.peek().text;
        this.idx += 1;
      }
      return this.rejectPostfix({ type: "literal", value });
    }

    if (token.kind === "name") {
      return this.parseNameExpression(token);
    }

    if (token.kind === "op" && token.text === "(") {
      this.idx += 1;
      if (this.matchOp(")")) {
        return this.rejectPostfix({ type: "sequence", items: [] });
      }
      const first = this.parseOr();
      if (this.matchOp(")")) {
        return this.rejectPostfix(first);
      }
      const items = [first, ...this.parseSequenceTail(")")];
      return this.rejectPostfix({ type: "sequence", items });
    }

    if (token.kind === "op" && token.text === "[") {
      this.idx += 1;
      if (this.matchOp("]")) {
        return this.rejectPostfix({ type: "sequence", items: [] });
      }
      const first = this.parseOr();
      if (this.matchOp("]")) {
        return this.rejectPostfix({ type: "sequence", items: [first] });
      }
      const items = [first, ...this.parseSequenceTail("]")];
      return this.rejectPostfix({ type: "sequence", items });
    }

    if (token.kind === "eof") {
      this.fail("unexpected end of expression");
    }
    if (token.kind === "op" && token.text === "{") {
      this.fail("dict and set literals are not allowed");
    }
    this.fail(`unexpected '${token.text}' at column ${String(token.pos + 1)}`);
  }

  /** Parses `, item, item )` after the first item of a tuple or list. */
  private parseSequenceTail(closer: ")" | "]"): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    while (this.matchOp(",")) {
      if (this.matchOp(closer)) {
        return items;
      }
      items.push(this.parseOr());
    }
    this.expectOp(closer);
    return items;
  }

  private parseNameExpression(token: Token): ExpressionNode {
    const name = token.text;
    if (FORBIDDEN_KEYWORDS.has(name)) {
      this.fail(`'${name}' is not allowed`);
    }
    if (RESERVED_OPERATOR_WORDS.has(name)) {
      this.fail(`unexpected '${name}' at column ${String(token.pos + 1)}`);
    }
    this.idx += 1;

    if (name === "True" || name === "False") {
      return this.rejectPostfix({ type: "literal", value: name === "True" });
    }
    if (name === "None") {
      return this.rejectPostfix({ type: "literal", value: null });
    }

    if (this.matchOp("(")) {
      if (!isCallName(name)) {
        this.fail(`call to '${name}' is not allowed`);
      }
      if (this.matchOp(")")) {
        this.fail(`${name}() takes exactly one argument`);
      }
      const arg = this.parseOr();
      if (this.peek().kind === "op" && this.peek().text === "=") {
        this.fail("keyword arguments are not allowed");
      }
      if (!this.matchOp(")")) {
        this.fail(`${name}() takes exactly one argument`);
      }
      return this.rejectPostfix({ type: "call", fn: name, arg });
    }

    this.recordName(name);

    if (this.matchOp(".")) {
      const fieldToken = this.peek();
      if (fieldToken.kind !== "name") {
        this.fail(`expected field name after '${name}.'`);
      }
      this.idx += 1;
      const fieldNode: ExpressionNode = { type: "field", name, field: fieldToken.text };
      const next = this.peek();
      if (next.kind === "op" && next.text === ".") {
        this.fail("nested attribute access is not allowed");
      }
      if (next.kind === "op" && next.text === "(") {
        this.fail(`method call '${name}.${fieldToken.text}()' is not allowed`);
      }
      if (next.kind === "op" && next.text === "[") {
        this.fail("subscripts are not allowed");
      }
      return fieldNode;
    }

    return this.rejectPostfix({ type: "name", name });
  }

  private rejectPostfix(node: ExpressionNode): ExpressionNode {
    const next = this.peek();
    if (next.kind !== "op") {
      return node;
    }
    if (next.text === "[") {
      this.fail("subscripts are not allowed");
    }
    if (next.text === ".") {
      this.fail("attribute access is only allowed on a resource name");
    }
    if (next.text === "(") {
      this.fail("only calls to int, float, bool, str and len are allowed");
    }
    return node;
  }

  private recordName(name: string): void {
    if (!this.names.includes(name)) {
      this.names.push(name);
    }
  }

  private matchWord(word: string): boolean {
    const token = this.peek();
    if (token.kind === "name" && token.text === word) {
      if (word === "not" && this.peekAt(1).kind === "name" && this.peekAt(1).text === "in") {
        return false;
      }
      this.idx += 1;
      return true;
    }
    return false;
  }

  private matchOp(op: string): boolean {
    const token = this.peek();
    if (token.kind === "op" && token.text === op) {
      this.idx += 1;
      return true;
    }
    return false;
  }

  private expectOp(op: string): void {
    if (!this.matchOp(op)) {
      const token = this.peek();
      this.fail(`expected '${op}' but found '${token.kind === "eof" ? "end of expression" : token.text}'`);
    }
  }

  private peek(): Token {
    return this.peekAt(0);
  }

  private peekAt(offset: number): Token {
    return this.tokens[Math.min(this.idx + offset, this.tokens.length - 1)];
  }

  private fail(reason: string): never {
    throw new ResourceProgramError(this.text, reason);
  }
}

export function parseExpression(text: string): ParsedExpression {
  const trimmed = text.trim();
  if (trimmed === "") {
    throw new ResourceProgramError(text, "empty expression");
  }
  return new ExpressionParser(tokenize(trimmed), trimmed).parse();
}
